import { INDICATOR_RADIUS } from "../../core/constants/tempoConfig";
import { computeBeatIndex } from "./tempoMath";

type IndicatorSource = {
  timeSignature: number;
  subdivision: number;
  tickCount: number;
  isRunning: boolean;
};

export type BeatIndicator = {
  index: number;
  x: number;
  y: number;
  isActive: boolean;
};

export type TransportLabels = {
  toggleLabel: "START" | "STOP";
  bpmLabel: string;
  /** The bpm picker is disabled while the metronome runs. */
  bpmLocked: boolean;
};

/**
 * One indicator per beat, evenly spaced on a circle starting at 3 o'clock.
 * Only the current beat is lit, and only while running.
 */
export function layoutBeatIndicators(source: IndicatorSource, radius = INDICATOR_RADIUS): BeatIndicator[] {
  const { timeSignature, subdivision, tickCount, isRunning } = source;
  const beatIndex = computeBeatIndex(tickCount, subdivision, timeSignature);
  const step = (2 * Math.PI) / timeSignature;

  return Array.from({ length: timeSignature }, (_, index) => ({
    index,
    x: Math.cos(index * step) * radius,
    y: Math.sin(index * step) * radius,
    isActive: isRunning && index === beatIndex,
  }));
}

export function describeTransport({ bpm, isRunning }: { bpm: number; isRunning: boolean }): TransportLabels {
  return {
    toggleLabel: isRunning ? "STOP" : "START",
    bpmLabel: String(Math.trunc(bpm)),
    bpmLocked: isRunning,
  };
}
