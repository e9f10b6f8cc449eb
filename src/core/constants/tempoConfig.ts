import type { TempoConfig, TempoRange } from "../types";

export const DEFAULT_TEMPO: TempoConfig = {
  bpm: 120,
  timeSignature: 4,
  subdivision: 1,
};

export const BPM_RANGE: TempoRange = { min: 40, max: 208 };
export const TIME_SIGNATURE_RANGE: TempoRange = { min: 2, max: 16 };

const rangeOf = ({ min, max }: TempoRange) => Array.from({ length: max - min + 1 }, (_, i) => min + i);

// Picker options. The core itself accepts anything that keeps the interval finite.
export const BPM_OPTIONS: readonly number[] = rangeOf(BPM_RANGE);
export const TIME_SIGNATURE_OPTIONS: readonly number[] = rangeOf(TIME_SIGNATURE_RANGE);
export const SUBDIVISION_OPTIONS: readonly number[] = [1, 2, 3, 4];

export const INDICATOR_RADIUS = 100;
