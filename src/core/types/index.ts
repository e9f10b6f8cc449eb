export type TempoConfig = {
  bpm: number;
  timeSignature: number;
  subdivision: number;
};

export type RunState = {
  isRunning: boolean;
  tickCount: number;
};

/**
 * Tick contract
 * - accent: first sub-tick of a beat (primary sound)
 * - subdivision: every other sub-tick (secondary sound)
 */
export type TickKind = "accent" | "subdivision";

export type TickEvent = {
  kind: TickKind;
  /** Counter value the tick was classified with (before increment). */
  tickCount: number;
  /** Beat position after the counter advanced. */
  beatIndex: number;
  atMs: number;
};

export type TempoRange = {
  min: number;
  max: number;
};
