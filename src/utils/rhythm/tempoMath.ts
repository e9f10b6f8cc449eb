import type { TempoRange, TickKind } from "../../core/types";

const SECONDS_PER_MINUTE = 60;
const MS_PER_MINUTE = 60_000;

/** Longest delay setTimeout honours; larger values are clamped to 1ms by the runtime. */
export const MAX_TICK_INTERVAL_MS = 2 ** 31 - 1;

export type TempoValidationResult = { ok: true; value: number } | { ok: false; reason: string };

export function isTempoValidationError(res: TempoValidationResult): res is { ok: false; reason: string } {
  return res.ok === false;
}

/** bpm may be any finite real above zero; the practical range is enforced by the pickers only. */
export function validateBpm(bpm: number): TempoValidationResult {
  if (!Number.isFinite(bpm) || bpm <= 0) {
    return { ok: false, reason: `bpm must be a finite number above 0, got ${String(bpm)}` };
  }
  return { ok: true, value: bpm };
}

/** Time signatures and subdivisions are whole counts of at least one. */
export function validateCount(label: string, value: number): TempoValidationResult {
  const v = Math.trunc(value);
  if (!Number.isFinite(v) || v < 1) {
    return { ok: false, reason: `${label} must be an integer >= 1, got ${String(value)}` };
  }
  return { ok: true, value: v };
}

/** A tempo is playable only if its tick interval is a positive delay the timer can hold. */
export function validateTickInterval(bpm: number, subdivision: number): TempoValidationResult {
  const intervalMs = computeTickIntervalMs(bpm, subdivision);
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    return { ok: false, reason: `tick interval for ${bpm} bpm x ${subdivision} is not a positive duration` };
  }
  if (intervalMs > MAX_TICK_INTERVAL_MS) {
    return { ok: false, reason: `tick interval ${intervalMs}ms exceeds the ${MAX_TICK_INTERVAL_MS}ms timer limit` };
  }
  return { ok: true, value: intervalMs };
}

export function computeTickIntervalSeconds(bpm: number, subdivision: number): number {
  return SECONDS_PER_MINUTE / (bpm * subdivision);
}

export function computeTickIntervalMs(bpm: number, subdivision: number): number {
  return MS_PER_MINUTE / (bpm * subdivision);
}

export function computeTicksPerMeasure(timeSignature: number, subdivision: number): number {
  return subdivision * timeSignature;
}

export function classifyTick(tickCount: number, subdivision: number): TickKind {
  return tickCount % subdivision === 0 ? "accent" : "subdivision";
}

export function computeBeatIndex(tickCount: number, subdivision: number, timeSignature: number): number {
  return Math.floor(tickCount / subdivision) % timeSignature;
}

/** Next counter value after a tick, wrapping to 0 at the end of the measure. */
export function advanceTickCount(tickCount: number, subdivision: number, timeSignature: number): number {
  const next = tickCount + 1;
  return next >= computeTicksPerMeasure(timeSignature, subdivision) ? 0 : next;
}

/** Folds a counter back into a measure that got shorter. */
export function foldTickCount(tickCount: number, subdivision: number, timeSignature: number): number {
  const ticksPerMeasure = computeTicksPerMeasure(timeSignature, subdivision);
  return tickCount < ticksPerMeasure ? tickCount : tickCount % ticksPerMeasure;
}

export function randomIntInclusive({ min, max }: TempoRange, random: () => number = Math.random): number {
  const span = max - min + 1;
  const offset = Math.min(span - 1, Math.floor(random() * span));
  return min + Math.max(0, offset);
}
