import { BPM_RANGE, DEFAULT_TEMPO } from "../constants/tempoConfig";
import type { TempoConfig, TempoRange } from "../types";
import { type TempoValidationResult, isTempoValidationError, validateBpm, validateCount, validateTickInterval } from "../../utils/rhythm/tempoMath";

export type MetronomeConfig = {
  initial: TempoConfig;
  /** Bounds used by shuffleBpm (inclusive). */
  shuffleRange: TempoRange;
  debug: boolean;
};

export type MetronomeConfigOverrides = {
  initial?: Partial<TempoConfig>;
  shuffleRange?: Partial<TempoRange>;
  debug?: boolean;
};

const readDebugFlag = () => typeof process !== "undefined" && process.env.METRONOME_DEBUG === "1";

const unwrapInitial = (res: TempoValidationResult) => {
  if (isTempoValidationError(res)) {
    throw new RangeError(`Invalid initial tempo: ${res.reason}`);
  }
  return res.value;
};

/** Merges overrides with the defaults. Unlike the runtime setters, invalid values throw. */
export function resolveMetronomeConfig(overrides: MetronomeConfigOverrides = {}): MetronomeConfig {
  const merged = { ...DEFAULT_TEMPO, ...overrides.initial };
  const initial: TempoConfig = {
    bpm: unwrapInitial(validateBpm(merged.bpm)),
    timeSignature: unwrapInitial(validateCount("timeSignature", merged.timeSignature)),
    subdivision: unwrapInitial(validateCount("subdivision", merged.subdivision)),
  };
  unwrapInitial(validateTickInterval(initial.bpm, initial.subdivision));

  const shuffleRange = { ...BPM_RANGE, ...overrides.shuffleRange };
  if (!Number.isInteger(shuffleRange.min) || !Number.isInteger(shuffleRange.max) || shuffleRange.min > shuffleRange.max) {
    throw new RangeError(`Invalid shuffle range [${shuffleRange.min}..${shuffleRange.max}]`);
  }

  return {
    initial,
    shuffleRange,
    debug: overrides.debug ?? readDebugFlag(),
  };
}

export default resolveMetronomeConfig;
