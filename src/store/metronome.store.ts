import { createStore, type StoreApi } from "zustand/vanilla";

import { dispatchTick, silentSoundDispatcher, type SoundDispatcher } from "../audio/SoundDispatcher";
import { type MetronomeConfigOverrides, resolveMetronomeConfig } from "../core/config/metronomeConfig";
import { createConsoleLogger, type Logger } from "../core/debug/logger";
import type { RunState, TempoConfig, TickEvent, TickKind } from "../core/types";
import IntervalClock from "../engine/clock/IntervalClock";
import type { ClockTick, TimerHost } from "../engine/clock/types";
import {
  advanceTickCount,
  classifyTick,
  computeBeatIndex,
  computeTickIntervalMs,
  computeTickIntervalSeconds,
  computeTicksPerMeasure,
  foldTickCount,
  isTempoValidationError,
  randomIntInclusive,
  type TempoValidationResult,
  validateBpm,
  validateCount,
  validateTickInterval,
} from "../utils/rhythm/tempoMath";

export type MetronomeState = TempoConfig &
  RunState & {
    lastTick: TickEvent | null;

    setBpm: (bpm: number) => void;
    setTimeSignature: (timeSignature: number) => void;
    setSubdivision: (subdivision: number) => void;
    shuffleBpm: () => void;

    start: () => void;
    stop: () => void;
    toggleRun: () => void;
  };

export type MetronomeStore = StoreApi<MetronomeState>;

export type MetronomeStoreOptions = {
  config?: MetronomeConfigOverrides;
  sounds?: SoundDispatcher;
  timers?: TimerHost;
  random?: () => number;
  logger?: Logger;
  onTick?: (tick: TickEvent) => void;
};

type TempoSnapshot = Pick<MetronomeState, "bpm" | "timeSignature" | "subdivision" | "tickCount">;

export const selectBeatIndex = (s: TempoSnapshot) => computeBeatIndex(s.tickCount, s.subdivision, s.timeSignature);
export const selectTickIntervalSeconds = (s: TempoSnapshot) => computeTickIntervalSeconds(s.bpm, s.subdivision);
export const selectTickIntervalMs = (s: TempoSnapshot) => computeTickIntervalMs(s.bpm, s.subdivision);
export const selectTicksPerMeasure = (s: TempoSnapshot) => computeTicksPerMeasure(s.timeSignature, s.subdivision);

export function createMetronomeStore(options: MetronomeStoreOptions = {}): MetronomeStore {
  const config = resolveMetronomeConfig(options.config);
  const sounds = options.sounds ?? silentSoundDispatcher;
  const random = options.random ?? Math.random;
  const logger = options.logger ?? createConsoleLogger("metronome", { debug: config.debug });

  return createStore<MetronomeState>()((set, get) => {
    const playSafely = (kind: TickKind) => {
      try {
        dispatchTick(sounds, kind);
      } catch (e: unknown) {
        logger.warn(`sound dispatch failed on ${kind} tick:`, e instanceof Error ? e.message : String(e));
      }
    };

    const handleTick = (info: ClockTick) => {
      const { tickCount, subdivision } = get();
      const kind = classifyTick(tickCount, subdivision);
      playSafely(kind);

      // The dispatcher may have changed the measure; advance from what is current now.
      const current = get();
      const nextCount = advanceTickCount(current.tickCount, current.subdivision, current.timeSignature);
      const tick: TickEvent = {
        kind,
        tickCount,
        beatIndex: computeBeatIndex(nextCount, current.subdivision, current.timeSignature),
        atMs: info.atMs,
      };
      set({ tickCount: nextCount, lastTick: tick });
      options.onTick?.(tick);
    };

    // The store is the only owner of the clock; the clock only sees this callback.
    const clock = new IntervalClock({
      timers: options.timers,
      events: { onTick: handleTick },
    });

    const arm = () => {
      const intervalMs = selectTickIntervalMs(get());
      clock.arm(intervalMs);
      logger.debug(`armed at ${intervalMs.toFixed(2)}ms per tick`);
    };

    const rearm = () => {
      if (!get().isRunning) return;
      arm();
    };

    const accept = (field: keyof TempoConfig, res: TempoValidationResult): number | null => {
      if (isTempoValidationError(res)) {
        logger.warn(`ignoring ${field} change:`, res.reason);
        return null;
      }
      return res.value;
    };

    // Measure length changed: keep the counter inside the new measure.
    const setMeasure = (field: "timeSignature" | "subdivision", timeSignature: number, subdivision: number) => {
      const { bpm, tickCount } = get();
      if (accept(field, validateTickInterval(bpm, subdivision)) === null) return;
      set({ timeSignature, subdivision, tickCount: foldTickCount(tickCount, subdivision, timeSignature) });
      rearm();
    };

    const setBpm = (bpm: number) => {
      const next = accept("bpm", validateBpm(bpm));
      if (next === null) return;
      if (accept("bpm", validateTickInterval(next, get().subdivision)) === null) return;
      set({ bpm: next });
      rearm();
    };

    return {
      ...config.initial,
      isRunning: false,
      tickCount: 0,
      lastTick: null,

      setBpm,

      setTimeSignature: (timeSignature) => {
        const next = accept("timeSignature", validateCount("timeSignature", timeSignature));
        if (next === null) return;
        setMeasure("timeSignature", next, get().subdivision);
      },

      setSubdivision: (subdivision) => {
        const next = accept("subdivision", validateCount("subdivision", subdivision));
        if (next === null) return;
        setMeasure("subdivision", get().timeSignature, next);
      },

      shuffleBpm: () => setBpm(randomIntInclusive(config.shuffleRange, random)),

      start: () => {
        if (get().isRunning) return;
        set({ isRunning: true, tickCount: 0, lastTick: null });
        arm();
        logger.debug("started");
      },

      stop: () => {
        if (!get().isRunning) return;
        clock.cancel();
        set({ isRunning: false });
        logger.debug(`stopped at tick ${get().tickCount}`);
      },

      toggleRun: () => {
        const { isRunning, start, stop } = get();
        if (isRunning) {
          stop();
        } else {
          start();
        }
      },
    };
  });
}

export default createMetronomeStore;
