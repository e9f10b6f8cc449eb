export * from "./core/types";
export * from "./core/constants/tempoConfig";
export { resolveMetronomeConfig } from "./core/config/metronomeConfig";
export type { MetronomeConfig, MetronomeConfigOverrides } from "./core/config/metronomeConfig";
export { createConsoleLogger, silentLogger } from "./core/debug/logger";
export type { Logger } from "./core/debug/logger";
export { default as IntervalClock } from "./engine/clock/IntervalClock";
export { systemTimerHost } from "./engine/clock/systemTimerHost";
export type { CancelTimer, ClockEvents, ClockTick, TimerHost } from "./engine/clock/types";
export * from "./audio/SoundDispatcher";
export * from "./utils/rhythm/tempoMath";
export * from "./utils/rhythm/beatIndicators";
export * from "./store/metronome.store";
export { useMetronome } from "./store/useMetronome";
