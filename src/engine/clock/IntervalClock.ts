import systemTimerHost from "./systemTimerHost";
import type { CancelTimer, ClockEvents, ClockTick, TimerHost } from "./types";

type IntervalClockOptions = {
  events?: ClockEvents;
  timers?: TimerHost;
};

/**
 * Single-slot recurring timer. Each firing is scheduled against an absolute due
 * time, so late callbacks do not push later ticks back.
 */
class IntervalClock {
  private intervalMs = 0;

  private cancelPending: CancelTimer | null = null;

  private nextTickAt: number | null = null;

  // Bumped on every cancel; callbacks from an older generation are dropped.
  private generation = 0;

  private events: ClockEvents;

  private timers: TimerHost;

  constructor({ events = {}, timers = systemTimerHost }: IntervalClockOptions = {}) {
    this.events = events;
    this.timers = timers;
  }

  get isArmed(): boolean {
    return this.nextTickAt !== null;
  }

  get currentIntervalMs(): number {
    return this.intervalMs;
  }

  /** Cancels any armed timer and arms a new one; the first tick is one interval away. */
  arm(intervalMs: number) {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`Clock interval must be a positive finite number of ms, got ${String(intervalMs)}`);
    }
    this.cancel();
    this.intervalMs = intervalMs;
    this.nextTickAt = this.timers.now() + intervalMs;
    this.scheduleNextTick();
  }

  cancel() {
    this.generation += 1;
    if (this.cancelPending) {
      this.cancelPending();
      this.cancelPending = null;
    }
    this.nextTickAt = null;
  }

  private scheduleNextTick() {
    if (this.nextTickAt === null) return;
    const generation = this.generation;
    const delay = Math.max(0, this.nextTickAt - this.timers.now());
    this.cancelPending = this.timers.schedule(() => this.tick(generation), delay);
  }

  private tick(generation: number) {
    if (generation !== this.generation || this.nextTickAt === null) return;
    this.cancelPending = null;

    const dueAtMs = this.nextTickAt;
    const info: ClockTick = {
      atMs: this.timers.now(),
      dueAtMs,
      intervalMs: this.intervalMs,
    };
    this.events.onTick?.(info);

    // onTick may have re-armed or cancelled us.
    if (generation !== this.generation) return;
    this.nextTickAt = dueAtMs + this.intervalMs;
    this.scheduleNextTick();
  }
}

export default IntervalClock;
