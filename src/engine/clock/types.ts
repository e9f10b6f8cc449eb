export type CancelTimer = () => void;

/** Time source and one-shot scheduling used by the clock. */
export type TimerHost = {
  now: () => number;
  schedule: (callback: () => void, delayMs: number) => CancelTimer;
};

export type ClockTick = {
  /** When the host actually ran the callback. */
  atMs: number;
  /** When the tick was due. */
  dueAtMs: number;
  intervalMs: number;
};

export type ClockEvents = {
  onTick?: (tick: ClockTick) => void;
};
