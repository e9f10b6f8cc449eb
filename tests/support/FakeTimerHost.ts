import type { CancelTimer, TimerHost } from "../../src/engine/clock/types";

type Pending = {
  at: number;
  seq: number;
  callback: () => void;
  cancelled: boolean;
};

/** Manual clock: callbacks only run inside advanceBy, in due-time order. */
export class FakeTimerHost implements TimerHost {
  private current = 0;

  private seq = 0;

  private pending: Pending[] = [];

  /** Extra delay added to every scheduled callback, to model a busy event loop. */
  latenessMs = 0;

  now = (): number => this.current;

  schedule = (callback: () => void, delayMs: number): CancelTimer => {
    const entry: Pending = { at: this.current + delayMs + this.latenessMs, seq: this.seq++, callback, cancelled: false };
    this.pending.push(entry);
    return () => {
      entry.cancelled = true;
    };
  };

  get liveTimers(): number {
    return this.pending.filter((p) => !p.cancelled).length;
  }

  advanceBy(ms: number) {
    const target = this.current + ms;
    for (;;) {
      this.pending = this.pending.filter((p) => !p.cancelled);
      const due = this.pending
        .filter((p) => p.at <= target)
        .sort((a, b) => a.at - b.at || a.seq - b.seq)[0];
      if (!due) break;
      this.pending = this.pending.filter((p) => p !== due);
      this.current = Math.max(this.current, due.at);
      due.callback();
    }
    this.current = target;
  }

  /** Runs a callback even though it was cancelled, as a host that already queued it would. */
  fireCancelled() {
    const stale = this.pending.filter((p) => p.cancelled);
    this.pending = this.pending.filter((p) => !p.cancelled);
    stale.forEach((p) => p.callback());
  }
}
