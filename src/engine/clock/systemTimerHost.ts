import type { TimerHost } from "./types";

export const systemTimerHost: TimerHost = {
  now: () => Date.now(),
  schedule: (callback, delayMs) => {
    const timeoutId = setTimeout(callback, delayMs);
    return () => clearTimeout(timeoutId);
  },
};

export default systemTimerHost;
