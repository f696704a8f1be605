/**
 * Time source for everything that waits: the token bucket and the scheduler.
 * Injected so tests can drive time by hand.
 */

export interface TimerHandle {
  cancel(): void;
}

export interface Clock {
  now(): number;
  setTimer(callback: () => void, delayMs: number): TimerHandle;
  sleep(delayMs: number): Promise<void>;
}

// setTimeout overflows past a signed 32-bit delay and fires immediately
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const systemClock: Clock = {
  now: () => Date.now(),

  setTimer(callback: () => void, delayMs: number): TimerHandle {
    const timeout = setTimeout(callback, Math.min(Math.max(0, delayMs), MAX_TIMER_DELAY_MS));
    return { cancel: () => clearTimeout(timeout) };
  },

  sleep(delayMs: number): Promise<void> {
    return new Promise(resolve => {
      systemClock.setTimer(resolve, delayMs);
    });
  }
};
