export type TimerHandle = {
  cancel(): void;
};

export interface Scheduler {
  now(): number;
  setTimeout(callback: () => void, delayMs: number): TimerHandle;
}

export const systemScheduler: Scheduler = {
  now: () => Date.now(),
  setTimeout(callback, delayMs) {
    const timeout = setTimeout(callback, delayMs);
    return {
      cancel: () => clearTimeout(timeout)
    };
  }
};
