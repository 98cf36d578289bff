export interface ScheduledTimer {
  cancel(): void;
}

/** Clock and one-shot timers, injectable so reconnect and sampling can be driven by tests. */
export interface Scheduler {
  nowMs(): number;
  setTimer(callback: () => void, delayMs: number): ScheduledTimer;
}

export const systemScheduler: Scheduler = {
  nowMs: () => Date.now(),
  setTimer: (callback, delayMs) => {
    const handle = setTimeout(callback, Math.max(0, delayMs));
    handle.unref();
    return {
      cancel: () => {
        clearTimeout(handle);
      }
    };
  }
};
