import { Logger } from "./logger.js";

export interface Clock {
  /** Milliseconds since the unix epoch. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now()
};

export type TimerHandle = ReturnType<typeof setTimeout>;

export interface Timer {
  setTimeout(callback: () => void, ms: number): TimerHandle;
  clearTimeout(handle: TimerHandle): void;
}

export const systemTimer: Timer = {
  setTimeout: (callback, ms) => setTimeout(callback, ms),
  clearTimeout: (handle) => clearTimeout(handle)
};

/**
 * Runs `task` every `intervalMs`. The next run is only scheduled once the
 * previous one has settled, so runs never overlap.
 */
export class PeriodicTask {
  private readonly name: string;
  private readonly intervalMs: number;
  private readonly task: () => Promise<void>;
  private readonly log: Logger;
  private readonly timer: Timer;
  private handle?: TimerHandle;
  private running = false;

  constructor(name: string, intervalMs: number, task: () => Promise<void>, log: Logger, timer: Timer = systemTimer) {
    this.name = name;
    this.intervalMs = intervalMs;
    this.task = task;
    this.log = log;
    this.timer = timer;
  }

  start(options: { runImmediately?: boolean } = {}): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.schedule(options.runImmediately ? 0 : this.intervalMs);
  }

  stop(): void {
    this.running = false;
    if (this.handle) {
      this.timer.clearTimeout(this.handle);
      this.handle = undefined;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  private schedule(delayMs: number): void {
    this.handle = this.timer.setTimeout(() => void this.run(), delayMs);
  }

  private async run(): Promise<void> {
    this.handle = undefined;
    try {
      await this.task();
    } catch (error) {
      this.log.error({ err: error, task: this.name }, "Periodic task failed");
    }
    if (this.running) {
      this.schedule(this.intervalMs);
    }
  }
}
