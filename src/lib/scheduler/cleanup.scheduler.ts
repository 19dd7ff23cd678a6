/**
 * Cleanup Scheduler
 * Runs maintenance tasks on a fixed interval. The timer does not keep the
 * process alive, and a tick that arrives while a run is in progress is skipped.
 */

import { describeError } from '../errors/store.errors';

export interface CleanupTask {
  name: string;
  run: () => Promise<unknown>;
}

export interface CleanupTaskOutcome {
  name: string;
  ok: boolean;
  result?: unknown;
  error?: string;
}

export interface CleanupSchedulerOptions {
  intervalMs: number;
  tasks: CleanupTask[];
}

export class CleanupScheduler {
  private timer?: NodeJS.Timeout;
  private running: Promise<CleanupTaskOutcome[]> | null = null;

  constructor(private readonly options: CleanupSchedulerOptions) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new Error(`Cleanup interval must be a positive number of milliseconds, got ${options.intervalMs}`);
    }
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.options.intervalMs);
    this.timer.unref();
    console.log(`🧹 Cleanup scheduled every ${Math.round(this.options.intervalMs / 1000)}s`);
  }

  /**
   * Stop the timer and wait for a run in progress
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (this.running) {
      await this.running;
    }
  }

  /**
   * Run every task once. Resolves to null when a run is already in progress.
   * Task failures are logged and reported, never thrown.
   */
  async runOnce(): Promise<CleanupTaskOutcome[] | null> {
    if (this.running) {
      return null;
    }

    this.running = this.runTasks();
    try {
      return await this.running;
    } finally {
      this.running = null;
    }
  }

  private async runTasks(): Promise<CleanupTaskOutcome[]> {
    const outcomes: CleanupTaskOutcome[] = [];
    for (const task of this.options.tasks) {
      try {
        outcomes.push({ name: task.name, ok: true, result: await task.run() });
      } catch (error) {
        console.error(`Cleanup: ${task.name} failed:`, describeError(error));
        outcomes.push({ name: task.name, ok: false, error: describeError(error) });
      }
    }
    return outcomes;
  }
}
