import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { TaskTimeoutError } from './types';

export interface WebhookTaskRunnerOptions {
  /**
   * Per-task deadline. Defaults to 2 minutes.
   */
  timeoutMs?: number;
}

interface RunningTask {
  id: string;
  description: string;
  startedAt: number;
  controller: AbortController;
  done: Promise<void>;
}

/**
 * Supervises detached webhook work.
 *
 * Each submitted task gets its own AbortController and deadline, runs apart
 * from the request that submitted it, and is tracked until it settles so
 * shutdown can abort and await it. Failures are logged, never rethrown.
 */
export class WebhookTaskRunner {
  private readonly logger = new Logger(WebhookTaskRunner.name);
  private readonly tasks = new Map<string, RunningTask>();
  private readonly timeoutMs: number;
  private completed = 0;
  private failed = 0;
  private accepting = true;

  constructor(options: WebhookTaskRunnerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 2 * 60 * 1000;
  }

  /**
   * Start a task and return its id without waiting for it
   */
  submit(description: string, work: (signal: AbortSignal) => Promise<void>): string {
    if (!this.accepting) {
      throw new Error('Webhook task runner is shut down');
    }

    const id = uuidv4();
    const controller = new AbortController();

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TaskTimeoutError(id, this.timeoutMs));
      }, this.timeoutMs);
    });

    const done = Promise.race([
      Promise.resolve().then(() => work(controller.signal)),
      deadline,
    ])
      .then(() => {
        this.completed++;
      })
      .catch((error: unknown) => {
        this.failed++;
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Webhook task ${description} (${id}) failed: ${message}`);
      })
      .finally(() => {
        clearTimeout(timer);
        this.tasks.delete(id);
      });

    this.tasks.set(id, {
      id,
      description,
      startedAt: Date.now(),
      controller,
      done,
    });

    return id;
  }

  get inFlight(): number {
    return this.tasks.size;
  }

  /**
   * Wait for every task currently in flight
   */
  async drain(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks.values()].map((task) => task.done));
    }
  }

  /**
   * Stop accepting work, abort running tasks and wait for them to settle
   */
  async shutdown(): Promise<void> {
    this.accepting = false;
    for (const task of this.tasks.values()) {
      task.controller.abort();
    }
    await this.drain();
  }

  getStatistics(): { inFlight: number; completed: number; failed: number; timeoutMs: number } {
    return {
      inFlight: this.tasks.size,
      completed: this.completed,
      failed: this.failed,
      timeoutMs: this.timeoutMs,
    };
  }
}
