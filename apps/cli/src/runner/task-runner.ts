/**
 * Bounded worker pool
 * Fans independent per-object operations out over a fixed number of async
 * workers. Every task has its own timeout and abort signal; a failed task
 * is recorded and logged, never fatal to the batch.
 */

import type { RunSummary, TaskFailure, TaskResult } from '@sqconf/types';
import { createLogger, Logger } from '../logger';
import { SqconfError, TaskTimeoutError, TransportError, errorMessage } from '../platform/errors';
import { AsyncQueue } from '../writer/async-queue';

export type TaskOperation<T, R> = (item: T, signal: AbortSignal) => Promise<R>;

export interface TaskRunnerOptions {
  /** Number of workers (default: 8) */
  concurrency?: number;
  /** Per task timeout in milliseconds (default: 30000) */
  taskTimeoutMs?: number;
  /** Name of the batch in progress messages */
  label?: string;
  logger?: Logger;
}

export const DEFAULT_CONCURRENCY = 8;
export const DEFAULT_TASK_TIMEOUT_MS = 30_000;

/**
 * Progress is logged every max(10, ceil(total / 10)) completed items
 */
export function progressStep(total: number): number {
  return Math.max(10, Math.ceil(total / 10));
}

/**
 * Map a thrown value to a failure outcome
 */
export function classifyFailure(error: unknown): TaskFailure {
  if (error instanceof TaskTimeoutError) {
    return { kind: 'TIMEOUT', timeoutMs: error.timeoutMs, message: error.message };
  }
  if (error instanceof TransportError) {
    return { kind: 'TRANSPORT_ERROR', message: error.message };
  }
  if (error instanceof SqconfError) {
    return { kind: 'DOMAIN_ERROR', code: error.code, message: error.message };
  }
  return { kind: 'UNEXPECTED_ERROR', message: errorMessage(error) };
}

export class TaskRunner {
  readonly concurrency: number;
  readonly taskTimeoutMs: number;
  private readonly label: string;
  private readonly log: Logger;

  constructor(options: TaskRunnerOptions = {}) {
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
    this.taskTimeoutMs = options.taskTimeoutMs ?? DEFAULT_TASK_TIMEOUT_MS;
    this.label = options.label ?? 'tasks';
    this.log = options.logger ?? createLogger({ component: 'runner' });
  }

  /** Same pool settings, different batch name */
  withLabel(label: string): TaskRunner {
    return new TaskRunner({
      concurrency: this.concurrency,
      taskTimeoutMs: this.taskTimeoutMs,
      label,
      logger: this.log,
    });
  }

  /**
   * Run `operation` over every item, yielding results in completion order
   */
  async *stream<T, R>(
    items: readonly T[],
    operation: TaskOperation<T, R>,
    describe: (item: T) => string = String
  ): AsyncGenerator<TaskResult<T, R>> {
    const total = items.length;
    if (total === 0) return;

    // Sized to hold every result, workers never wait on it
    const results = new AsyncQueue<TaskResult<T, R>>(total);
    const step = progressStep(total);
    let cursor = 0;
    let completed = 0;
    let failed = 0;

    const worker = async (): Promise<void> => {
      while (cursor < total) {
        const index = cursor++;
        const result = await this.execute(items[index], index, operation);
        completed++;
        if (result.outcome.status === 'failure') {
          failed++;
          this.log.warn(`${this.label}: ${describe(result.item)} failed`, {
            kind: result.outcome.failure.kind,
            error: result.outcome.failure.message,
          });
        }
        if (completed % step === 0 || completed === total) {
          this.log.info(`${this.label}: ${completed}/${total} processed`);
        }
        await results.push(result);
      }
    };

    const workers = Promise.all(
      Array.from({ length: Math.min(this.concurrency, total) }, () => worker())
    );

    try {
      for (let delivered = 0; delivered < total; delivered++) {
        yield await results.pop();
      }
    } finally {
      await workers;
    }

    if (failed > 0) {
      this.log.warn(`${this.label}: ${failed}/${total} failed`);
    }
  }

  /**
   * Run every item to completion and aggregate the outcomes
   */
  async run<T, R>(
    items: readonly T[],
    operation: TaskOperation<T, R>,
    describe?: (item: T) => string
  ): Promise<RunSummary<T, R>> {
    const summary: RunSummary<T, R> = { results: [], succeeded: 0, failed: 0 };
    for await (const result of this.stream(items, operation, describe)) {
      summary.results.push(result);
      if (result.outcome.status === 'success') {
        summary.succeeded++;
      } else {
        summary.failed++;
      }
    }
    return summary;
  }

  private async execute<T, R>(
    item: T,
    index: number,
    operation: TaskOperation<T, R>
  ): Promise<TaskResult<T, R>> {
    const started = Date.now();
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TaskTimeoutError(this.taskTimeoutMs, `Task timed out after ${this.taskTimeoutMs}ms`));
      }, this.taskTimeoutMs);
    });

    try {
      const task = Promise.resolve().then(() => operation(item, controller.signal));
      const value = await Promise.race([task, timeout]);
      return { item, index, outcome: { status: 'success', value }, durationMs: Date.now() - started };
    } catch (error) {
      return {
        item,
        index,
        outcome: { status: 'failure', failure: classifyFailure(error) },
        durationMs: Date.now() - started,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
