/**
 * Streaming result writer
 * One consumer drains a bounded queue of record batches and serializes them
 * to the sink as they arrive. Producers signal completion by submitting
 * END_OF_STREAM exactly once.
 */

import type { Writable } from 'stream';
import { createLogger, Logger } from '../logger';
import { OutputError, WriterStateError, errorMessage } from '../platform/errors';
import { AsyncQueue } from './async-queue';
import { RecordEncoder } from './encoders';

export const END_OF_STREAM: unique symbol = Symbol('END_OF_STREAM');

export type WriterInput<T> = readonly T[] | typeof END_OF_STREAM;

export const DEFAULT_QUEUE_CAPACITY = 64;

export interface ResultWriterOptions<T> {
  encoder: RecordEncoder<T>;
  /** Records rejected by the filter are not written */
  filter?: (record: T) => boolean;
  /** Maximum number of queued batches (default: 64) */
  capacity?: number;
  /** End the sink once the footer is written (default: true) */
  closeSink?: boolean;
  logger?: Logger;
}

export function writeChunk(sink: Writable, chunk: string): Promise<void> {
  if (chunk === '') return Promise.resolve();
  return new Promise((resolve, reject) => {
    sink.write(chunk, (error) => (error ? reject(error) : resolve()));
  });
}

export function endSink(sink: Writable): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    sink.once('error', onError);
    sink.end(() => {
      sink.off('error', onError);
      resolve();
    });
  });
}

export class ResultWriter<T> {
  private queue?: AsyncQueue<WriterInput<T>>;
  private completion?: Promise<number>;
  private ended = false;

  /**
   * Launch the consumer. A writer is started once.
   */
  start(sink: Writable, options: ResultWriterOptions<T>): void {
    if (this.queue) {
      throw new WriterStateError('Writer already started');
    }
    const queue = new AsyncQueue<WriterInput<T>>(options.capacity ?? DEFAULT_QUEUE_CAPACITY);
    this.queue = queue;
    this.completion = this.consume(sink, queue, options);
    // Rejection is reported through finished()
    this.completion.catch((error: unknown) =>
      (options.logger ?? createLogger({ component: 'writer' })).debug('Writer stopped', {
        error: errorMessage(error),
      })
    );
  }

  /**
   * Queue one batch, waiting while the queue is full
   */
  async submit(input: WriterInput<T>): Promise<void> {
    if (!this.queue) {
      throw new WriterStateError('Writer not started');
    }
    if (this.ended) {
      throw new WriterStateError(
        input === END_OF_STREAM ? 'End of stream already submitted' : 'Cannot submit after end of stream'
      );
    }
    if (input === END_OF_STREAM) {
      this.ended = true;
    } else if (input.length === 0) {
      return;
    }
    await this.queue.push(input);
  }

  /**
   * Resolves with the number of records written once the sentinel has been
   * processed, rejects with OutputError when the sink failed
   */
  finished(): Promise<number> {
    if (!this.completion) {
      return Promise.reject(new WriterStateError('Writer not started'));
    }
    return this.completion;
  }

  private async consume(
    sink: Writable,
    queue: AsyncQueue<WriterInput<T>>,
    options: ResultWriterOptions<T>
  ): Promise<number> {
    const { encoder, filter } = options;
    let written = 0;
    try {
      await writeChunk(sink, encoder.header());
      for (;;) {
        const batch = await queue.pop();
        if (batch === END_OF_STREAM) break;
        for (const record of batch) {
          if (filter && !filter(record)) continue;
          await writeChunk(sink, encoder.encode(record, written));
          written++;
        }
      }
      await writeChunk(sink, encoder.footer(written));
      if (options.closeSink ?? true) {
        await endSink(sink);
      }
      return written;
    } catch (error) {
      // Producers must not stay blocked on a dead consumer
      queue.discard();
      throw new OutputError(`Failed to write output: ${errorMessage(error)}`, { cause: error });
    }
  }
}
