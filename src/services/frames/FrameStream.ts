/**
 * Lazy, closable sequence of decoded frames
 *
 * Wraps an async generator that owns the decode resources. The generator
 * body does not start until the first pull, and its `finally` blocks run
 * whenever the stream stops: exhaustion, a thrown error, or close() from
 * the consumer. A `for await` loop that breaks early closes the stream.
 *
 * A stream is single-use. Decoding the same media again takes a new one.
 */
import { type DecodeContext, runWithDecodeContext } from '../../utils/decodeContext';

export interface FrameStreamOptions {
  /** Decode context made current while the producer runs */
  context?: DecodeContext;
  /**
   * Called by close() before the producer is asked to return
   * A pull in flight holds the generator, so this is how the producer
   * learns to abandon it.
   */
  onCancel?: () => void;
}

export class FrameStream<T> implements AsyncIterableIterator<T> {
  private finished = false;
  private closing: Promise<void> | null = null;
  private cancelled = false;

  constructor(
    private readonly source: AsyncGenerator<T, void, undefined>,
    private readonly options: FrameStreamOptions = {}
  ) {}

  get context(): DecodeContext | undefined {
    return this.options.context;
  }

  get closed(): boolean {
    return this.finished;
  }

  async next(): Promise<IteratorResult<T, void>> {
    if (this.finished) {
      return { done: true, value: undefined };
    }

    try {
      const result = await this.run(() => this.source.next());
      if (result.done) {
        this.finished = true;
        return { done: true, value: undefined };
      }
      return result;
    } catch (err) {
      this.finished = true;
      throw err;
    }
  }

  async return(): Promise<IteratorResult<T, void>> {
    await this.close();
    return { done: true, value: undefined };
  }

  /**
   * Stop the stream and release whatever the producer holds
   * Safe to call any number of times.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.finished = true;
      this.cancel();
      this.closing = this.run(() => this.source.return(undefined)).then(() => undefined);
    }
    return this.closing;
  }

  /**
   * Tell the producer to abandon its work without waiting for it
   * close() does this too; wrappers use it to reach a nested stream.
   */
  cancel(): void {
    if (!this.cancelled) {
      this.cancelled = true;
      this.options.onCancel?.();
    }
  }

  [Symbol.asyncIterator](): FrameStream<T> {
    return this;
  }

  /**
   * A stream of at most `count` items
   * The source is closed as soon as the last item was handed out, so no
   * further item is ever produced.
   */
  take(count: number): FrameStream<T> {
    const source = this;

    async function* limited(): AsyncGenerator<T, void, undefined> {
      try {
        if (count <= 0) {
          return;
        }
        let taken = 0;
        for await (const item of source) {
          yield item;
          taken++;
          if (taken >= count) {
            return;
          }
        }
      } finally {
        await source.close();
      }
    }

    return new FrameStream(limited(), {
      context: this.options.context,
      onCancel: () => source.cancel()
    });
  }

  /**
   * Drain the stream into an array
   */
  async toArray(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }

  private run<R>(fn: () => R): R {
    const { context } = this.options;
    return context ? runWithDecodeContext(context, fn) : fn();
  }
}
