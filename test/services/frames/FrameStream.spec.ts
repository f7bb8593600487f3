/**
 * Tests for FrameStream
 */
import { describe, it, expect } from 'vitest';
import { FrameStream } from '../../../src/services/frames/FrameStream';
import { createDecodeContext, getCurrentContext } from '../../../src/utils/decodeContext';

/**
 * A numbered source that records how far it got and whether it cleaned up
 */
function counting(limit: number) {
  const state = { produced: 0, cleanedUp: false };
  async function* source(): AsyncGenerator<number, void, undefined> {
    try {
      for (let i = 0; i < limit; i++) {
        state.produced++;
        yield i;
      }
    } finally {
      state.cleanedUp = true;
    }
  }
  return { state, stream: new FrameStream(source()) };
}

describe('FrameStream', () => {
  it('should produce nothing until pulled', async () => {
    const { state, stream } = counting(3);

    expect(state.produced).toBe(0);
    await stream.next();
    expect(state.produced).toBe(1);
  });

  it('should drain into an array and clean up', async () => {
    const { state, stream } = counting(3);

    await expect(stream.toArray()).resolves.toEqual([0, 1, 2]);
    expect(state.cleanedUp).toBe(true);
    expect(stream.closed).toBe(true);
  });

  it('should run the cleanup when closed early', async () => {
    const { state, stream } = counting(5);

    await stream.next();
    await stream.close();

    expect(state.cleanedUp).toBe(true);
    await expect(stream.next()).resolves.toEqual({ done: true, value: undefined });
  });

  it('should allow close() more than once', async () => {
    const { stream } = counting(2);

    await stream.next();
    await Promise.all([stream.close(), stream.close()]);
    await expect(stream.close()).resolves.toBeUndefined();
  });

  it('should run the cancel hook once so a waiting pull can end', async () => {
    const controller = new AbortController();
    let cancels = 0;
    async function* stalled(): AsyncGenerator<number, void, undefined> {
      yield 0;
      await new Promise<void>(resolve => controller.signal.addEventListener('abort', () => resolve()));
    }
    const stream = new FrameStream(stalled(), {
      onCancel: () => {
        cancels++;
        controller.abort();
      }
    });

    await stream.next();
    const waiting = stream.next();
    await Promise.all([stream.close(), stream.close()]);

    await expect(waiting).resolves.toEqual({ done: true, value: undefined });
    expect(cancels).toBe(1);
  });

  it('should close when a for-await loop breaks', async () => {
    const { state, stream } = counting(5);

    for await (const value of stream) {
      if (value === 1) break;
    }

    expect(state.produced).toBe(2);
    expect(state.cleanedUp).toBe(true);
  });

  it('should stop after a producer error', async () => {
    async function* failing(): AsyncGenerator<number, void, undefined> {
      yield 1;
      throw new Error('broken');
    }
    const stream = new FrameStream(failing());

    await expect(stream.next()).resolves.toEqual({ done: false, value: 1 });
    await expect(stream.next()).rejects.toThrow('broken');
    await expect(stream.next()).resolves.toEqual({ done: true, value: undefined });
  });

  describe('take', () => {
    it('should hand out at most n items and never pull the next one', async () => {
      const { state, stream } = counting(10);

      await expect(stream.take(3).toArray()).resolves.toEqual([0, 1, 2]);
      expect(state.produced).toBe(3);
      expect(state.cleanedUp).toBe(true);
    });

    it('should pass everything through when the source is shorter', async () => {
      const { stream } = counting(2);

      await expect(stream.take(5).toArray()).resolves.toEqual([0, 1]);
    });

    it('should close the source without pulling for n = 0', async () => {
      const { state, stream } = counting(2);

      await expect(stream.take(0).toArray()).resolves.toEqual([]);
      expect(state.produced).toBe(0);
      expect(stream.closed).toBe(true);
    });
  });

  it('should make its decode context current while producing', async () => {
    const context = createDecodeContext(42, 'op-1');
    async function* source(): AsyncGenerator<number | undefined, void, undefined> {
      yield getCurrentContext()?.postId;
    }
    const stream = new FrameStream(source(), { context });

    expect(stream.context).toBe(context);
    await expect(stream.toArray()).resolves.toEqual([42]);
  });
});
