/**
 * Keyframe extraction from video with ffmpeg
 *
 * The decoder pipes the opened file into ffmpeg, has it keep one keyframe
 * per interval, and parses the P6 records it writes to stdout. Frames are
 * produced on demand: stdout is only read when the consumer pulls, so an
 * idle consumer stalls ffmpeg through the pipe.
 */
import type { SpawnOptions } from 'node:child_process';
import { DecodeError, type ErrorContext } from '../../errors';
import { MediaType, type DecodedFrame, type MediaDecoder, type MediaSource } from '../../types/media';
import type { Limits } from '../../config/limits';
import { createCategoryLogger } from '../../utils/logger';
import { getCurrentContext, getPerformanceMetrics } from '../../utils/decodeContext';
import { getErrorMessage } from '../../utils/errorHandlingUtils';
import { toBgrFrame } from '../../utils/pixelUtils';
import { TimeoutError, withTimeout } from '../../utils/streamUtils';
import { FrameStream } from '../frames/FrameStream';
import {
  defaultSpawn,
  OutputCapture,
  waitForClose,
  type ChildHandle,
  type ProcessExit,
  type SpawnFunction
} from '../ffmpeg/process';
import { createDurationProbe, type DurationProbe, type ProbeResult } from '../ffmpeg/probe';
import { ByteReader, PpmStreamReader, PPM_CHANNELS, type PpmRecord } from './ppmStreamReader';

const logger = createCategoryLogger('VideoDecoder');

export const DEFAULT_EXIT_TIMEOUT_MS = 1000;
export const DEFAULT_STDERR_LIMIT_BYTES = 64 * 1024;

export interface VideoDecoderOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  /** Bound on the wait for ffmpeg to exit after stdout ended */
  exitTimeoutMs?: number;
  stderrLimitBytes?: number;
  spawn?: SpawnFunction;
  probe?: DurationProbe;
}

/**
 * ffmpeg arguments for keyframe-only PPM output on stdout
 */
export function buildFfmpegArgs(keyframeInterval: number): string[] {
  return [
    '-hide_banner',
    '-loglevel', 'error',
    '-threads', '1',
    '-skip_frame', 'nokey',
    '-vsync', '0',
    '-i', 'pipe:0',
    '-vf', `select=isnan(prev_selected_t)+gte(t-prev_selected_t\\,${keyframeInterval})`,
    '-vcodec', 'ppm',
    '-f', 'rawvideo',
    'pipe:1'
  ];
}

/**
 * One running ffmpeg process and the readers attached to it
 */
class DecodeSession {
  readonly records: PpmStreamReader;
  readonly stderr: OutputCapture;
  readonly exited: Promise<ProcessExit>;
  private readonly bytes: ByteReader;

  constructor(private readonly child: ChildHandle, stderrLimitBytes: number) {
    this.exited = waitForClose(child);
    this.stderr = new OutputCapture(child.stderr, stderrLimitBytes);
    if (!child.stdout) {
      throw DecodeError.protocolViolation('ffmpeg was started without an output pipe');
    }
    this.bytes = ByteReader.fromStream(child.stdout);
    this.records = new PpmStreamReader(this.bytes);
  }

  get running(): boolean {
    return this.child.exitCode === null && this.child.signalCode === null;
  }

  kill(): void {
    if (this.running) {
      this.child.kill('SIGKILL');
    }
  }

  /**
   * Abandon the session from outside the generator
   * Destroying stdout settles a read that is waiting for ffmpeg.
   */
  cancel(): void {
    this.kill();
    this.child.stdout?.destroy();
  }

  /**
   * Stop the process if it still runs and release its pipes
   */
  async dispose(closeTimeoutMs: number): Promise<void> {
    const wasRunning = this.running;
    this.kill();
    await this.bytes.cancel();
    this.child.stderr?.destroy();

    if (!wasRunning) {
      return;
    }
    try {
      await withTimeout(this.exited, closeTimeoutMs, 'ffmpeg did not close after SIGKILL');
    } catch (err) {
      logger.warn('ffmpeg did not close after being killed', { error: getErrorMessage(err) });
    }
  }
}

export class VideoFrameStreamDecoder implements MediaDecoder {
  private readonly ffmpegPath: string;
  private readonly exitTimeoutMs: number;
  private readonly stderrLimitBytes: number;
  private readonly spawn: SpawnFunction;
  private readonly probe: DurationProbe;

  constructor(options: VideoDecoderOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.exitTimeoutMs = options.exitTimeoutMs ?? DEFAULT_EXIT_TIMEOUT_MS;
    this.stderrLimitBytes = options.stderrLimitBytes ?? DEFAULT_STDERR_LIMIT_BYTES;
    this.spawn = options.spawn ?? defaultSpawn;
    this.probe = options.probe ?? createDurationProbe({
      ffprobePath: options.ffprobePath,
      spawn: this.spawn
    });
  }

  /**
   * Lazily decode the keyframes of an opened video
   * Nothing is checked or spawned until the first frame is pulled. Closing
   * the stream kills ffmpeg even while a pull is waiting on it.
   */
  decode(source: MediaSource, limits: Limits): FrameStream<DecodedFrame> {
    const controller = new AbortController();
    return new FrameStream(this.frames(source, limits, controller.signal), {
      context: getCurrentContext(),
      onCancel: () => controller.abort()
    });
  }

  decodeFrames(source: MediaSource, limits: Limits): FrameStream<DecodedFrame> {
    return this.decode(source, limits);
  }

  private async *frames(
    source: MediaSource,
    limits: Limits,
    signal: AbortSignal
  ): AsyncGenerator<DecodedFrame, void, undefined> {
    const context = this.errorContext(source);

    try {
      await this.checkUploadSize(source, limits, context);
      await this.checkDuration(source, limits, context);
      if (signal.aborted) {
        return;
      }
      yield* this.extract(source, limits, context, signal);
    } catch (err) {
      if (signal.aborted) {
        logger.debug('Keyframe extraction cancelled', { path: source.path, reason: getErrorMessage(err) });
        return;
      }
      logger.errorWithContext('Keyframe extraction failed', err, { path: source.path });
      throw err;
    }
  }

  private async *extract(
    source: MediaSource,
    limits: Limits,
    context: ErrorContext,
    signal: AbortSignal
  ): AsyncGenerator<DecodedFrame, void, undefined> {
    const session = this.startSession(source, limits, context);
    const onAbort = () => session.cancel();
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      for (;;) {
        const record = await this.nextRecord(session, context);
        if (record === null) {
          break;
        }
        yield toBgrFrame(record.data, record.width, record.height, PPM_CHANNELS, {
          index: session.records.recordsRead - 1,
          isKeyframe: true
        });
      }
      // stdout ends early when ffmpeg was killed on close
      if (signal.aborted) {
        return;
      }

      await this.finish(session, context);
      const decodeContext = getCurrentContext();
      logger.debug('Keyframe extraction finished', {
        path: source.path,
        frames: session.records.recordsRead,
        stderrTruncated: session.stderr.truncated,
        ...(decodeContext ? { timing: getPerformanceMetrics(decodeContext) } : {})
      });
    } finally {
      signal.removeEventListener('abort', onAbort);
      await session.dispose(this.exitTimeoutMs);
    }
  }

  private async checkUploadSize(
    source: MediaSource,
    limits: Limits,
    context: ErrorContext
  ): Promise<void> {
    const { size } = await source.handle.stat();
    if (size > limits.maxUploadSizeBytes) {
      throw DecodeError.uploadSizeExceeded(size, limits.maxUploadSizeBytes, context);
    }
  }

  /**
   * Duration limiting is best effort: a failed probe is logged and decoding goes on
   */
  private async checkDuration(
    source: MediaSource,
    limits: Limits,
    context: ErrorContext
  ): Promise<void> {
    let result: ProbeResult;
    try {
      result = await this.probe(source.path);
    } catch (err) {
      logger.warn('Failed to get video duration', { path: source.path, reason: getErrorMessage(err) });
      return;
    }

    if (!result.ok) {
      logger.warn('Failed to get video duration', { path: source.path, reason: result.reason });
      return;
    }
    if (result.duration > limits.maxDuration) {
      throw DecodeError.durationExceeded(result.duration, limits.maxDuration, context);
    }
  }

  private startSession(source: MediaSource, limits: Limits, context: ErrorContext): DecodeSession {
    const args = buildFfmpegArgs(limits.keyframeInterval);
    const options: SpawnOptions = {
      stdio: [source.handle.fd, 'pipe', 'pipe']
    };

    let child: ChildHandle;
    try {
      child = this.spawn(this.ffmpegPath, args, options);
    } catch (err) {
      throw DecodeError.processFailed(null, null, getErrorMessage(err), context, err);
    }

    logger.info('Started keyframe extraction', {
      path: source.path,
      command: this.ffmpegPath,
      keyframeInterval: limits.keyframeInterval
    });

    try {
      return new DecodeSession(child, this.stderrLimitBytes);
    } catch (err) {
      child.kill('SIGKILL');
      throw err;
    }
  }

  /**
   * Parse the next record, attaching ffmpeg's diagnostics to a protocol failure
   */
  private async nextRecord(
    session: DecodeSession,
    context: ErrorContext
  ): Promise<PpmRecord | null> {
    try {
      return await session.records.next();
    } catch (err) {
      if (err instanceof DecodeError) {
        const stderr = session.stderr.text();
        err.context = { ...context, ...err.context, ...(stderr ? { stderr } : {}) };
      }
      throw err;
    }
  }

  /**
   * Wait for ffmpeg to exit once stdout is drained and check how it ended
   * Not exiting within the bound is fatal: the process is killed, no retry.
   */
  private async finish(session: DecodeSession, context: ErrorContext): Promise<void> {
    let exit: ProcessExit;
    try {
      exit = await withTimeout(
        session.exited,
        this.exitTimeoutMs,
        'ffmpeg did not exit after its output ended'
      );
    } catch (err) {
      if (err instanceof TimeoutError) {
        session.kill();
        throw DecodeError.exitTimeout(this.exitTimeoutMs, {
          ...context,
          stderr: session.stderr.text()
        });
      }
      throw err;
    }

    const stderr = session.stderr.text();
    if (exit.error) {
      throw DecodeError.processFailed(null, null, exit.error.message, context, exit.error);
    }
    if (exit.code !== 0) {
      throw DecodeError.processFailed(exit.code, exit.signal, stderr, context);
    }
  }

  private errorContext(source: MediaSource): ErrorContext {
    const postId = getCurrentContext()?.postId;
    return {
      mediaType: MediaType.VIDEO,
      path: source.path,
      ...(postId !== undefined ? { postId } : {})
    };
  }
}
