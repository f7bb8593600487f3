/**
 * Child process plumbing for the ffmpeg tools
 *
 * Decoders depend on the narrow ChildHandle shape instead of ChildProcess,
 * so a spawn function can be swapped for an in-process fake.
 */
import { spawn, type SpawnOptions } from 'node:child_process';
import type { Readable } from 'node:stream';
import { toBuffer } from '../../utils/streamUtils';

export interface ChildHandle {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => ChildHandle;

export const defaultSpawn: SpawnFunction = (command, args, options) =>
  spawn(command, args, options);

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be started or signalled */
  error?: Error;
}

/**
 * Settles once the child has exited and its stdio is closed
 * Never rejects: a spawn failure resolves with `error` set. Attach it right
 * after spawning so no event is missed.
 */
export function waitForClose(child: ChildHandle): Promise<ProcessExit> {
  return new Promise(resolve => {
    child.on('close', (code, signal) => resolve({ code, signal }));
    child.on('error', error => resolve({ code: null, signal: null, error }));
  });
}

/**
 * Keeps the first `limitBytes` written to a stream
 * The stream is drained to the end either way so the writer never blocks.
 */
export class OutputCapture {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  private truncatedFlag = false;

  constructor(stream: Readable | null, private readonly limitBytes: number) {
    stream?.on('data', (chunk: unknown) => this.append(toBuffer(chunk)));
  }

  get truncated(): boolean {
    return this.truncatedFlag;
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }

  private append(chunk: Buffer): void {
    const room = this.limitBytes - this.size;
    if (chunk.length > room) {
      this.truncatedFlag = true;
    }
    if (room <= 0) {
      return;
    }
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.chunks.push(kept);
    this.size += kept.length;
  }
}

export interface RunResult {
  stdout: string;
  stderr: string;
  code: number | null;
}

/**
 * Run a command to completion and collect its text output
 * A process that cannot be started resolves with a null code and the
 * spawn error as stderr.
 */
export async function run(
  command: string,
  args: readonly string[],
  spawnFn: SpawnFunction = defaultSpawn
): Promise<RunResult> {
  let child: ChildHandle;
  try {
    child = spawnFn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
  } catch (err) {
    return { stdout: '', stderr: err instanceof Error ? err.message : String(err), code: null };
  }

  const exit = waitForClose(child);
  let out = '';
  let err = '';
  child.stdout?.setEncoding('utf8');
  child.stderr?.setEncoding('utf8');
  child.stdout?.on('data', (d: unknown) => {
    out += String(d);
  });
  child.stderr?.on('data', (d: unknown) => {
    err += String(d);
  });

  const { code, error } = await exit;
  if (error) {
    return { stdout: '', stderr: error.message, code: null };
  }
  return { stdout: out, stderr: err, code };
}
