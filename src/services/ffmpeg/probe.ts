/**
 * Container metadata probing with ffprobe
 */
import { run, defaultSpawn, type SpawnFunction } from './process';

export type ProbeResult =
  | { ok: true; duration: number }
  | { ok: false; reason: string };

export type DurationProbe = (absPath: string) => Promise<ProbeResult>;

export interface ProbeOptions {
  ffprobePath?: string;
  spawn?: SpawnFunction;
}

/**
 * Read the container duration in seconds
 * Failures are reported in the result, never thrown.
 */
export async function probeDuration(
  absPath: string,
  options: ProbeOptions = {}
): Promise<ProbeResult> {
  const args = [
    '-v',
    'error',
    '-show_entries',
    'format=duration',
    '-of',
    'default=noprint_wrappers=1:nokey=1',
    absPath,
  ];
  const res = await run(options.ffprobePath ?? 'ffprobe', args, options.spawn ?? defaultSpawn);
  if (res.code !== 0) {
    const detail = res.stderr.trim();
    return {
      ok: false,
      reason: `ffprobe exited with code ${res.code ?? 'null'}${detail ? `: ${detail}` : ''}`,
    };
  }

  const raw = res.stdout.trim();
  const duration = Number(raw);
  if (raw === '' || !Number.isFinite(duration)) {
    return { ok: false, reason: `ffprobe reported no usable duration (${raw || 'empty'})` };
  }
  return { ok: true, duration };
}

export function createDurationProbe(options: ProbeOptions = {}): DurationProbe {
  return absPath => probeDuration(absPath, options);
}
