import { existsSync } from 'node:fs';
import { logWarn } from '../../utils/logger';

export type FfmpegCommand = 'ffmpeg' | 'ffprobe';

const OVERRIDE_VARIABLES: Record<FfmpegCommand, string> = {
  ffmpeg: 'FFMPEG_PATH',
  ffprobe: 'FFPROBE_PATH',
};

/**
 * Find the binary to run for an ffmpeg tool
 * An explicit path from the environment wins when it exists; otherwise the
 * bare command name is returned and resolved through PATH at spawn time.
 */
export function resolveFfmpegCommand(
  cmd: FfmpegCommand,
  env: Record<string, string | undefined> = process.env
): string {
  const variable = OVERRIDE_VARIABLES[cmd];
  const override = env[variable]?.trim();
  if (override && existsSync(override)) return override;

  if (override) {
    logWarn('FfmpegBin', `${variable} points to a missing file, using ${cmd} from PATH`, {
      override,
    });
  }
  return cmd;
}
