/**
 * Media frame decoder
 *
 * Decodes the stored image or video of a post into a lazy stream of BGR
 * frames for feature extraction. Wiring is explicit: build a config from the
 * environment, then a resolver from the config.
 *
 * @example
 * const config = getEnvironmentConfig();
 * configureLogging(config);
 * const resolver = await createMediaResolver(config);
 * for await (const frame of resolver.getFrames(post, config.limits).take(config.limits.maxKeyframes)) {
 *   ...
 * }
 */
import { stat } from 'node:fs/promises';
import { getEnvironmentConfig, type EnvironmentConfig, type FfmpegConfig } from './config/environmentConfig';
import { LoggingConfigurationManager } from './config/LoggingConfigurationManager';
import { ConfigurationError } from './errors';
import { ImageDecoder } from './services/decoders/imageDecoder';
import { VideoFrameStreamDecoder } from './services/decoders/videoDecoder';
import { createDurationProbe } from './services/ffmpeg/probe';
import { defaultSpawn, type SpawnFunction } from './services/ffmpeg/process';
import { MediaResolver } from './services/media/mediaResolver';
import { MediaType, type MediaDecoder } from './types/media';
import { createCategoryLogger, updatePinoLoggerConfig } from './utils/logger';
import { isSystemError } from './utils/errorHandlingUtils';

const logger = createCategoryLogger('Bootstrap');

/**
 * Apply the logging section of an environment config
 */
export function configureLogging(config: EnvironmentConfig): void {
  LoggingConfigurationManager.getInstance().updateConfig({
    level: config.logging.level,
    pretty: config.logging.pretty,
    enabledComponents: config.logging.enabledComponents,
    disabledComponents: config.logging.disabledComponents,
    sampleRate: config.logging.sampleRate,
    base: { service: 'media-decoder', env: config.mode }
  });
  updatePinoLoggerConfig();
}

/**
 * The decoder registry for every supported media type
 */
export function createDecoders(
  ffmpeg: FfmpegConfig,
  spawn: SpawnFunction = defaultSpawn
): Map<MediaType, MediaDecoder> {
  return new Map<MediaType, MediaDecoder>([
    [MediaType.IMAGE, new ImageDecoder()],
    [
      MediaType.VIDEO,
      new VideoFrameStreamDecoder({
        ffmpegPath: ffmpeg.ffmpegPath,
        exitTimeoutMs: ffmpeg.exitTimeoutMs,
        stderrLimitBytes: ffmpeg.stderrLimitBytes,
        spawn,
        probe: createDurationProbe({ ffprobePath: ffmpeg.ffprobePath, spawn })
      })
    ]
  ]);
}

/**
 * Build a resolver over the configured media root
 * @throws ConfigurationError when the media root is not an existing directory
 */
export async function createMediaResolver(
  config: EnvironmentConfig = getEnvironmentConfig(),
  decoders: ReadonlyMap<MediaType, MediaDecoder> = createDecoders(config.ffmpeg)
): Promise<MediaResolver> {
  if (!config.mediaPath) {
    throw ConfigurationError.notADirectory('MEDIA_PATH', config.mediaPath);
  }

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(config.mediaPath)).isDirectory();
  } catch (err) {
    if (!isSystemError(err)) {
      throw err;
    }
    isDirectory = false;
  }
  if (!isDirectory) {
    throw ConfigurationError.notADirectory('MEDIA_PATH', config.mediaPath);
  }

  logger.info('Media resolver ready', {
    mediaRoot: config.mediaPath,
    types: [...decoders.keys()]
  });
  return new MediaResolver({ mediaRoot: config.mediaPath, decoders });
}

export * from './errors';
export { createLimits, DEFAULT_LIMITS, type Limits, type LimitsInput } from './config/limits';
export {
  getEnvironmentConfig,
  type EnvironmentConfig,
  type EnvVariables,
  type FfmpegConfig
} from './config/environmentConfig';
export { MediaType, type DecodedFrame, type MediaDecoder, type MediaSource, type Post } from './types/media';
export { FrameStream } from './services/frames/FrameStream';
export { toFrameInfo, batchFrames, type FrameInfo } from './services/frames/frameInfo';
export { ImageDecoder } from './services/decoders/imageDecoder';
export { VideoFrameStreamDecoder, type VideoDecoderOptions } from './services/decoders/videoDecoder';
export { MediaResolver, type MediaResolverOptions } from './services/media/mediaResolver';
export type { SpawnFunction, ChildHandle } from './services/ffmpeg/process';
export { createDurationProbe, probeDuration, type ProbeResult } from './services/ffmpeg/probe';
