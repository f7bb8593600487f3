/**
 * Environment configuration for the media decoder
 *
 * This module handles parsing environment variables into properly typed
 * configuration objects for the application.
 */
import { z } from 'zod';
import { createLimits, type Limits } from './limits';
import { LogLevelSchema, type LogLevel } from './LoggingConfigurationManager';
import { ConfigurationError } from '../errors';
import { resolveFfmpegCommand } from '../services/ffmpeg/ffmpegBin';

export const FfmpegSettingsSchema = z.object({
  exitTimeoutMs: z.number().int().positive().default(1000),
  stderrLimitBytes: z.number().int().positive().default(64 * 1024),
});

/**
 * Settings for the external transcoder
 */
export interface FfmpegConfig {
  ffmpegPath: string;
  ffprobePath: string;
  /** How long to wait for ffmpeg to exit once its output is drained */
  exitTimeoutMs: number;
  /** Cap on the diagnostics text kept from stderr */
  stderrLimitBytes: number;
}

/**
 * Application environment configuration
 */
export interface EnvironmentConfig {
  mode: string;
  mediaPath: string;
  limits: Limits;
  ffmpeg: FfmpegConfig;
  logging: {
    level: LogLevel;
    pretty: boolean;
    enabledComponents: string[];
    disabledComponents: string[];
    sampleRate: number;
  };
}

/**
 * Environment variables interface
 */
export interface EnvVariables {
  [key: string]: string | undefined;

  // Application Settings
  ENVIRONMENT?: string;
  MEDIA_PATH?: string;

  // Video limits
  VIDEO_KEYFRAME_INTERVAL?: string;
  VIDEO_MAX_KEYFRAMES?: string;
  VIDEO_MAX_DURATION?: string;
  VIDEO_FRAME_BATCH_SIZE?: string;
  VIDEO_MAX_UPLOAD_SIZE_MB?: string;

  // Matching parameters
  VIDEO_MIN_MATCHES?: string;
  VIDEO_SIMILARITY_THRESHOLD?: string;

  // Transcoder
  FFMPEG_PATH?: string;
  FFPROBE_PATH?: string;
  FFMPEG_EXIT_TIMEOUT_MS?: string;
  FFMPEG_STDERR_LIMIT_BYTES?: string;

  // Logging Configuration
  LOG_LEVEL?: string;
  LOG_PRETTY?: string;
  LOG_ENABLED_COMPONENTS?: string;
  LOG_DISABLED_COMPONENTS?: string;
  LOG_SAMPLE_RATE?: string;
}

/**
 * Helper function to parse boolean from environment variable
 */
export function parseBoolean(value?: string, defaultValue = false): boolean {
  if (value === undefined || value.trim() === '') return defaultValue;
  const normalized = value.trim().toLowerCase();
  return normalized === 'true' || normalized === '1' || normalized === 'yes';
}

/**
 * Helper function to parse number from environment variable
 * @returns The parsed number, or the default if missing or invalid
 */
export function parseNumber(value?: string, defaultValue = 0): number {
  if (value === undefined || value.trim() === '') return defaultValue;
  const parsed = Number(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a number that schema validation will check later
 * Missing values stay undefined so the schema default applies; garbage
 * becomes NaN so the schema rejects it.
 */
function parseLimit(value?: string): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

/**
 * Helper function to parse string array from comma-separated string
 */
export function parseStringArray(value?: string, defaultValue: string[] = []): string[] {
  if (!value) return defaultValue;
  return value.split(',').map(item => item.trim()).filter(Boolean);
}

/**
 * @throws ConfigurationError naming every invalid field
 */
function parseFfmpegConfig(env: EnvVariables): FfmpegConfig {
  const result = FfmpegSettingsSchema.safeParse({
    exitTimeoutMs: parseLimit(env.FFMPEG_EXIT_TIMEOUT_MS),
    stderrLimitBytes: parseLimit(env.FFMPEG_STDERR_LIMIT_BYTES),
  });
  if (!result.success) {
    throw ConfigurationError.invalidSection(
      'ffmpeg',
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    ffmpegPath: resolveFfmpegCommand('ffmpeg', env),
    ffprobePath: resolveFfmpegCommand('ffprobe', env),
    ...result.data,
  };
}

function parseLogLevel(value?: string): LogLevel {
  const result = LogLevelSchema.safeParse(value?.trim().toLowerCase());
  return result.success ? result.data : 'info';
}

/**
 * Get environment configuration based on provided environment variables
 * @throws ConfigurationError when a limit or ffmpeg value is out of range
 */
export function getEnvironmentConfig(env: EnvVariables = process.env): EnvironmentConfig {
  const mode = (env.ENVIRONMENT || 'development').toLowerCase();

  return {
    mode,
    mediaPath: env.MEDIA_PATH?.trim() ?? '',

    limits: createLimits({
      keyframeInterval: parseLimit(env.VIDEO_KEYFRAME_INTERVAL),
      maxKeyframes: parseLimit(env.VIDEO_MAX_KEYFRAMES),
      maxDuration: parseLimit(env.VIDEO_MAX_DURATION),
      frameBatchSize: parseLimit(env.VIDEO_FRAME_BATCH_SIZE),
      maxUploadSizeMb: parseLimit(env.VIDEO_MAX_UPLOAD_SIZE_MB),
      minMatches: parseLimit(env.VIDEO_MIN_MATCHES),
      similarityThreshold: parseLimit(env.VIDEO_SIMILARITY_THRESHOLD),
    }),

    ffmpeg: parseFfmpegConfig(env),

    logging: {
      level: parseLogLevel(env.LOG_LEVEL),
      pretty: parseBoolean(env.LOG_PRETTY),
      enabledComponents: parseStringArray(env.LOG_ENABLED_COMPONENTS),
      disabledComponents: parseStringArray(env.LOG_DISABLED_COMPONENTS),
      sampleRate: Math.min(Math.max(parseNumber(env.LOG_SAMPLE_RATE, 1), 0), 1), // Clamp between 0 and 1
    },
  };
}
