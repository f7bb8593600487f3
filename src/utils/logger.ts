/**
 * Centralized Logger Module
 *
 * The single entry point for logging in the media decoder. Log calls pick up
 * the decode context of the operation they run in, so every line carries the
 * operation id and post id without callers passing them around.
 */
import {
  createLogger,
  debug as pinoDebug,
  info as pinoInfo,
  warn as pinoWarn,
  error as pinoError,
  updatePinoLoggerConfig
} from './pinoLogger';
import { getCurrentContext } from './decodeContext';
import { LoggingConfigurationManager } from '../config/LoggingConfigurationManager';
import { isMediaError } from '../errors';

export interface LogData {
  [key: string]: unknown;
}

export interface LogOptions {
  /** Force logging even if component is disabled */
  force?: boolean;
}

/**
 * Check if a log should be filtered based on component and options
 */
function shouldFilterLog(category: string, options?: LogOptions): boolean {
  if (options?.force) {
    return false;
  }
  return !LoggingConfigurationManager.getInstance().shouldLogComponent(category);
}

function getContextAndLogger() {
  const context = getCurrentContext();
  return { context, logger: createLogger(context) };
}

export function logDebug(
  category: string,
  message: string,
  data?: LogData,
  options?: LogOptions
): void {
  if (shouldFilterLog(category, options)) {
    return;
  }
  const { context, logger } = getContextAndLogger();
  pinoDebug(context, logger, category, message, data);
}

export function logInfo(
  category: string,
  message: string,
  data?: LogData,
  options?: LogOptions
): void {
  if (shouldFilterLog(category, options)) {
    return;
  }
  const { context, logger } = getContextAndLogger();
  pinoInfo(context, logger, category, message, data);
}

export function logWarn(
  category: string,
  message: string,
  data?: LogData,
  options?: LogOptions
): void {
  if (shouldFilterLog(category, options)) {
    return;
  }
  const { context, logger } = getContextAndLogger();
  pinoWarn(context, logger, category, message, data);
}

export function logError(
  category: string,
  message: string,
  data?: LogData,
  options?: LogOptions
): void {
  if (shouldFilterLog(category, options)) {
    return;
  }
  const { context, logger } = getContextAndLogger();
  pinoError(context, logger, category, message, data);
}

/**
 * Turn any thrown value into a plain object pino can serialize
 */
export function formatError(error: unknown): Record<string, unknown> {
  if (isMediaError(error)) {
    return { ...error.toJSON(), stack: error.stack };
  }
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      ...('code' in error ? { code: error.code } : {})
    };
  }
  if (error === null || error === undefined) {
    return { message: 'Unknown error', type: 'unknown' };
  }
  if (typeof error === 'string') {
    return { message: error, type: 'string' };
  }
  return { message: String(error), type: typeof error };
}

/**
 * Log an error with full error object details
 */
export function logErrorWithContext(
  category: string,
  message: string,
  error: unknown,
  data?: LogData
): void {
  logError(category, message, { ...data, error: formatError(error) });
}

/**
 * Create a category-specific logger
 * @param category The category name for all logs from this logger
 * @returns Logger methods bound to the specified category
 */
export function createCategoryLogger(category: string) {
  return {
    debug: (message: string, data?: LogData, options?: LogOptions) =>
      logDebug(category, message, data, options),
    info: (message: string, data?: LogData, options?: LogOptions) =>
      logInfo(category, message, data, options),
    warn: (message: string, data?: LogData, options?: LogOptions) =>
      logWarn(category, message, data, options),
    error: (message: string, data?: LogData, options?: LogOptions) =>
      logError(category, message, data, options),
    errorWithContext: (message: string, error: unknown, data?: LogData) =>
      logErrorWithContext(category, message, error, data)
  };
}

export type CategoryLogger = ReturnType<typeof createCategoryLogger>;

export {
  updatePinoLoggerConfig,
  getCurrentContext,
  createLogger
};
