/**
 * Pino logger implementation for decode-scoped logging
 */
import pino from 'pino';
import { LoggingConfigurationManager } from '../config/LoggingConfigurationManager';
import { type DecodeContext, type Breadcrumb, addBreadcrumb } from './decodeContext';

type LevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * Build Pino options from the logging configuration
 * pino-pretty runs as a transport only when pretty output was asked for
 */
function buildPinoOptions(): pino.LoggerOptions {
  const config = LoggingConfigurationManager.getInstance().getConfig();

  return {
    level: config.level,
    base: {
      service: config.base.service,
      env: config.base.env
    },
    ...(config.pretty ? {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,operationId,elapsedMs,durationMs,breadcrumbsCount',
          messageFormat: '\x1b[36m[{category}]\x1b[0m {msg} \x1b[90m(op:{operationId})\x1b[0m',
          singleLine: true,
          levelFirst: true
        }
      }
    } : {})
  };
}

let baseLogger = pino(buildPinoOptions());

/**
 * Recreate the base logger after the logging configuration changed
 */
export function updatePinoLoggerConfig(): boolean {
  try {
    baseLogger = pino(buildPinoOptions());
    return true;
  } catch (err) {
    // The logger is what failed, so console is the only outlet left
    console.error({
      context: 'PinoLogger',
      operation: 'updatePinoLoggerConfig',
      error: err instanceof Error ? { name: err.name, message: err.message } : String(err)
    });
    return false;
  }
}

/**
 * Create a logger, bound to a decode context when one is given
 */
export function createLogger(context?: DecodeContext): pino.Logger {
  if (!context) {
    return baseLogger;
  }
  return baseLogger.child({
    operationId: context.operationId,
    ...(context.postId !== undefined ? { postId: context.postId } : {})
  });
}

function write(
  level: LevelName,
  context: DecodeContext | undefined,
  logger: pino.Logger,
  category: string,
  message: string,
  data?: Record<string, unknown>
): Breadcrumb | undefined {
  // Always add breadcrumb for tracking, regardless of log level
  const breadcrumb = context ? addBreadcrumb(context, category, message, data) : undefined;

  if (!logger.isLevelEnabled(level)) {
    return breadcrumb;
  }

  const sampling = LoggingConfigurationManager.getInstance().getSamplingConfig();
  if ((level === 'debug' || level === 'info') && sampling.enabled && Math.random() > sampling.rate) {
    return breadcrumb;
  }

  const logData = {
    ...data,
    category,
    ...(breadcrumb ? {
      elapsedMs: Math.round(breadcrumb.elapsedMs),
      ...(breadcrumb.durationMs !== undefined ? { durationMs: Math.round(breadcrumb.durationMs) } : {}),
      breadcrumbsCount: context?.breadcrumbs.length
    } : {})
  };

  logger[level](logData, message);
  return breadcrumb;
}

/**
 * Debug level log with breadcrumb
 */
export function debug(
  context: DecodeContext | undefined,
  logger: pino.Logger,
  category: string,
  message: string,
  data?: Record<string, unknown>
) {
  return write('debug', context, logger, category, message, data);
}

/**
 * Info level log with breadcrumb
 */
export function info(
  context: DecodeContext | undefined,
  logger: pino.Logger,
  category: string,
  message: string,
  data?: Record<string, unknown>
) {
  return write('info', context, logger, category, message, data);
}

/**
 * Warning level log with breadcrumb
 */
export function warn(
  context: DecodeContext | undefined,
  logger: pino.Logger,
  category: string,
  message: string,
  data?: Record<string, unknown>
) {
  return write('warn', context, logger, category, message, data);
}

/**
 * Error level log with breadcrumb
 */
export function error(
  context: DecodeContext | undefined,
  logger: pino.Logger,
  category: string,
  message: string,
  data?: Record<string, unknown>
) {
  return write('error', context, logger, category, message, data);
}
