/**
 * Tests for the centralized logger
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as pinoLogger from '../../src/utils/pinoLogger';
import {
  createCategoryLogger,
  formatError,
  logDebug,
  logInfo,
  logWarn
} from '../../src/utils/logger';
import { LoggingConfigurationManager } from '../../src/config/LoggingConfigurationManager';
import { createDecodeContext, runWithDecodeContext } from '../../src/utils/decodeContext';
import { DecodeError } from '../../src/errors';

const { fakeLogger } = vi.hoisted(() => ({ fakeLogger: { name: 'fake' } }));

vi.mock('../../src/utils/pinoLogger', () => ({
  createLogger: vi.fn(() => fakeLogger),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  updatePinoLoggerConfig: vi.fn(() => true)
}));

describe('logger', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    LoggingConfigurationManager.getInstance().updateConfig({ enabledComponents: [], disabledComponents: [] });
  });

  it('should pass category, message and data to pino', () => {
    logInfo('VideoDecoder', 'Started keyframe extraction', { path: '/media/a.mp4' });

    expect(pinoLogger.info).toHaveBeenCalledWith(
      undefined,
      fakeLogger,
      'VideoDecoder',
      'Started keyframe extraction',
      { path: '/media/a.mp4' }
    );
  });

  it('should bind the current decode context', () => {
    const context = createDecodeContext(5, 'op-5');

    runWithDecodeContext(context, () => logWarn('MediaResolver', 'Falling back'));

    expect(pinoLogger.createLogger).toHaveBeenCalledWith(context);
    expect(pinoLogger.warn).toHaveBeenCalledWith(context, fakeLogger, 'MediaResolver', 'Falling back', undefined);
  });

  it('should drop logs of disabled components unless forced', () => {
    LoggingConfigurationManager.getInstance().updateConfig({ disabledComponents: ['Video*'] });

    logDebug('VideoDecoder', 'hidden');
    expect(pinoLogger.debug).not.toHaveBeenCalled();

    logDebug('VideoDecoder', 'shown', undefined, { force: true });
    expect(pinoLogger.debug).toHaveBeenCalledTimes(1);
  });

  it('should log errors with their details through a category logger', () => {
    const logger = createCategoryLogger('VideoDecoder');
    const error = DecodeError.protocolViolation('could not read the full frame');

    logger.errorWithContext('Decode failed', error, { postId: 2 });

    expect(pinoLogger.error).toHaveBeenCalledWith(undefined, fakeLogger, 'VideoDecoder', 'Decode failed', {
      postId: 2,
      error: formatError(error)
    });
  });

  describe('formatError', () => {
    it('should serialize media errors with their type', () => {
      const formatted = formatError(DecodeError.exitTimeout(1000));

      expect(formatted).toMatchObject({
        name: 'DecodeError',
        errorType: 'PROTOCOL_VIOLATION',
        message: 'ffmpeg did not exit within 1000ms after its output ended'
      });
    });

    it('should keep the code of system errors', () => {
      const err = Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' });

      expect(formatError(err)).toMatchObject({ name: 'Error', message: 'ENOENT: no such file', code: 'ENOENT' });
    });

    it('should describe values that are not errors', () => {
      expect(formatError('boom')).toEqual({ message: 'boom', type: 'string' });
      expect(formatError(undefined)).toEqual({ message: 'Unknown error', type: 'unknown' });
      expect(formatError(42)).toEqual({ message: '42', type: 'number' });
    });
  });
});
