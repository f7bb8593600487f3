/**
 * Vitest setup file
 * Keeps log output quiet while the specs run
 */
import { LoggingConfigurationManager } from './src/config/LoggingConfigurationManager';
import { updatePinoLoggerConfig } from './src/utils/pinoLogger';

process.env.NODE_ENV = process.env.NODE_ENV || 'test';

LoggingConfigurationManager.getInstance().updateConfig({ level: 'error', pretty: false });
updatePinoLoggerConfig();
