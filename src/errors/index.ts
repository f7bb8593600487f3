/**
 * Error exports for the media decoder
 */
export * from './MediaError';
export * from './DecodeError';
export * from './MediaNotFoundError';
export * from './UnsupportedTypeError';
export * from './ConfigurationError';
