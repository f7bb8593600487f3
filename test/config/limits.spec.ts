/**
 * Tests for decode limits
 */
import { describe, it, expect } from 'vitest';
import { BYTES_PER_MB, createLimits, DEFAULT_LIMITS } from '../../src/config/limits';
import { ConfigurationError } from '../../src/errors';

describe('createLimits', () => {
  it('should apply the defaults', () => {
    expect(DEFAULT_LIMITS).toEqual({
      keyframeInterval: 1,
      maxKeyframes: 100,
      maxDuration: 300,
      frameBatchSize: 10,
      maxUploadSizeMb: 200,
      maxUploadSizeBytes: 200 * 1024 * 1024,
      minMatches: 3,
      similarityThreshold: 0.8
    });
  });

  it('should derive the byte cap from megabytes', () => {
    expect(BYTES_PER_MB).toBe(1048576);
    expect(createLimits({ maxUploadSizeMb: 1.5 }).maxUploadSizeBytes).toBe(1572864);
  });

  it('should keep explicit values', () => {
    const limits = createLimits({ keyframeInterval: 0.5, maxKeyframes: 12, maxDuration: 60 });

    expect(limits.keyframeInterval).toBe(0.5);
    expect(limits.maxKeyframes).toBe(12);
    expect(limits.maxDuration).toBe(60);
  });

  it('should return a frozen value', () => {
    expect(Object.isFrozen(createLimits())).toBe(true);
  });

  it.each([
    [{ keyframeInterval: 0 }, 'keyframeInterval'],
    [{ maxKeyframes: 0 }, 'maxKeyframes'],
    [{ maxKeyframes: 1.5 }, 'maxKeyframes'],
    [{ maxDuration: -1 }, 'maxDuration'],
    [{ frameBatchSize: 0 }, 'frameBatchSize'],
    [{ maxUploadSizeMb: 0 }, 'maxUploadSizeMb'],
    [{ similarityThreshold: 1.2 }, 'similarityThreshold'],
    [{ maxDuration: Number.NaN }, 'maxDuration']
  ])('should reject %j', (input, field) => {
    expect(() => createLimits(input)).toThrow(ConfigurationError);
    expect(() => createLimits(input)).toThrow(new RegExp(`^Invalid limits configuration: ${field}: `));
  });
});
