/**
 * Decode limits
 *
 * Immutable values that bound how much work a single decode may do. They are
 * built once from configuration with createLimits() and passed explicitly to
 * every decode call.
 */
import { z } from 'zod';
import { ConfigurationError } from '../errors';

export const BYTES_PER_MB = 1024 * 1024;

export const LimitsSchema = z.object({
  // Spacing in seconds between the keyframes the transcoder keeps
  keyframeInterval: z.number().positive().default(1),
  // Upper bound on frames taken per video, applied by the caller
  maxKeyframes: z.number().int().min(1).default(100),
  // Longer videos are rejected before transcoding
  maxDuration: z.number().positive().default(300),
  // Downstream parallelism hint
  frameBatchSize: z.number().int().min(1).default(10),
  maxUploadSizeMb: z.number().positive().default(200),

  // Matching parameters carried through for the similarity stage
  minMatches: z.number().int().min(1).default(3),
  similarityThreshold: z.number().min(0).max(1).default(0.8),
});

export type LimitsInput = z.input<typeof LimitsSchema>;

export type Limits = Readonly<z.output<typeof LimitsSchema> & {
  maxUploadSizeBytes: number;
}>;

/**
 * Validate limit values and freeze them
 * @throws ConfigurationError naming every invalid field
 */
export function createLimits(input: LimitsInput = {}): Limits {
  const result = LimitsSchema.safeParse(input);
  if (!result.success) {
    throw ConfigurationError.invalidSection(
      'limits',
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return Object.freeze({
    ...result.data,
    maxUploadSizeBytes: Math.floor(result.data.maxUploadSizeMb * BYTES_PER_MB),
  });
}

export const DEFAULT_LIMITS: Limits = createLimits();
