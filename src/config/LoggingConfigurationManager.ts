/**
 * LoggingConfigurationManager
 *
 * A centralized configuration manager for logging with Zod schema validation
 */
import { z } from 'zod';
import { ConfigurationError } from '../errors';

// Define Zod schemas for logging configuration
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const LoggingConfigSchema = z.object({
  // Logging levels and behavior
  level: LogLevelSchema.default('info'),

  // Human-readable output through pino-pretty
  pretty: z.boolean().default(false),

  // Components to enable/disable logging for
  enabledComponents: z.array(z.string()).default([]),
  disabledComponents: z.array(z.string()).default([]),

  // Sampling configuration
  sampleRate: z.number().min(0).max(1).default(1),

  // Breadcrumb configuration
  breadcrumbs: z.object({
    enabled: z.boolean().default(true),
    maxItems: z.number().min(0).default(100)
  }).default({
    enabled: true,
    maxItems: 100
  }),

  // Fields bound to every log line
  base: z.object({
    service: z.string().default('media-decoder'),
    env: z.string().default('development')
  }).default({
    service: 'media-decoder',
    env: 'development'
  })
});

// Type exported from the schema
export type LoggingConfiguration = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    `${issue.path.join('.')}: ${issue.message}`
  );
}

/**
 * LoggingConfigurationManager class for managing and validating logging configuration
 */
export class LoggingConfigurationManager {
  private static instance: LoggingConfigurationManager | undefined;
  private config: LoggingConfiguration;

  /**
   * Private constructor to enforce singleton pattern
   */
  private constructor(initialConfig: unknown = {}) {
    const result = LoggingConfigSchema.safeParse(initialConfig);
    if (!result.success) {
      throw ConfigurationError.invalidSection('logging', formatIssues(result.error));
    }
    this.config = result.data;
  }

  /**
   * Get the singleton instance
   */
  public static getInstance(initialConfig?: unknown): LoggingConfigurationManager {
    if (!LoggingConfigurationManager.instance) {
      LoggingConfigurationManager.instance = new LoggingConfigurationManager(initialConfig);
    }
    return LoggingConfigurationManager.instance;
  }

  /**
   * Reset the instance (useful for testing)
   */
  public static resetInstance(): void {
    LoggingConfigurationManager.instance = undefined;
  }

  public getConfig(): LoggingConfiguration {
    return this.config;
  }

  /**
   * Check if a component should be logged
   */
  public shouldLogComponent(componentName: string): boolean {
    // If specific components are enabled, check if this component matches
    if (this.config.enabledComponents.length > 0) {
      return this.matchesComponentPatterns(componentName, this.config.enabledComponents);
    }

    // Otherwise, log all components that don't match disabled patterns
    return !this.matchesComponentPatterns(componentName, this.config.disabledComponents);
  }

  /**
   * Check if a component name matches any of the patterns
   * Supports exact match and wildcard patterns (e.g., "Video*", "*Decoder")
   */
  private matchesComponentPatterns(componentName: string, patterns: string[]): boolean {
    for (const pattern of patterns) {
      if (pattern === componentName) {
        return true;
      }

      const regexPattern = pattern
        .replace(/[.+?^${}()|[\]\\]/g, '\\$&') // Escape special chars except *
        .replace(/\*/g, '.*');

      if (new RegExp(`^${regexPattern}$`).test(componentName)) {
        return true;
      }
    }

    return false;
  }

  public getSamplingConfig(): { enabled: boolean, rate: number } {
    return {
      enabled: this.config.sampleRate < 1.0,
      rate: this.config.sampleRate
    };
  }

  public getBreadcrumbConfig(): { enabled: boolean, maxItems: number } {
    return this.config.breadcrumbs;
  }

  /**
   * Update the configuration
   * An invalid update is rejected and the current configuration is kept
   */
  public updateConfig(newConfig: Partial<LoggingConfiguration>): LoggingConfiguration {
    const result = LoggingConfigSchema.safeParse({
      ...this.config,
      ...newConfig,
    });

    if (!result.success) {
      // console is used here because the logger itself depends on this manager
      console.error('Logging configuration validation failed', {
        source: 'LoggingConfigurationManager',
        errors: formatIssues(result.error),
        invalidConfig: newConfig
      });
      return this.config;
    }

    this.config = result.data;
    return this.config;
  }
}
