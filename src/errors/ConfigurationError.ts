/**
 * Specialized error class for configuration errors
 */
import { MediaError, ErrorType, type ErrorContext } from './MediaError';

export class ConfigurationError extends MediaError {
  constructor(
    message: string,
    context: ErrorContext = {}
  ) {
    super(message, ErrorType.CONFIG_ERROR, context);
    this.name = 'ConfigurationError';
  }

  /**
   * Create a configuration error for a section that failed schema validation
   */
  static invalidSection(
    section: string,
    issues: string[],
    context: ErrorContext = {}
  ): ConfigurationError {
    return new ConfigurationError(
      `Invalid ${section} configuration: ${issues.join(', ')}`,
      {
        ...context,
        parameters: {
          ...context.parameters,
          section,
          issues
        }
      }
    );
  }

  /**
   * Create a configuration error for a path that must be an existing directory
   */
  static notADirectory(
    propertyPath: string,
    path: string,
    context: ErrorContext = {}
  ): ConfigurationError {
    return new ConfigurationError(
      `${propertyPath} has to be set to an existing directory.`,
      {
        ...context,
        path,
        parameters: {
          ...context.parameters,
          propertyPath
        }
      }
    );
  }
}
