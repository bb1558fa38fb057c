/**
 * Typed error classes for the optimization core.
 *
 * Only two conditions are surfaced to callers: bad input to a strategy and
 * bad configuration. Everything else degrades to "no change" inside the
 * pipeline.
 */

/**
 * Thrown by a strategy's `apply` when the prompt is not a non-empty string.
 */
export class InvalidPromptError extends Error {
  readonly code = 'INVALID_PROMPT' as const;

  constructor(message?: string) {
    super(message ?? 'Prompt must be a non-empty string');
    this.name = 'InvalidPromptError';
  }
}

/**
 * Thrown when configuration or call options fail validation.
 */
export class InvalidConfigurationError extends Error {
  readonly code = 'INVALID_CONFIGURATION' as const;

  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * Type guard to check if an error is InvalidPromptError.
 */
export function isInvalidPromptError(
  error: unknown
): error is InvalidPromptError {
  return error instanceof InvalidPromptError;
}

/**
 * Type guard to check if an error is InvalidConfigurationError.
 */
export function isInvalidConfigurationError(
  error: unknown
): error is InvalidConfigurationError {
  return error instanceof InvalidConfigurationError;
}

/**
 * Render any thrown value as a short message for logs and step records.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
