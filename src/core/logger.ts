/**
 * Leveled logging for the optimization core.
 *
 * Entries go to stderr, one line each, so hosts that own stdout (stdio
 * protocols, piped CLIs) are unaffected.
 *
 * Environment:
 * - PROMPT_CONDENSER_LOG_LEVEL = 'debug' | 'info' | 'warn' | 'error' | 'silent' (default: 'info')
 * - PROMPT_CONDENSER_LOG_PROMPTS = 'true' to allow prompt text in debug output
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Prompt text, only emitted when prompt logging is enabled at debug level. */
  prompt(label: string, content: string): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const MAX_PROMPT_CHARS = 500;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVELS;
}

function levelFromEnv(): LogLevel {
  const raw = process.env.PROMPT_CONDENSER_LOG_LEVEL?.toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

function formatContext(context: LogContext | undefined): string {
  if (!context || Object.keys(context).length === 0) {
    return '';
  }
  try {
    return ' ' + JSON.stringify(context);
  } catch {
    return ' [unserializable context]';
  }
}

/**
 * Create a logger for a named scope.
 *
 * @param scope - Prefix shown on every line, e.g. `optimizer`
 * @param level - Minimum level; defaults to PROMPT_CONDENSER_LOG_LEVEL
 */
export function createLogger(scope: string, level?: LogLevel): Logger {
  const threshold = LOG_LEVELS[level ?? levelFromEnv()];
  const logPrompts = process.env.PROMPT_CONDENSER_LOG_PROMPTS === 'true';

  const write = (
    entryLevel: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: LogContext
  ): void => {
    if (LOG_LEVELS[entryLevel] < threshold) {
      return;
    }
    process.stderr.write(
      `[${entryLevel.toUpperCase()}] [${scope}] ${message}${formatContext(context)}\n`
    );
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    prompt: (label, content) => {
      if (!logPrompts) {
        return;
      }
      const truncated =
        content.length > MAX_PROMPT_CHARS
          ? content.slice(0, MAX_PROMPT_CHARS) + '...'
          : content;
      write('debug', `[PROMPT] ${label}: ${truncated}`);
    },
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  prompt: () => undefined,
};
