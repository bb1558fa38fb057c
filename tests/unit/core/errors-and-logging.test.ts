/**
 * Unit Tests for typed errors and the logger
 */

import { describe, it, expect, jest, afterEach } from '@jest/globals';
import {
  InvalidPromptError,
  InvalidConfigurationError,
  isInvalidPromptError,
  isInvalidConfigurationError,
  describeError,
} from '../../../src/core/errors.js';
import { createLogger, isLogLevel, silentLogger } from '../../../src/core/logger.js';

describe('errors', () => {
  it('should carry codes and default messages', () => {
    const promptError = new InvalidPromptError();
    const configError = new InvalidConfigurationError('bad config', ['a: wrong']);

    expect(promptError.code).toBe('INVALID_PROMPT');
    expect(promptError.message).toBe('Prompt must be a non-empty string');
    expect(configError.code).toBe('INVALID_CONFIGURATION');
    expect(configError.issues).toEqual(['a: wrong']);
  });

  it('should narrow with the type guards', () => {
    expect(isInvalidPromptError(new InvalidPromptError())).toBe(true);
    expect(isInvalidPromptError(new Error('x'))).toBe(false);
    expect(isInvalidConfigurationError(new InvalidConfigurationError('x'))).toBe(true);
  });

  it('should describe any thrown value', () => {
    expect(describeError(new TypeError('bad'))).toBe('TypeError: bad');
    expect(describeError('plain')).toBe('plain');
  });
});

describe('logger', () => {
  const originalLogPrompts = process.env.PROMPT_CONDENSER_LOG_PROMPTS;

  afterEach(() => {
    jest.restoreAllMocks();
    if (originalLogPrompts === undefined) {
      delete process.env.PROMPT_CONDENSER_LOG_PROMPTS;
    } else {
      process.env.PROMPT_CONDENSER_LOG_PROMPTS = originalLogPrompts;
    }
  });

  it('should write one line per entry at or above the level', () => {
    const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = createLogger('test', 'warn');

    logger.info('hidden');
    logger.warn('careful', { attempts: 2 });

    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith('[WARN] [test] careful {"attempts":2}\n');
  });

  it('should log prompt text only when enabled at debug level', () => {
    const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

    delete process.env.PROMPT_CONDENSER_LOG_PROMPTS;
    createLogger('test', 'debug').prompt('original', 'secret prompt');
    expect(write).not.toHaveBeenCalled();

    process.env.PROMPT_CONDENSER_LOG_PROMPTS = 'true';
    createLogger('test', 'debug').prompt('original', 'shared prompt');
    expect(write).toHaveBeenCalledWith('[DEBUG] [test] [PROMPT] original: shared prompt\n');
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('loud')).toBe(false);
  });

  it('should provide a silent logger', () => {
    const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

    silentLogger.error('dropped');

    expect(write).not.toHaveBeenCalled();
  });
});
