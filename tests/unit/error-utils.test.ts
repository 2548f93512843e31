/**
 * Tests for error-utils.ts
 */

import { getErrorMessage } from '../../src/utils/error-utils.js';
import { ConfigParseError, MissingFieldError, StepViewError } from '../../src/errors.js';

describe('getErrorMessage', () => {
  it('should extract message from Error instance', () => {
    expect(getErrorMessage(new Error('Something went wrong'))).toBe('Something went wrong');
  });

  it('should extract message from a StepViewError subclass', () => {
    expect(getErrorMessage(new MissingFieldError('source'))).toBe(
      'Step configuration is missing required field "source"'
    );
  });

  it('should convert primitives to string', () => {
    expect(getErrorMessage('Raw error string')).toBe('Raw error string');
    expect(getErrorMessage(42)).toBe('42');
    expect(getErrorMessage(null)).toBe('null');
    expect(getErrorMessage(undefined)).toBe('undefined');
  });

  it('should convert plain object to string', () => {
    expect(getErrorMessage({ code: 500 })).toBe('[object Object]');
  });
});

describe('StepViewError', () => {
  it('should carry code, name and file path on subclasses', () => {
    const missing = new MissingFieldError('source', 'step.yml');
    expect(missing.code).toBe('MISSING_FIELD');
    expect(missing.name).toBe('MissingFieldError');
    expect(missing.field).toBe('source');
    expect(missing.filePath).toBe('step.yml');
    expect(missing.message).toBe('Step configuration is missing required field "source" (step.yml)');
  });

  it('should prefix parse errors with the file path and keep the cause', () => {
    const cause = new Error('bad indent');
    const error = new ConfigParseError('Invalid YAML: bad indent', 'step.yml', { cause });
    expect(error.message).toBe('step.yml: Invalid YAML: bad indent');
    expect(error.code).toBe('INVALID_CONFIG');
    expect(error.cause).toBe(cause);
  });

  it('should recognise its own instances only', () => {
    expect(StepViewError.isStepViewError(new ConfigParseError('x'))).toBe(true);
    expect(StepViewError.isStepViewError(new Error('x'))).toBe(false);
    expect(StepViewError.isStepViewError('x')).toBe(false);
  });
});
