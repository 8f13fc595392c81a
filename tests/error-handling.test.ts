import { describe, it, expect } from 'vitest';
import {
  CommandTimeoutError,
  NetstrikeError,
  classifyError,
  errorMessage,
  isErrnoException,
  isNetstrikeError,
} from '../src/error-handling.js';

describe('classifyError', () => {
  it('keeps the type of a NetstrikeError', () => {
    expect(classifyError(new NetstrikeError('lost', 'ConnectionError'))).toEqual({
      type: 'ConnectionError',
      retryable: false,
      message: 'lost',
    });
  });

  it('marks command timeouts retryable', () => {
    expect(classifyError(new CommandTimeoutError('run -z', 500, ''))).toEqual({
      type: 'TimeoutError',
      retryable: true,
      message: 'Command "run -z" timed out after 500ms',
    });
  });

  it('maps an AbortError to an operator abort', () => {
    const error = new Error('The operation was aborted');
    error.name = 'AbortError';
    expect(classifyError(error).type).toBe('OperatorAbort');
  });

  it('infers the type from plain error messages', () => {
    expect(classifyError(new Error('YAML parse error')).type).toBe('ConfigurationError');
    expect(classifyError(new Error('Invalid target address')).type).toBe('InvalidTargetError');
    expect(classifyError(new Error('socket timed out')).type).toBe('TimeoutError');
    expect(classifyError(new Error('spawn msfconsole ENOENT')).type).toBe('ConnectionError');
    expect(classifyError(new Error('nmap returned garbage')).type).toBe('ScanError');
    expect(classifyError('weird')).toEqual({ type: 'UnknownError', retryable: false, message: 'weird' });
  });
});

describe('type guards', () => {
  it('narrows NetstrikeError by type', () => {
    const error = new NetstrikeError('bad', 'ConfigurationError');
    expect(isNetstrikeError(error)).toBe(true);
    expect(isNetstrikeError(error, 'ConfigurationError')).toBe(true);
    expect(isNetstrikeError(error, 'TimeoutError')).toBe(false);
    expect(isNetstrikeError(new Error('bad'))).toBe(false);
  });

  it('recognizes errno exceptions by code', () => {
    const error = Object.assign(new Error('missing'), { code: 'ENOENT' });
    expect(isErrnoException(error, 'ENOENT')).toBe(true);
    expect(isErrnoException(error, 'EACCES')).toBe(false);
    expect(isErrnoException(new Error('plain'))).toBe(false);
  });

  it('formats any thrown value', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
