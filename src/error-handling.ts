export class NetstrikeError extends Error {
  constructor(
    message: string,
    public readonly type: NetstrikeErrorType,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = type;
  }
}

export type NetstrikeErrorType =
  | 'ConnectionError'
  | 'TimeoutError'
  | 'ProtocolError'
  | 'ConfigurationError'
  | 'OperatorAbort'
  | 'InvalidTargetError'
  | 'ScanError'
  | 'UnknownError';

export const NON_RETRYABLE_ERROR_TYPES: NetstrikeErrorType[] = [
  'ConfigurationError',
  'ConnectionError',
  'OperatorAbort',
  'InvalidTargetError',
];

/**
 * Raised by the framework adapter when a command does not complete in time.
 * Carries whatever output arrived before the deadline.
 */
export class CommandTimeoutError extends NetstrikeError {
  constructor(
    public readonly command: string,
    public readonly timeoutMs: number,
    public readonly partialOutput: string
  ) {
    super(`Command "${command}" timed out after ${timeoutMs}ms`, 'TimeoutError', true);
  }
}

export function isNetstrikeError(error: unknown, type?: NetstrikeErrorType): error is NetstrikeError {
  return error instanceof NetstrikeError && (type === undefined || error.type === type);
}

export function classifyError(error: unknown): { type: NetstrikeErrorType; retryable: boolean; message: string } {
  if (error instanceof NetstrikeError) {
    return { type: error.type, retryable: error.retryable, message: error.message };
  }

  const message = error instanceof Error ? error.message : String(error);
  const messageLower = message.toLowerCase();

  if (error instanceof Error && error.name === 'AbortError') {
    return { type: 'OperatorAbort', retryable: false, message };
  }

  if (/config|yaml|schema|validation|option/i.test(messageLower)) {
    return { type: 'ConfigurationError', retryable: false, message };
  }

  if (/invalid.*(?:target|address)|no.*host|unreachable/i.test(messageLower)) {
    return { type: 'InvalidTargetError', retryable: false, message };
  }

  if (/timeout|timed?\s*out|etimedout/i.test(messageLower)) {
    return { type: 'TimeoutError', retryable: true, message };
  }

  if (/econnrefused|econnreset|enoent|spawn|epipe|exited/i.test(messageLower)) {
    return { type: 'ConnectionError', retryable: false, message };
  }

  if (/nmap|scan|probe/i.test(messageLower)) {
    return { type: 'ScanError', retryable: true, message };
  }

  return { type: 'UnknownError', retryable: false, message };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown, code?: string): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && (code === undefined || error.code === code);
}
