export enum ErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  INPUT_INVALID = 'INPUT_INVALID',
  POOL_MISSING = 'POOL_MISSING',
  TRANSPORT_BIND_FAILED = 'TRANSPORT_BIND_FAILED',
  TRANSPORT_SEND_FAILED = 'TRANSPORT_SEND_FAILED',
  MESSAGE_MALFORMED = 'MESSAGE_MALFORMED',
  WORKER_FAILED = 'WORKER_FAILED',
  INTERNAL_UNKNOWN = 'INTERNAL_UNKNOWN',
}
type ErrorContext = Record<string, string | number | boolean | null | undefined>;
export class ParloopError extends Error {
  public readonly code: ErrorCode;
  public readonly userMessage: string;
  public readonly context: ErrorContext;
  public readonly recoverable: boolean;
  constructor(
    message: string,
    code: ErrorCode,
    userMessage?: string,
    context: ErrorContext = {},
    recoverable = false
  ) {
    super(message);
    this.name = 'ParloopError';
    this.code = code;
    this.userMessage = userMessage ?? message;
    this.context = context;
    this.recoverable = recoverable;
    Error.captureStackTrace(this, ParloopError);
  }
  static fromError(
    error: unknown,
    code = ErrorCode.INTERNAL_UNKNOWN,
    userMessage?: string
  ): ParloopError {
    if (error instanceof ParloopError) return error;
    const message = error instanceof Error ? error.message : String(error);
    const context = error instanceof Error ? { originalError: error.name } : {};
    return new ParloopError(message, code, userMessage, context);
  }
}
export class ConfigurationError extends ParloopError {
  constructor(message: string, configKey?: string) {
    super(
      message,
      ErrorCode.CONFIG_INVALID,
      `Configuration issue: ${message}`,
      { configKey },
      false
    );
    this.name = 'ConfigurationError';
  }
}
export class PoolError extends ParloopError {
  constructor(message: string, context: ErrorContext = {}) {
    super(
      message,
      ErrorCode.POOL_MISSING,
      'An execution pool must exist before a progress monitor is opened',
      context,
      false
    );
    this.name = 'PoolError';
  }
}
type TransportOperation = 'bind' | 'send';
export class TransportError extends ParloopError {
  public readonly operation: TransportOperation;
  constructor(message: string, operation: TransportOperation, context: ErrorContext = {}) {
    const code =
      operation === 'bind' ? ErrorCode.TRANSPORT_BIND_FAILED : ErrorCode.TRANSPORT_SEND_FAILED;
    const userMessage =
      operation === 'bind'
        ? `Could not open the progress endpoint: ${message}`
        : `Could not deliver a progress datagram: ${message}`;
    // Individual sends are best effort; only a failed bind is fatal.
    super(message, code, userMessage, { ...context, operation }, operation === 'send');
    this.name = 'TransportError';
    this.operation = operation;
  }
  static fromSocketError(error: unknown, operation: TransportOperation): TransportError {
    if (error instanceof TransportError) return error;
    if (error instanceof Error) {
      const errno = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      return new TransportError(error.message, operation, { originalError: error.name, errno });
    }
    return new TransportError(String(error), operation);
  }
}
export class ProtocolError extends ParloopError {
  public readonly byteLength: number;
  constructor(message: string, byteLength: number, context: ErrorContext = {}) {
    super(
      message,
      ErrorCode.MESSAGE_MALFORMED,
      `Discarded a malformed progress datagram: ${message}`,
      { ...context, byteLength },
      true
    );
    this.name = 'ProtocolError';
    this.byteLength = byteLength;
  }
}
