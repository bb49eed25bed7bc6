export type ServerErrorCode =
  | 'ProtocolViolation'
  | 'ParseFailure'
  | 'ApplicationError'
  | 'BackpressureExceeded'
  | 'LifecycleFailure'
  | 'ResourceExhaustion'
  | 'TaskCancelled'
  | 'ConfigError';

export class ServerError extends Error {
  readonly code: ServerErrorCode;

  constructor(code: ServerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.code = code;
  }
}

// Application called send/receive out of order, or sent an event the bridge does not understand.
export class ProtocolViolation extends ServerError {
  constructor(message: string) {
    super('ProtocolViolation', message);
  }
}

// Malformed framing from the peer; `status` is what the connection answers with.
export class ParseFailure extends ServerError {
  readonly status: number;

  constructor(message: string, status = 400) {
    super('ParseFailure', message);
    this.status = status;
  }
}

export class ApplicationError extends ServerError {
  constructor(message: string, cause?: unknown) {
    super('ApplicationError', message, { cause });
  }
}

export class BackpressureExceeded extends ServerError {
  readonly limit: number;

  constructor(message: string, limit: number) {
    super('BackpressureExceeded', message);
    this.limit = limit;
  }
}

export class LifecycleFailure extends ServerError {
  readonly phase: 'startup' | 'shutdown';

  constructor(phase: 'startup' | 'shutdown', message: string, cause?: unknown) {
    super('LifecycleFailure', message, { cause });
    this.phase = phase;
  }
}

export class ResourceExhaustion extends ServerError {
  readonly limit: number;

  constructor(limit: number) {
    super('ResourceExhaustion', `Maximum request limit of ${limit} exceeded. Terminating process.`);
    this.limit = limit;
  }
}

export class TaskCancelled extends ServerError {
  constructor(reason = 'Handler task cancelled') {
    super('TaskCancelled', reason);
  }
}

export class ConfigError extends ServerError {
  constructor(message: string) {
    super('ConfigError', message);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
