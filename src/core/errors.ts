export type ErrorCode =
  | 'SchemaError'
  | 'AuthError'
  | 'NotFound'
  | 'OutOfRange'
  | 'NoActivePlaylist'
  | 'Unvalidated'
  | 'UpstreamUnavailable'
  | 'UpstreamError'
  | 'PersistenceFailure'
  | 'ShuttingDown';

export interface ErrorBody {
  code: ErrorCode;
  message: string;
}

export class RelayError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = code;
    this.code = code;
  }

  toBody(): ErrorBody {
    return { code: this.code, message: this.message };
  }
}

export class SchemaError extends RelayError {
  constructor(message: string) {
    super('SchemaError', message);
  }
}

export class AuthError extends RelayError {
  constructor() {
    super('AuthError', 'Unauthorized');
  }
}

export class NotFoundError extends RelayError {
  constructor(message: string) {
    super('NotFound', message);
  }
}

export class OutOfRangeError extends RelayError {
  constructor(message: string) {
    super('OutOfRange', message);
  }
}

export class NoActivePlaylistError extends RelayError {
  constructor() {
    super('NoActivePlaylist', 'No playlist is active');
  }
}

export class UnvalidatedError extends RelayError {
  constructor(message: string) {
    super('Unvalidated', message);
  }
}

export class UpstreamUnavailableError extends RelayError {
  constructor(message = 'Upstream session is not connected') {
    super('UpstreamUnavailable', message);
  }
}

/** アップストリームは応答したが requestStatus.result が false */
export class UpstreamRequestError extends RelayError {
  readonly statusCode: number;

  constructor(requestType: string, statusCode: number, comment?: string) {
    super('UpstreamError', `${requestType} failed (${statusCode})${comment ? `: ${comment}` : ''}`);
    this.statusCode = statusCode;
  }
}

export class PersistenceFailureError extends RelayError {
  constructor(message: string) {
    super('PersistenceFailure', message);
  }
}

export class ShuttingDownError extends RelayError {
  constructor() {
    super('ShuttingDown', 'Relay is shutting down');
  }
}

export function isRelayError(err: unknown): err is RelayError {
  return err instanceof RelayError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const HTTP_STATUS: Record<ErrorCode, number> = {
  SchemaError: 400,
  AuthError: 401,
  NotFound: 404,
  OutOfRange: 422,
  NoActivePlaylist: 409,
  Unvalidated: 409,
  UpstreamUnavailable: 503,
  UpstreamError: 502,
  PersistenceFailure: 500,
  ShuttingDown: 503,
};

export function httpStatusFor(code: ErrorCode): number {
  return HTTP_STATUS[code];
}
