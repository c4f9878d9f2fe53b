import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Error body in the Messages protocol shape. `code` and `param` are extra
 * fields clients ignore but logs and tests rely on.
 */
export interface ErrorBody {
  type: 'error';
  error: {
    type: string;
    message: string;
    code: string;
    param?: string;
  };
}

export function errorBody(
  type: string,
  message: string,
  code: string,
  param?: string,
): ErrorBody {
  return {
    type: 'error',
    error: param === undefined ? { type, message, code } : { type, message, code, param },
  };
}

export type AuthErrorKind = 'missing_token' | 'exchange_failed' | 'expired';

// Each subclass restores `message`: HttpException derives it from the class
// name when the response is an object.

/**
 * Missing, rejected or expired credential. Never retried at request level.
 */
export class AuthError extends HttpException {
  constructor(
    readonly kind: AuthErrorKind,
    message: string,
  ) {
    super(
      errorBody('authentication_error', message, kind),
      kind === 'missing_token' ? HttpStatus.FORBIDDEN : HttpStatus.UNAUTHORIZED,
    );
    this.message = message;
    this.name = 'AuthError';
  }
}

export type TranslationErrorKind = 'invalid_input' | 'unsupported_tool_choice';

/**
 * Malformed or unsupported client input. `field` is the dotted path of the
 * offending value, e.g. `messages.2.content.0.type`.
 */
export class TranslationError extends HttpException {
  constructor(
    readonly kind: TranslationErrorKind,
    readonly field: string,
    message: string,
  ) {
    super(
      errorBody('invalid_request_error', `${field}: ${message}`, kind, field),
      HttpStatus.BAD_REQUEST,
    );
    this.message = `${field}: ${message}`;
    this.name = 'TranslationError';
  }
}

/**
 * Backend returned a failure status or an unreadable payload.
 */
export class UpstreamError extends HttpException {
  constructor(
    message: string,
    readonly upstreamStatus?: number,
    type = 'api_error',
    code = 'upstream_error',
  ) {
    super(errorBody(type, message, code), UpstreamError.clientStatus(upstreamStatus));
    this.message = message;
    this.name = 'UpstreamError';
  }

  /**
   * Backend 4xx/5xx statuses are meaningful to the caller; anything else
   * (network failure, bad payload) becomes a 502.
   */
  private static clientStatus(upstreamStatus?: number): number {
    if (upstreamStatus !== undefined && upstreamStatus >= 400 && upstreamStatus <= 599) {
      return upstreamStatus;
    }
    return HttpStatus.BAD_GATEWAY;
  }
}

/**
 * Backend stream aborted mid-flight. Rendered as a terminal SSE `error` event,
 * not as an HTTP status, because headers are already sent.
 */
export class StreamError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StreamError';
  }
}
