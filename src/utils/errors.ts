/**
 * Error taxonomy for the identity client
 *
 * Every failure raised by this library is an IdentityError carrying a literal
 * `kind` discriminant. Callers branch on `kind`, then on the numeric `code`
 * and `status` fields, never on message text (the two ID Site compatibility
 * messages in IdSiteMessages are the only exception).
 */

import type { ApiError } from '../core/types.js';

export type IdentityErrorKind =
  | 'argument'
  | 'local_validation'
  | 'malformed_token'
  | 'signature_invalid'
  | 'token_claim_invalid'
  | 'service'
  | 'transport';

export abstract class IdentityError extends Error {
  abstract readonly kind: IdentityErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
    };
  }
}

/**
 * A required input was missing or empty. Raised before any network call.
 */
export class ArgumentError extends IdentityError {
  readonly kind = 'argument' as const;

  constructor(
    public readonly argument: string,
    message: string = `${argument} is required`
  ) {
    super(message);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), argument: this.argument };
  }
}

/**
 * Shared shape for errors that mirror the remote service's error envelope.
 */
export abstract class ApiShapedError extends IdentityError implements ApiError {
  constructor(
    public readonly status: number,
    public readonly code: number,
    message: string,
    public readonly developerMessage: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      status: this.status,
      code: this.code,
      developerMessage: this.developerMessage,
    };
  }
}

/**
 * Input rejected locally by a pre-flight check the service also enforces.
 * Carries the same (status, code, message, developerMessage) the service would.
 */
export class LocalValidationError extends ApiShapedError {
  readonly kind = 'local_validation' as const;
}

/**
 * Token is structurally invalid: wrong segment count, undecodable segment,
 * non-object payload or a signing algorithm outside the allow-list.
 */
export class MalformedTokenError extends IdentityError {
  readonly kind = 'malformed_token' as const;

  constructor(
    public readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Malformed token: ${reason}`, options);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), reason: this.reason };
  }
}

/**
 * Recomputed signature does not match. Indicates a forged or corrupted token.
 */
export class SignatureInvalidError extends IdentityError {
  readonly kind = 'signature_invalid' as const;

  constructor(options?: { cause?: unknown }) {
    super('Token signature verification failed', options);
  }
}

/**
 * A decoded ID Site token failed one of the ordered claim checks.
 */
export class TokenClaimInvalidError extends ApiShapedError {
  readonly kind = 'token_claim_invalid' as const;

  constructor(
    status: number,
    code: number,
    message: string,
    developerMessage: string,
    public readonly claim: string
  ) {
    super(status, code, message, developerMessage);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), claim: this.claim };
  }
}

/**
 * Any 4xx/5xx answer from the identity service.
 */
export class ServiceError extends ApiShapedError {
  readonly kind = 'service' as const;

  constructor(
    status: number,
    code: number,
    message: string,
    developerMessage: string,
    public readonly moreInfo?: string
  ) {
    super(status, code, message, developerMessage);
  }

  static fromApiError(error: ApiError): ServiceError {
    return new ServiceError(
      error.status,
      error.code,
      error.message,
      error.developerMessage,
      error.moreInfo
    );
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      ...(this.moreInfo !== undefined && { moreInfo: this.moreInfo }),
    };
  }
}

/**
 * Network or timeout failure reported by the HTTP transport. Never retried.
 */
export class TransportError extends IdentityError {
  readonly kind = 'transport' as const;

  constructor(
    public readonly method: string,
    public readonly url: string,
    message: string,
    public readonly timedOut: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      method: this.method,
      url: this.url,
      timedOut: this.timedOut,
    };
  }
}

export type AnyIdentityError =
  | ArgumentError
  | LocalValidationError
  | MalformedTokenError
  | SignatureInvalidError
  | TokenClaimInvalidError
  | ServiceError
  | TransportError;

export function isIdentityError(error: unknown): error is AnyIdentityError {
  return error instanceof IdentityError;
}

/**
 * True when `error` is a ServiceError, optionally with the given service code.
 */
export function isServiceError(error: unknown, code?: number): error is ServiceError {
  return error instanceof ServiceError && (code === undefined || error.code === code);
}

// ============================================================================
// ID Site error catalogue
// ============================================================================

export const IdSiteErrorCodes = {
  INVALID_CALLBACK_URI: 400,
  INVALID_TOKEN: 10010,
  TOKEN_EXPIRED: 10011,
  ISSUED_IN_FUTURE: 10012,
} as const;

/**
 * Message text that is part of the service's documented contract.
 *
 * ISSUED_IN_FUTURE is also what the service reports for an audience mismatch.
 */
export const IdSiteMessages = {
  INVALID_CALLBACK_URI: 'The specified callback URI (cb_uri) is not valid',
  INVALID_CALLBACK_URI_DEVELOPER:
    'The specified callback URI (cb_uri) is not valid. Make sure the callback URI ' +
    'specified in your ID Site configuration matches the value specified.',
  TOKEN_INVALID: 'Token is invalid',
  TOKEN_EXPIRED_DEVELOPER: 'Token is no longer valid because it has expired',
  ISSUED_IN_FUTURE_DEVELOPER:
    'Token is invalid because the issued at time (iat) is after the current time',
  INVALID_EXP_DEVELOPER:
    'Token is invalid because the expiration time (exp) is not a valid timestamp',
  INVALID_CLAIMS_DEVELOPER: 'Token is invalid because a required claim is missing or malformed',
} as const;

// Predefined error types
export const IdentityErrors = {
  INVALID_CALLBACK_URI: () =>
    new LocalValidationError(
      400,
      IdSiteErrorCodes.INVALID_CALLBACK_URI,
      IdSiteMessages.INVALID_CALLBACK_URI,
      IdSiteMessages.INVALID_CALLBACK_URI_DEVELOPER
    ),

  AUDIENCE_MISMATCH: () =>
    new TokenClaimInvalidError(
      400,
      IdSiteErrorCodes.ISSUED_IN_FUTURE,
      IdSiteMessages.TOKEN_INVALID,
      IdSiteMessages.ISSUED_IN_FUTURE_DEVELOPER,
      'aud'
    ),

  INVALID_EXPIRATION: () =>
    new TokenClaimInvalidError(
      400,
      IdSiteErrorCodes.INVALID_TOKEN,
      IdSiteMessages.TOKEN_INVALID,
      IdSiteMessages.INVALID_EXP_DEVELOPER,
      'exp'
    ),

  TOKEN_EXPIRED: () =>
    new TokenClaimInvalidError(
      400,
      IdSiteErrorCodes.TOKEN_EXPIRED,
      IdSiteMessages.TOKEN_INVALID,
      IdSiteMessages.TOKEN_EXPIRED_DEVELOPER,
      'exp'
    ),

  ISSUED_IN_FUTURE: () =>
    new TokenClaimInvalidError(
      400,
      IdSiteErrorCodes.ISSUED_IN_FUTURE,
      IdSiteMessages.TOKEN_INVALID,
      IdSiteMessages.ISSUED_IN_FUTURE_DEVELOPER,
      'iat'
    ),

  INVALID_CLAIM: (claim: string) =>
    new TokenClaimInvalidError(
      400,
      IdSiteErrorCodes.INVALID_TOKEN,
      IdSiteMessages.TOKEN_INVALID,
      IdSiteMessages.INVALID_CLAIMS_DEVELOPER,
      claim
    ),

  UNEXPECTED_RESPONSE: (status: number, detail: string) =>
    new ServiceError(502, 502, 'unexpected response', `${detail} (HTTP ${status})`),
} as const;

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof IdentityError) {
    const json = error.toJSON();
    if (process.env.NODE_ENV === 'production') {
      // Developer messages can echo request details
      delete json.developerMessage;
    }
    return { type: 'IdentityError', ...json };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      // Only include stack trace in development
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}
