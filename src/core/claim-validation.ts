/**
 * ID Site claim validation
 *
 * The callback token's claims are checked by an ordered list of pure checks.
 * The first failing check decides the error; later checks do not run. The
 * list is exported so each step can be inspected and tested on its own.
 */

import { z } from 'zod';
import type { Claims, IdSiteCallbackClaims, IdSiteResult, IdSiteStatus } from './types.js';
import { IdentityErrors, TokenClaimInvalidError } from '../utils/errors.js';

// ============================================================================
// Types
// ============================================================================

export interface ClaimCheckContext {
  /** Issuer id the token must be addressed to */
  issuerId: string;
  /** Current time in seconds since the epoch */
  now: number;
  /** Allowed clock skew in seconds for iat */
  clockTolerance: number;
}

export interface ClaimCheck {
  name: string;
  run(claims: IdSiteCallbackClaims, context: ClaimCheckContext): TokenClaimInvalidError | null;
}

export type ClaimValidationOutcome =
  | { valid: true; result: IdSiteResult }
  | { valid: false; failedCheck: string; error: TokenClaimInvalidError };

// ============================================================================
// Claim parsing
// ============================================================================

const KNOWN_CLAIMS = ['iat', 'exp', 'aud', 'sub', 'path', 'state', 'isNewSub', 'status'] as const;

const StatusSchema = z.enum(['REGISTERED', 'AUTHENTICATED', 'LOGOUT']);

/**
 * Split raw claims into the known fields and an `extra` map of the rest.
 */
export function toCallbackClaims(claims: Claims): IdSiteCallbackClaims {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(claims)) {
    if (!(KNOWN_CLAIMS as readonly string[]).includes(key)) {
      extra[key] = value;
    }
  }

  return {
    iat: claims.iat,
    exp: claims.exp,
    aud: claims.aud,
    sub: claims.sub,
    path: claims.path,
    state: claims.state,
    isNewSub: claims.isNewSub,
    status: claims.status,
    extra,
  };
}

function isTimestamp(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

// ============================================================================
// Checks (evaluated in this order)
// ============================================================================

export const CLAIM_CHECKS: readonly ClaimCheck[] = [
  {
    name: 'audience',
    run: (claims, { issuerId }) => (claims.aud === issuerId ? null : IdentityErrors.AUDIENCE_MISMATCH()),
  },
  {
    name: 'expirationFormat',
    run: (claims) =>
      claims.exp === undefined || isTimestamp(claims.exp) ? null : IdentityErrors.INVALID_EXPIRATION(),
  },
  {
    name: 'expiration',
    run: (claims, { now }) =>
      isTimestamp(claims.exp) && claims.exp <= now ? IdentityErrors.TOKEN_EXPIRED() : null,
  },
  {
    name: 'issuedAt',
    run: (claims, { now, clockTolerance }) => {
      if (!isTimestamp(claims.iat)) {
        return IdentityErrors.INVALID_CLAIM('iat');
      }
      return claims.iat > now + clockTolerance ? IdentityErrors.ISSUED_IN_FUTURE() : null;
    },
  },
  {
    name: 'subject',
    run: (claims) =>
      typeof claims.sub === 'string' && claims.sub.length > 0 ? null : IdentityErrors.INVALID_CLAIM('sub'),
  },
  {
    name: 'status',
    run: (claims) => (StatusSchema.safeParse(claims.status).success ? null : IdentityErrors.INVALID_CLAIM('status')),
  },
];

/**
 * Run every check in order and build the result, or report the first failure.
 */
export function validateCallbackClaims(
  claims: IdSiteCallbackClaims,
  context: ClaimCheckContext,
  checks: readonly ClaimCheck[] = CLAIM_CHECKS
): ClaimValidationOutcome {
  for (const check of checks) {
    const error = check.run(claims, context);
    if (error) {
      return { valid: false, failedCheck: check.name, error };
    }
  }

  const status = StatusSchema.safeParse(claims.status);
  if (!status.success || typeof claims.sub !== 'string') {
    // Custom check lists may omit the subject/status checks
    const claim = status.success ? 'sub' : 'status';
    return { valid: false, failedCheck: claim, error: IdentityErrors.INVALID_CLAIM(claim) };
  }

  return {
    valid: true,
    result: Object.freeze({
      accountHref: claims.sub,
      status: status.data satisfies IdSiteStatus,
      state: typeof claims.state === 'string' ? claims.state : '',
      isNewAccount: claims.isNewSub === true || claims.isNewSub === 'true',
    }),
  };
}
