/**
 * Token Codec - compact HS256 JWS encoding and decoding
 *
 * Signs and verifies `header.claims.signature` tokens with the client's shared
 * secret. The signing context is always passed in explicitly; the codec holds
 * no state.
 *
 * Only HS256 is accepted. A token whose header names any other algorithm
 * (including "none") is rejected before its signature is looked at.
 */

import { CompactSign, compactVerify, errors } from 'jose';
import type { Claims, SignedToken, SigningAlgorithm, SigningContext } from './types.js';
import { ArgumentError, MalformedTokenError, SignatureInvalidError } from '../utils/errors.js';

export const ALLOWED_ALGORITHMS: readonly SigningAlgorithm[] = ['HS256'];

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Create the immutable signing context for an API key.
 */
export function createSigningContext(issuerId: string, secret: string | Uint8Array): SigningContext {
  if (!issuerId) {
    throw new ArgumentError('issuerId');
  }

  const secretBytes = typeof secret === 'string' ? encoder.encode(secret) : Uint8Array.from(secret);
  if (secretBytes.byteLength === 0) {
    throw new ArgumentError('secret');
  }

  return Object.freeze({
    issuerId,
    secret: secretBytes,
    algorithm: 'HS256' as const,
  });
}

/**
 * Sign `claims` into a compact token.
 */
export async function encode<T extends object>(claims: T, context: SigningContext): Promise<SignedToken> {
  return new CompactSign(encoder.encode(JSON.stringify(claims)))
    .setProtectedHeader({ alg: context.algorithm, typ: 'JWT' })
    .sign(context.secret);
}

/**
 * Verify the signature of `token` and return its claims.
 *
 * @throws {MalformedTokenError} Wrong segment count, undecodable segment,
 *   non-object payload or disallowed algorithm
 * @throws {SignatureInvalidError} Signature does not match
 */
export async function decode(token: SignedToken, context: SigningContext): Promise<Claims> {
  if (token.split('.').length !== 3) {
    throw new MalformedTokenError('expected three dot-separated segments');
  }

  let payload: Uint8Array;
  try {
    ({ payload } = await compactVerify(token, context.secret, {
      algorithms: [...ALLOWED_ALGORITHMS],
    }));
  } catch (error) {
    throw translateJoseError(error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(decoder.decode(payload));
  } catch (error) {
    throw new MalformedTokenError('claims segment is not valid JSON', { cause: error });
  }

  if (!isClaimsObject(parsed)) {
    throw new MalformedTokenError('claims segment is not a JSON object');
  }

  return parsed;
}

function isClaimsObject(value: unknown): value is Claims {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function translateJoseError(error: unknown): Error {
  if (error instanceof errors.JWSSignatureVerificationFailed) {
    return new SignatureInvalidError({ cause: error });
  }

  if (error instanceof errors.JOSEAlgNotAllowed || error instanceof errors.JOSENotSupported) {
    return new MalformedTokenError('signing algorithm not allowed', { cause: error });
  }

  if (error instanceof errors.JOSEError) {
    return new MalformedTokenError(error.message, { cause: error });
  }

  return new MalformedTokenError('token could not be decoded', { cause: error });
}
