import type { AccountStoreRef, CredentialRequest } from './types.js';
import { ArgumentError } from '../utils/errors.js';

/**
 * Build an immutable login attempt.
 *
 * Without `accountStore` the service searches every account store mapped to
 * the application; with it, only that directory, group or organization.
 */
export function createCredentialRequest(
  identifier: string,
  secret: string,
  accountStore?: AccountStoreRef
): CredentialRequest {
  if (!identifier) {
    throw new ArgumentError('identifier');
  }
  if (!secret) {
    throw new ArgumentError('secret');
  }
  if (accountStore) {
    assertAccountStore(accountStore);
  }

  return Object.freeze({
    identifier,
    secret,
    ...(accountStore && { accountStoreRef: Object.freeze({ ...accountStore }) }),
  });
}

export function assertAccountStore(accountStore: AccountStoreRef): void {
  const value = 'href' in accountStore ? accountStore.href : accountStore.nameKey;
  if (!value) {
    throw new ArgumentError('accountStore', 'accountStore must carry a non-empty href or nameKey');
  }
}

/**
 * Wire form of an account store selector.
 */
export function toAccountStorePayload(accountStore: AccountStoreRef): Record<string, string> {
  return 'href' in accountStore ? { href: accountStore.href } : { nameKey: accountStore.nameKey };
}

/**
 * `value` field of a basic login attempt: base64("identifier:secret").
 */
export function encodeBasicCredentials(request: CredentialRequest): string {
  return Buffer.from(`${request.identifier}:${request.secret}`, 'utf-8').toString('base64');
}
