/**
 * Account Authenticator - basic login attempts
 *
 * Posts a CredentialRequest to `{application}/loginAttempts`. When the request
 * pins an account store, that store is sent as-is and the service alone
 * decides; a rejection is never followed by a search of other stores.
 */

import { z } from 'zod';
import type { AuthenticationResult, CredentialRequest } from './types.js';
import type { HttpTransport } from './http-transport.js';
import { assertSuccess } from './error-classifier.js';
import { encodeBasicCredentials, toAccountStorePayload } from './credential-request.js';
import { AuditService } from './audit-service.js';
import { ArgumentError, IdentityErrors, isIdentityError, sanitizeError } from '../utils/errors.js';

export const AccountSchema = z
  .object({
    href: z.string().min(1),
    email: z.string().optional(),
    username: z.string().optional(),
    givenName: z.string().optional(),
    surname: z.string().optional(),
    status: z.string().optional(),
  })
  .passthrough();

const LoginAttemptResponseSchema = z.object({ account: AccountSchema });

export interface AuthenticateAccountOptions {
  /** Ask the service to inline the account's profile fields */
  expandAccount?: boolean;
}

export interface AccountAuthenticatorOptions {
  applicationHref: string;
  transport: HttpTransport;
  auditService?: AuditService;
}

export class AccountAuthenticator {
  private readonly applicationHref: string;
  private readonly transport: HttpTransport;
  private readonly auditService: AuditService;

  constructor(options: AccountAuthenticatorOptions) {
    this.applicationHref = options.applicationHref.replace(/\/+$/, '');
    this.transport = options.transport;
    this.auditService = options.auditService ?? new AuditService();
  }

  async authenticateAccount(
    request: CredentialRequest,
    options: AuthenticateAccountOptions = {}
  ): Promise<AuthenticationResult> {
    if (!request.identifier) {
      throw new ArgumentError('identifier');
    }
    if (!request.secret) {
      throw new ArgumentError('secret');
    }

    const url = `${this.applicationHref}/loginAttempts${options.expandAccount ? '?expand=account' : ''}`;
    const json = {
      type: 'basic',
      value: encodeBasicCredentials(request),
      ...(request.accountStoreRef && { accountStore: toAccountStorePayload(request.accountStoreRef) }),
    };

    try {
      const response = assertSuccess(await this.transport.send({ method: 'POST', url, json }));
      const parsed = LoginAttemptResponseSchema.safeParse(response.body);
      if (!parsed.success) {
        throw IdentityErrors.UNEXPECTED_RESPONSE(response.status, 'Login attempt response has no account');
      }

      const { href, email, username, givenName, surname, status } = parsed.data.account;
      const result: AuthenticationResult = Object.freeze({
        account: Object.freeze({ href, email, username, givenName, surname, status }),
      });

      await this.auditService.record({
        source: 'account:login',
        action: 'login_attempt',
        subject: href,
        success: true,
        metadata: { scoped: request.accountStoreRef !== undefined },
      });

      return result;
    } catch (error) {
      await this.auditService.record({
        source: 'account:login',
        action: 'login_attempt',
        subject: request.identifier,
        success: false,
        error: isIdentityError(error) ? error.kind : 'unknown',
        reason: error instanceof Error ? error.message : undefined,
        metadata: { scoped: request.accountStoreRef !== undefined, failure: sanitizeError(error) },
      });
      throw error;
    }
  }
}
