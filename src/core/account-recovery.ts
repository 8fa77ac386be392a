/**
 * Account Recovery - password reset and verification emails
 *
 *   sendPasswordResetEmail    POST {application}/passwordResetTokens
 *   verifyPasswordResetToken  GET  {application}/passwordResetTokens/{token}
 *   resetPassword             POST {application}/passwordResetTokens/{token}
 *   resendVerificationEmail   POST {application}/verificationEmails
 */

import { z } from 'zod';
import type { AccountRef, AccountStoreRef } from './types.js';
import type { HttpRequest, HttpTransport } from './http-transport.js';
import { assertSuccess } from './error-classifier.js';
import { assertAccountStore, toAccountStorePayload } from './credential-request.js';
import { AccountSchema } from './account-authenticator.js';
import { AuditService } from './audit-service.js';
import { ArgumentError, IdentityErrors, isIdentityError, sanitizeError } from '../utils/errors.js';

const PasswordResetTokenSchema = z.object({ account: AccountSchema });

export interface AccountRecoveryOptions {
  applicationHref: string;
  transport: HttpTransport;
  auditService?: AuditService;
}

export class AccountRecovery {
  private readonly applicationHref: string;
  private readonly transport: HttpTransport;
  private readonly auditService: AuditService;

  constructor(options: AccountRecoveryOptions) {
    this.applicationHref = options.applicationHref.replace(/\/+$/, '');
    this.transport = options.transport;
    this.auditService = options.auditService ?? new AuditService();
  }

  /**
   * Email a password reset link to the account with this address.
   * Fails with a ServiceError when no such account is reachable.
   */
  async sendPasswordResetEmail(email: string, accountStore?: AccountStoreRef): Promise<AccountRef> {
    if (!email) {
      throw new ArgumentError('email');
    }

    return this.accountRequest('password_reset_email', {
      method: 'POST',
      url: `${this.applicationHref}/passwordResetTokens`,
      json: { email, ...this.accountStoreField(accountStore) },
    });
  }

  /**
   * Look up the account a password reset token was issued for.
   */
  async verifyPasswordResetToken(token: string): Promise<AccountRef> {
    if (!token) {
      throw new ArgumentError('token');
    }

    return this.accountRequest('password_reset_verify', {
      method: 'GET',
      url: this.resetTokenUrl(token),
    });
  }

  /**
   * Set a new password using a password reset token.
   */
  async resetPassword(token: string, password: string): Promise<AccountRef> {
    if (!token) {
      throw new ArgumentError('token');
    }
    if (!password) {
      throw new ArgumentError('password');
    }

    return this.accountRequest('password_reset', {
      method: 'POST',
      url: this.resetTokenUrl(token),
      json: { password },
    });
  }

  /**
   * Send the account verification email again.
   *
   * @param login - Username or email of the unverified account
   */
  async resendVerificationEmail(login: string, accountStore?: AccountStoreRef): Promise<void> {
    if (!login) {
      throw new ArgumentError('login');
    }

    await this.send(
      'verification_email',
      {
        method: 'POST',
        url: `${this.applicationHref}/verificationEmails`,
        json: { login, ...this.accountStoreField(accountStore) },
      },
      () => undefined
    );
  }

  private resetTokenUrl(token: string): string {
    return `${this.applicationHref}/passwordResetTokens/${encodeURIComponent(token)}`;
  }

  private accountStoreField(accountStore?: AccountStoreRef): { accountStore?: Record<string, string> } {
    if (!accountStore) {
      return {};
    }
    assertAccountStore(accountStore);
    return { accountStore: toAccountStorePayload(accountStore) };
  }

  private accountRequest(action: string, request: HttpRequest): Promise<AccountRef> {
    return this.send(action, request, (body, status) => {
      const parsed = PasswordResetTokenSchema.safeParse(body);
      if (!parsed.success) {
        throw IdentityErrors.UNEXPECTED_RESPONSE(status, 'Password reset response has no account');
      }

      const { href, email, username, givenName, surname } = parsed.data.account;
      return Object.freeze({ href, email, username, givenName, surname });
    });
  }

  private async send<T>(
    action: string,
    request: HttpRequest,
    toResult: (body: unknown, status: number) => T
  ): Promise<T> {
    try {
      const response = assertSuccess(await this.transport.send(request));
      const result = toResult(response.body, response.status);
      await this.auditService.record({ source: 'account:recovery', action, success: true });
      return result;
    } catch (error) {
      await this.auditService.record({
        source: 'account:recovery',
        action,
        success: false,
        error: isIdentityError(error) ? error.kind : 'unknown',
        reason: error instanceof Error ? error.message : undefined,
        metadata: { failure: sanitizeError(error) },
      });
      throw error;
    }
  }
}
