/**
 * OAuth Grant Client
 *
 * Password and refresh grants against `{application}/oauth/token`, access
 * token validation against `{application}/authTokens/{jwt}`, and revocation by
 * deleting the token resource. Every call is one HTTP request; nothing is
 * cached and nothing is retried, since replaying a grant can consume a
 * one-time refresh token.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc6749#section-4.3
 * @see https://datatracker.ietf.org/doc/html/rfc6749#section-6
 */

import { z } from 'zod';
import type { AccessToken, AccountStoreRef, OAuthAuthenticationResult } from './types.js';
import type { HttpRequest, HttpTransport } from './http-transport.js';
import { assertSuccess } from './error-classifier.js';
import { assertAccountStore } from './credential-request.js';
import { AuditService } from './audit-service.js';
import { ArgumentError, IdentityErrors, isIdentityError, sanitizeError } from '../utils/errors.js';

// ============================================================================
// Wire schemas
// ============================================================================

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  token_type: z.string().min(1),
  expires_in: z.number().int(),
  access_token_href: z.string().min(1),
});

const RefSchema = z.object({ href: z.string().min(1) });

const AuthTokenResponseSchema = z.object({
  href: z.string().min(1),
  account: RefSchema,
  application: RefSchema,
  tenant: RefSchema,
  jwt: z.string().min(1),
  expandedJwt: z.record(z.unknown()),
});

// ============================================================================
// Types
// ============================================================================

export interface PasswordGrantOptions {
  /** Restrict the grant to one account store */
  accountStore?: AccountStoreRef;
}

/**
 * Request shapes accepted by `authenticate()`, mirroring what an HTTP
 * endpoint of the calling application receives.
 */
export type OAuthRequest =
  | {
      body: {
        grant_type: 'password';
        username: string;
        password: string;
        accountStore?: AccountStoreRef;
      };
    }
  | { body: { grant_type: 'refresh_token'; refresh_token: string } }
  | { headers: { authorization: string } };

export interface OAuthGrantClientOptions {
  applicationHref: string;
  transport: HttpTransport;
  auditService?: AuditService;
}

// ============================================================================
// OAuth Grant Client
// ============================================================================

export class OAuthGrantClient {
  private readonly applicationHref: string;
  private readonly transport: HttpTransport;
  private readonly auditService: AuditService;

  constructor(options: OAuthGrantClientOptions) {
    this.applicationHref = options.applicationHref.replace(/\/+$/, '');
    this.transport = options.transport;
    this.auditService = options.auditService ?? new AuditService();
  }

  get tokenEndpoint(): string {
    return `${this.applicationHref}/oauth/token`;
  }

  /**
   * Exchange an identifier and secret for an access/refresh token pair.
   */
  async passwordGrant(
    identifier: string,
    secret: string,
    options: PasswordGrantOptions = {}
  ): Promise<AccessToken> {
    if (!identifier) {
      throw new ArgumentError('identifier');
    }
    if (!secret) {
      throw new ArgumentError('secret');
    }

    const form: Record<string, string> = {
      grant_type: 'password',
      username: identifier,
      password: secret,
    };
    if (options.accountStore) {
      assertAccountStore(options.accountStore);
      if ('href' in options.accountStore) {
        form.accountStore = options.accountStore.href;
      } else {
        form.organizationNameKey = options.accountStore.nameKey;
      }
    }

    return this.grant('password', identifier, form);
  }

  /**
   * Exchange a refresh token for a new token pair. The caller's previous
   * AccessToken is left untouched whether or not this succeeds.
   */
  async refreshGrant(refreshToken: string): Promise<AccessToken> {
    if (!refreshToken) {
      throw new ArgumentError('refreshToken');
    }

    return this.grant('refresh_token', undefined, {
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
    });
  }

  /**
   * Ask the service whether an access token is still valid.
   *
   * @param bearer - An Authorization header value ("Bearer <jwt>") or the bare jwt
   */
  async validateAccessToken(bearer: string): Promise<OAuthAuthenticationResult> {
    const jwt = parseBearer(bearer);

    return this.execute('validate', undefined, {
      method: 'GET',
      url: `${this.applicationHref}/authTokens/${encodeURIComponent(jwt)}`,
    }, (body, status) => {
      const parsed = AuthTokenResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw IdentityErrors.UNEXPECTED_RESPONSE(status, 'Token lookup response is missing fields');
      }

      const data = parsed.data;
      return Object.freeze({
        href: data.href,
        account: Object.freeze({ href: data.account.href }),
        application: Object.freeze({ href: data.application.href }),
        tenant: Object.freeze({ href: data.tenant.href }),
        jwt: data.jwt,
        expandedJwt: data.expandedJwt,
      });
    });
  }

  /**
   * Delete the access token resource. Later validation of the same token fails.
   */
  async revokeAccessToken(token: AccessToken | string): Promise<void> {
    const href = typeof token === 'string' ? token : token.accessTokenHref;
    if (!href) {
      throw new ArgumentError('accessTokenHref');
    }

    await this.execute('revoke', undefined, { method: 'DELETE', url: href }, () => undefined);
  }

  /**
   * Dispatch a raw OAuth request: a grant body or a bearer Authorization header.
   */
  async authenticate(request: OAuthRequest): Promise<AccessToken | OAuthAuthenticationResult> {
    if ('headers' in request) {
      return this.validateAccessToken(request.headers.authorization);
    }

    const body = request.body;
    switch (body.grant_type) {
      case 'password':
        return this.passwordGrant(body.username, body.password, { accountStore: body.accountStore });
      case 'refresh_token':
        return this.refreshGrant(body.refresh_token);
      default:
        throw new ArgumentError('grant_type', 'Unsupported grant_type');
    }
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async grant(
    grantType: string,
    subject: string | undefined,
    form: Record<string, string>
  ): Promise<AccessToken> {
    return this.execute(grantType, subject, { method: 'POST', url: this.tokenEndpoint, form }, (body, status) => {
      const parsed = TokenResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw IdentityErrors.UNEXPECTED_RESPONSE(status, 'Token response is missing fields');
      }

      return Object.freeze({
        accessToken: parsed.data.access_token,
        refreshToken: parsed.data.refresh_token,
        tokenType: parsed.data.token_type,
        expiresIn: parsed.data.expires_in,
        accessTokenHref: parsed.data.access_token_href,
      });
    });
  }

  private async execute<T>(
    action: string,
    subject: string | undefined,
    request: HttpRequest,
    toResult: (body: unknown, status: number) => T
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const response = assertSuccess(await this.transport.send(request));
      const result = toResult(response.body, response.status);

      await this.auditService.record({
        source: 'oauth:grant',
        action,
        subject,
        success: true,
        metadata: { httpStatus: response.status, durationMs: Date.now() - startTime },
      });

      return result;
    } catch (error) {
      console.warn(
        `[OAuthGrantClient] ${action} failed:`,
        isIdentityError(error) ? `${error.kind} ${error.message}` : error
      );

      await this.auditService.record({
        source: 'oauth:grant',
        action,
        subject,
        success: false,
        error: isIdentityError(error) ? error.kind : 'unknown',
        reason: error instanceof Error ? error.message : undefined,
        metadata: { durationMs: Date.now() - startTime, failure: sanitizeError(error) },
      });

      throw error;
    }
  }
}

/**
 * Extract the token from "Bearer <jwt>" or accept a bare jwt.
 */
export function parseBearer(value: string): string {
  const trimmed = value?.trim() ?? '';
  if (!trimmed) {
    throw new ArgumentError('authorization');
  }

  const match = /^Bearer\s+(\S+)$/i.exec(trimmed);
  if (match) {
    return match[1];
  }

  if (/\s/.test(trimmed) || /^Bearer$/i.test(trimmed)) {
    throw new ArgumentError('authorization', 'Authorization header must use the Bearer scheme');
  }
  return trimmed;
}
