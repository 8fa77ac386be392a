/**
 * Identity Client
 *
 * Entry point for applications. Owns the immutable signing context, the HTTP
 * transport and the audit service, and wires them into the protocol
 * components. Holds no mutable state, so one instance can serve concurrent
 * requests.
 *
 * ```typescript
 * const client = await IdentityClient.fromConfigFile('./config/identity-client.json');
 *
 * const url = await client.createIdSiteUrl({ callbackUri: 'https://app.example.com/callback' });
 * // ...redirect, then on the callback route:
 * const result = await client.handleIdSiteCallback(req.url);
 * ```
 */

import type {
  AccessToken,
  AccountRef,
  AccountStoreRef,
  AuthenticationResult,
  CredentialRequest,
  IdSiteResult,
  OAuthAuthenticationResult,
  SigningContext,
} from './core/types.js';
import { createSigningContext } from './core/token-codec.js';
import { FetchTransport, type HttpTransport } from './core/http-transport.js';
import { AuditService } from './core/audit-service.js';
import { IdSiteRequestBuilder, IdSiteCallbackVerifier, type IdSiteUrlOptions } from './core/id-site.js';
import { OAuthGrantClient, type OAuthRequest, type PasswordGrantOptions } from './core/oauth-grant-client.js';
import { AccountAuthenticator, type AuthenticateAccountOptions } from './core/account-authenticator.js';
import { AccountRecovery } from './core/account-recovery.js';
import { ClientConfigSchema, type ClientConfig, type ClientConfigInput } from './config/schema.js';
import { ConfigManager, type ConfigManagerOptions } from './config/manager.js';
import { ArgumentError } from './utils/errors.js';

export interface IdentityClientOptions {
  /** Replaces the default fetch transport (tests, proxies, custom TLS) */
  transport?: HttpTransport;
  /** Replaces the audit service built from `config.audit` */
  auditService?: AuditService;
}

export class IdentityClient {
  readonly config: ClientConfig;
  private readonly signingContext: SigningContext;
  private readonly auditService: AuditService;
  private readonly idSiteRequests: IdSiteRequestBuilder;
  private readonly idSiteCallbacks: IdSiteCallbackVerifier;
  private readonly oauth: OAuthGrantClient;
  private readonly accounts: AccountAuthenticator;
  private readonly recovery: AccountRecovery;

  constructor(config: ClientConfigInput, options: IdentityClientOptions = {}) {
    this.config = ClientConfigSchema.parse(config);
    const { apiKey, applicationHref, http, audit, idSite } = this.config;

    this.signingContext = createSigningContext(apiKey.id, apiKey.secret);
    this.auditService =
      options.auditService ?? new AuditService({ enabled: audit.enabled, maxEntries: audit.maxEntries });

    const transport =
      options.transport ??
      new FetchTransport({ apiKey, timeoutMs: http.timeoutMs, userAgent: http.userAgent });
    const shared = { applicationHref, transport, auditService: this.auditService };

    this.idSiteRequests = new IdSiteRequestBuilder({
      applicationHref,
      signingContext: this.signingContext,
      auditService: this.auditService,
    });
    this.idSiteCallbacks = new IdSiteCallbackVerifier({
      signingContext: this.signingContext,
      clockTolerance: idSite?.clockToleranceSeconds,
      auditService: this.auditService,
    });
    this.oauth = new OAuthGrantClient(shared);
    this.accounts = new AccountAuthenticator(shared);
    this.recovery = new AccountRecovery(shared);
  }

  /**
   * Load configuration through ConfigManager (secrets resolved) and build a client.
   */
  static async fromConfigFile(
    configPath?: string,
    options: IdentityClientOptions & ConfigManagerOptions = {}
  ): Promise<IdentityClient> {
    const manager = new ConfigManager(options);
    return new IdentityClient(await manager.loadConfig(configPath), options);
  }

  getSigningContext(): SigningContext {
    return this.signingContext;
  }

  getAuditService(): AuditService {
    return this.auditService;
  }

  // ==========================================================================
  // ID Site
  // ==========================================================================

  /**
   * Build the hosted login (or logout) redirect URL.
   *
   * @param ssoBaseUrl - Defaults to `config.idSite.baseUrl`
   */
  async createIdSiteUrl(options: IdSiteUrlOptions, ssoBaseUrl?: string): Promise<string> {
    const baseUrl = ssoBaseUrl ?? this.config.idSite?.baseUrl;
    if (!baseUrl) {
      throw new ArgumentError('ssoBaseUrl', 'ssoBaseUrl is required when config.idSite is not set');
    }
    return this.idSiteRequests.buildAuthorizationUrl(baseUrl, options);
  }

  async handleIdSiteCallback(responseUrl: string | null | undefined): Promise<IdSiteResult> {
    return this.idSiteCallbacks.handleCallback(responseUrl);
  }

  // ==========================================================================
  // Accounts
  // ==========================================================================

  async authenticateAccount(
    request: CredentialRequest,
    options?: AuthenticateAccountOptions
  ): Promise<AuthenticationResult> {
    return this.accounts.authenticateAccount(request, options);
  }

  async sendPasswordResetEmail(email: string, accountStore?: AccountStoreRef): Promise<AccountRef> {
    return this.recovery.sendPasswordResetEmail(email, accountStore);
  }

  async verifyPasswordResetToken(token: string): Promise<AccountRef> {
    return this.recovery.verifyPasswordResetToken(token);
  }

  async resetPassword(token: string, password: string): Promise<AccountRef> {
    return this.recovery.resetPassword(token, password);
  }

  async resendVerificationEmail(login: string, accountStore?: AccountStoreRef): Promise<void> {
    return this.recovery.resendVerificationEmail(login, accountStore);
  }

  // ==========================================================================
  // OAuth
  // ==========================================================================

  async passwordGrant(
    identifier: string,
    secret: string,
    options?: PasswordGrantOptions
  ): Promise<AccessToken> {
    return this.oauth.passwordGrant(identifier, secret, options);
  }

  async refreshGrant(refreshToken: string): Promise<AccessToken> {
    return this.oauth.refreshGrant(refreshToken);
  }

  async validateAccessToken(bearer: string): Promise<OAuthAuthenticationResult> {
    return this.oauth.validateAccessToken(bearer);
  }

  async revokeAccessToken(token: AccessToken | string): Promise<void> {
    return this.oauth.revokeAccessToken(token);
  }

  async oauthAuthenticate(request: OAuthRequest): Promise<AccessToken | OAuthAuthenticationResult> {
    return this.oauth.authenticate(request);
  }
}
