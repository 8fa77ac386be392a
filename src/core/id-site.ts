/**
 * ID Site - hosted login and logout
 *
 * Flow:
 * 1. IdSiteRequestBuilder signs a jwtRequest token and returns the URL the
 *    caller redirects the end user to.
 * 2. The end user logs in, registers or logs out on the hosted page.
 * 3. The service redirects back to the callback URI with a signed jwtResponse.
 * 4. IdSiteCallbackVerifier checks the signature and claims and returns an
 *    IdSiteResult.
 *
 * Both halves are pure apart from audit logging; neither talks to the service.
 */

import { randomUUID } from 'crypto';
import type { IdSiteAuthorizationClaims, IdSiteResult, SigningContext } from './types.js';
import { decode, encode } from './token-codec.js';
import { toCallbackClaims, validateCallbackClaims, type ClaimCheck, CLAIM_CHECKS } from './claim-validation.js';
import { AuditService } from './audit-service.js';
import { ArgumentError, IdentityErrors, isIdentityError, sanitizeError } from '../utils/errors.js';

export const JWT_REQUEST_PARAM = 'jwtRequest';
export const JWT_RESPONSE_PARAM = 'jwtResponse';

/** Default allowance for the hosted page's clock running ahead of ours */
export const DEFAULT_CLOCK_TOLERANCE_SECONDS = 60;

// ============================================================================
// Request builder
// ============================================================================

export interface IdSiteUrlOptions {
  /** Where the hosted page sends the end user back to. Required. */
  callbackUri: string;
  /** Hosted page path to open, e.g. "/register" */
  path?: string;
  /** Opaque value echoed back in the callback */
  state?: string;
  /** Build a logout URL instead of a login URL */
  logout?: boolean;
  organizationNameKey?: string;
  showOrganizationField?: boolean;
  useSubdomain?: boolean;
}

export interface IdSiteRequestBuilderOptions {
  applicationHref: string;
  signingContext: SigningContext;
  auditService?: AuditService;
}

export class IdSiteRequestBuilder {
  private readonly applicationHref: string;
  private readonly signingContext: SigningContext;
  private readonly auditService: AuditService;

  constructor(options: IdSiteRequestBuilderOptions) {
    this.applicationHref = options.applicationHref;
    this.signingContext = options.signingContext;
    this.auditService = options.auditService ?? new AuditService();
  }

  /**
   * Build the signed `{ssoBaseUrl}/sso` (or `/sso/logout`) redirect URL.
   *
   * @throws {LocalValidationError} callbackUri is empty (status 400, code 400)
   */
  async buildAuthorizationUrl(ssoBaseUrl: string, options: IdSiteUrlOptions): Promise<string> {
    if (!ssoBaseUrl) {
      throw new ArgumentError('ssoBaseUrl');
    }

    if (!options.callbackUri || options.callbackUri.trim() === '') {
      await this.auditService.record({
        source: 'idsite:request',
        action: options.logout ? 'idsite_logout_url' : 'idsite_login_url',
        success: false,
        error: 'local_validation',
        reason: 'Empty callback URI',
      });
      throw IdentityErrors.INVALID_CALLBACK_URI();
    }

    const claims: IdSiteAuthorizationClaims = {
      iat: Math.floor(Date.now() / 1000),
      jti: randomUUID(),
      iss: this.signingContext.issuerId,
      aud: this.signingContext.issuerId,
      sub: this.applicationHref,
      cb_uri: options.callbackUri,
      path: options.path ?? '',
      state: options.state ?? '',
      ...(options.organizationNameKey !== undefined && { onk: options.organizationNameKey }),
      ...(options.showOrganizationField !== undefined && { sof: options.showOrganizationField }),
      ...(options.useSubdomain !== undefined && { usd: options.useSubdomain }),
    };

    const token = await encode(claims, this.signingContext);
    const endpoint = `${ssoBaseUrl.replace(/\/+$/, '')}/sso${options.logout ? '/logout' : ''}`;
    const query = new URLSearchParams({ [JWT_REQUEST_PARAM]: token });

    await this.auditService.record({
      source: 'idsite:request',
      action: options.logout ? 'idsite_logout_url' : 'idsite_login_url',
      success: true,
      metadata: { jti: claims.jti, path: claims.path },
    });

    return `${endpoint}?${query.toString()}`;
  }
}

// ============================================================================
// Callback verifier
// ============================================================================

export interface IdSiteCallbackVerifierOptions {
  signingContext: SigningContext;
  /** Seconds an iat may lie in the future (default: 60) */
  clockTolerance?: number;
  auditService?: AuditService;
  /** Override the ordered claim checks */
  checks?: readonly ClaimCheck[];
}

export class IdSiteCallbackVerifier {
  private readonly signingContext: SigningContext;
  private readonly clockTolerance: number;
  private readonly auditService: AuditService;
  private readonly checks: readonly ClaimCheck[];

  constructor(options: IdSiteCallbackVerifierOptions) {
    this.signingContext = options.signingContext;
    this.clockTolerance = options.clockTolerance ?? DEFAULT_CLOCK_TOLERANCE_SECONDS;
    this.auditService = options.auditService ?? new AuditService();
    this.checks = options.checks ?? CLAIM_CHECKS;
  }

  /**
   * Verify the callback URL the service redirected the end user to.
   *
   * @throws {ArgumentError} responseUrl is empty or carries no jwtResponse
   * @throws {MalformedTokenError | SignatureInvalidError} token cannot be trusted
   * @throws {TokenClaimInvalidError} a claim check failed
   */
  async handleCallback(responseUrl: string | null | undefined): Promise<IdSiteResult> {
    if (!responseUrl) {
      throw new ArgumentError('responseUrl', 'No response provided. Please provide the callback URL.');
    }

    const token = extractResponseToken(responseUrl);

    try {
      const claims = toCallbackClaims(await decode(token, this.signingContext));
      const outcome = validateCallbackClaims(claims, {
        issuerId: this.signingContext.issuerId,
        now: Math.floor(Date.now() / 1000),
        clockTolerance: this.clockTolerance,
      }, this.checks);

      if (!outcome.valid) {
        throw outcome.error;
      }

      await this.auditService.record({
        source: 'idsite:callback',
        action: 'idsite_callback',
        subject: outcome.result.accountHref,
        success: true,
        metadata: { status: outcome.result.status, isNewAccount: outcome.result.isNewAccount },
      });

      return outcome.result;
    } catch (error) {
      await this.auditService.record({
        source: 'idsite:callback',
        action: 'idsite_callback',
        success: false,
        error: isIdentityError(error) ? error.kind : 'unknown',
        reason: error instanceof Error ? error.message : undefined,
        metadata: { failure: sanitizeError(error) },
      });
      throw error;
    }
  }
}

function extractResponseToken(responseUrl: string): string {
  let url: URL;
  try {
    // Accept both absolute URLs and path-plus-query forms
    url = new URL(responseUrl, 'http://localhost');
  } catch {
    throw new ArgumentError('responseUrl', 'responseUrl is not a valid URL');
  }

  const token = url.searchParams.get(JWT_RESPONSE_PARAM);
  if (!token) {
    throw new ArgumentError('responseUrl', `responseUrl has no ${JWT_RESPONSE_PARAM} parameter`);
  }
  return token;
}
