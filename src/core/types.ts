/**
 * Core Identity Client Types
 *
 * Value objects exchanged between the caller and the protocol layer. Every
 * result object handed back to the caller is frozen; the layer keeps no
 * reference to it after returning.
 */

// ============================================================================
// Resource references
// ============================================================================

/**
 * Pointer to a remote resource. Dereferencing is the resource layer's job.
 */
export interface ResourceRef {
  href: string;
}

/**
 * Account store selector for a login attempt: either a directory, group or
 * organization href, or an organization name key.
 */
export type AccountStoreRef = { href: string } | { nameKey: string };

/**
 * Account as returned by the login endpoint. Only `href` is guaranteed;
 * profile fields appear when the account was expanded.
 */
export interface AccountRef extends ResourceRef {
  email?: string;
  username?: string;
  givenName?: string;
  surname?: string;
  status?: string;
}

// ============================================================================
// Signing
// ============================================================================

export type SigningAlgorithm = 'HS256';

/**
 * Shared-secret signing context, one per client, never mutated.
 */
export interface SigningContext {
  readonly issuerId: string;
  readonly secret: Uint8Array;
  readonly algorithm: SigningAlgorithm;
}

/** Compact JWS: base64url(header).base64url(claims).base64url(signature) */
export type SignedToken = string;

/** Decoded token payload. Nothing in it is trusted until validated. */
export type Claims = Record<string, unknown>;

// ============================================================================
// Credentials
// ============================================================================

export interface CredentialRequest {
  readonly identifier: string;
  readonly secret: string;
  readonly accountStoreRef?: AccountStoreRef;
}

// ============================================================================
// ID Site
// ============================================================================

export type IdSiteStatus = 'REGISTERED' | 'AUTHENTICATED' | 'LOGOUT';

/**
 * Claims of the jwtRequest token sent to the hosted login page.
 */
export interface IdSiteAuthorizationClaims {
  iat: number;
  jti: string;
  iss: string;
  aud: string;
  sub: string;
  cb_uri: string;
  path: string;
  state: string;
  /** Organization name key to pre-select */
  onk?: string;
  /** Show the organization field on the login form */
  sof?: boolean;
  /** Use the organization's subdomain */
  usd?: boolean;
}

/**
 * Claims of the jwtResponse token, split into the fields the verifier knows
 * and everything else. `exp` stays unknown until the exp checks have run.
 */
export interface IdSiteCallbackClaims {
  iat?: unknown;
  exp?: unknown;
  aud?: unknown;
  sub?: unknown;
  path?: unknown;
  state?: unknown;
  isNewSub?: unknown;
  status?: unknown;
  extra: Record<string, unknown>;
}

export interface IdSiteResult {
  readonly accountHref: string;
  readonly status: IdSiteStatus;
  readonly state: string;
  readonly isNewAccount: boolean;
}

// ============================================================================
// Authentication results
// ============================================================================

export interface AuthenticationResult {
  readonly account: AccountRef;
}

/**
 * Result of validating an OAuth access token against the service.
 */
export interface OAuthAuthenticationResult {
  readonly href: string;
  readonly account: ResourceRef;
  readonly application: ResourceRef;
  readonly tenant: ResourceRef;
  readonly jwt: string;
  readonly expandedJwt: Record<string, unknown>;
}

export interface AccessToken {
  readonly accessToken: string;
  readonly refreshToken: string;
  readonly tokenType: string;
  readonly expiresIn: number;
  readonly accessTokenHref: string;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Error envelope returned by the identity service.
 */
export interface ApiError {
  status: number;
  code: number;
  message: string;
  developerMessage: string;
  moreInfo?: string;
}

// ============================================================================
// Audit Types
// ============================================================================

/**
 * AuditEntry represents a single audit log entry.
 *
 * All audit entries MUST include a source field naming the component that
 * produced them (e.g. 'oauth:grant', 'idsite:callback').
 */
export interface AuditEntry {
  /** Timestamp when the event occurred */
  timestamp: Date;

  /** Origin of the audit entry */
  source: string;

  /** Account href or login identifier associated with the event (if known) */
  subject?: string;

  /** Action that was performed */
  action: string;

  /** Whether the action succeeded */
  success: boolean;

  /** Human-readable reason for the result */
  reason?: string;

  /** Error kind or message if the action failed */
  error?: string;

  /** Additional metadata about the event */
  metadata?: Record<string, unknown>;
}
