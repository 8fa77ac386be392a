/**
 * Core protocol layer public API
 */

export { createCredentialRequest, encodeBasicCredentials } from './credential-request.js';
export { createSigningContext, encode, decode, ALLOWED_ALGORITHMS } from './token-codec.js';
export {
  CLAIM_CHECKS,
  toCallbackClaims,
  validateCallbackClaims,
  type ClaimCheck,
  type ClaimCheckContext,
  type ClaimValidationOutcome,
} from './claim-validation.js';
export {
  IdSiteRequestBuilder,
  IdSiteCallbackVerifier,
  JWT_REQUEST_PARAM,
  JWT_RESPONSE_PARAM,
  DEFAULT_CLOCK_TOLERANCE_SECONDS,
  type IdSiteUrlOptions,
  type IdSiteRequestBuilderOptions,
  type IdSiteCallbackVerifierOptions,
} from './id-site.js';
export {
  OAuthGrantClient,
  parseBearer,
  type OAuthRequest,
  type PasswordGrantOptions,
  type OAuthGrantClientOptions,
} from './oauth-grant-client.js';
export {
  AccountAuthenticator,
  type AuthenticateAccountOptions,
  type AccountAuthenticatorOptions,
} from './account-authenticator.js';
export { AccountRecovery, type AccountRecoveryOptions } from './account-recovery.js';
export {
  classifyResponse,
  assertSuccess,
  toApiError,
  isErrorResponse,
  UNKNOWN_ERROR_MESSAGE,
} from './error-classifier.js';
export {
  FetchTransport,
  DEFAULT_TIMEOUT_MS,
  type HttpTransport,
  type HttpRequest,
  type HttpResponse,
  type HttpMethod,
  type FetchTransportOptions,
} from './http-transport.js';
export {
  AuditService,
  InMemoryAuditStorage,
  type AuditServiceConfig,
  type AuditStorage,
} from './audit-service.js';

export type {
  ResourceRef,
  AccountRef,
  AccountStoreRef,
  SigningAlgorithm,
  SigningContext,
  SignedToken,
  Claims,
  CredentialRequest,
  IdSiteStatus,
  IdSiteAuthorizationClaims,
  IdSiteCallbackClaims,
  IdSiteResult,
  AuthenticationResult,
  OAuthAuthenticationResult,
  AccessToken,
  ApiError,
  AuditEntry,
} from './types.js';
