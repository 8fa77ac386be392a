/**
 * ID Site Tests
 *
 * Request URL construction and callback verification.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { IdSiteCallbackVerifier, IdSiteRequestBuilder } from '../../../src/core/id-site.js';
import { createSigningContext, decode } from '../../../src/core/token-codec.js';
import {
  ArgumentError,
  IdSiteMessages,
  LocalValidationError,
  SignatureInvalidError,
  TokenClaimInvalidError,
} from '../../../src/utils/errors.js';
import { buildCallbackUrl, createTestAudit, type TestAudit } from '../../../src/testing/index.js';

const APP_HREF = 'https://api.example.com/v1/applications/test-app';
const ACCOUNT_HREF = 'https://api.example.com/v1/accounts/a1';
const CALLBACK = 'https://app.example.com/callback';
const context = createSigningContext('test-key-id', 'test-secret');

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

describe('IdSiteRequestBuilder', () => {
  let audit: TestAudit;
  let builder: IdSiteRequestBuilder;

  beforeEach(() => {
    audit = createTestAudit();
    builder = new IdSiteRequestBuilder({
      applicationHref: APP_HREF,
      signingContext: context,
      auditService: audit.auditService,
    });
  });

  async function requestClaims(url: string) {
    const token = new URL(url).searchParams.get('jwtRequest');
    expect(token).not.toBeNull();
    return decode(token ?? '', context);
  }

  it('should build a signed /sso URL', async () => {
    const url = await builder.buildAuthorizationUrl('https://login.example.com/', {
      callbackUri: CALLBACK,
      path: '/register',
      state: 'abc',
    });

    expect(url.startsWith('https://login.example.com/sso?jwtRequest=')).toBe(true);

    const claims = await requestClaims(url);
    expect(claims).toMatchObject({
      iss: 'test-key-id',
      aud: 'test-key-id',
      sub: APP_HREF,
      cb_uri: CALLBACK,
      path: '/register',
      state: 'abc',
    });
    expect(typeof claims.jti).toBe('string');
    expect(typeof claims.iat).toBe('number');
    expect(claims).not.toHaveProperty('onk');
  });

  it('should default path and state to empty strings', async () => {
    const claims = await requestClaims(await builder.buildAuthorizationUrl('https://login.example.com', { callbackUri: CALLBACK }));

    expect(claims.path).toBe('');
    expect(claims.state).toBe('');
  });

  it('should issue a fresh jti per URL', async () => {
    const first = await requestClaims(await builder.buildAuthorizationUrl('https://login.example.com', { callbackUri: CALLBACK }));
    const second = await requestClaims(await builder.buildAuthorizationUrl('https://login.example.com', { callbackUri: CALLBACK }));

    expect(first.jti).not.toBe(second.jti);
  });

  it('should include organization options when given', async () => {
    const claims = await requestClaims(
      await builder.buildAuthorizationUrl('https://login.example.com', {
        callbackUri: CALLBACK,
        organizationNameKey: 'acme',
        showOrganizationField: true,
        useSubdomain: false,
      })
    );

    expect(claims).toMatchObject({ onk: 'acme', sof: true, usd: false });
  });

  it('should build a logout URL', async () => {
    const url = await builder.buildAuthorizationUrl('https://login.example.com', {
      callbackUri: CALLBACK,
      logout: true,
    });

    expect(url.startsWith('https://login.example.com/sso/logout?jwtRequest=')).toBe(true);
  });

  it('should reject an empty callback URI with the service error shape', async () => {
    const error = await builder
      .buildAuthorizationUrl('https://login.example.com', { callbackUri: '' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LocalValidationError);
    expect(error).toMatchObject({
      status: 400,
      code: 400,
      message: IdSiteMessages.INVALID_CALLBACK_URI,
      developerMessage: IdSiteMessages.INVALID_CALLBACK_URI_DEVELOPER,
    });
    expect(audit.entries()).toHaveLength(1);
    expect(audit.entries()[0]).toMatchObject({
      source: 'idsite:request',
      success: false,
      error: 'local_validation',
    });
  });

  it('should treat a blank callback URI as empty', async () => {
    await expect(
      builder.buildAuthorizationUrl('https://login.example.com', { callbackUri: '   ' })
    ).rejects.toBeInstanceOf(LocalValidationError);
  });

  it('should require an SSO base URL', async () => {
    await expect(builder.buildAuthorizationUrl('', { callbackUri: CALLBACK })).rejects.toBeInstanceOf(ArgumentError);
  });
});

describe('IdSiteCallbackVerifier', () => {
  let audit: TestAudit;
  let verifier: IdSiteCallbackVerifier;

  beforeEach(() => {
    audit = createTestAudit();
    verifier = new IdSiteCallbackVerifier({ signingContext: context, auditService: audit.auditService });
  });

  function callbackClaims(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
      iss: 'https://login.example.com',
      aud: 'test-key-id',
      sub: ACCOUNT_HREF,
      iat: nowSeconds(),
      exp: nowSeconds() + 60,
      status: 'AUTHENTICATED',
      state: 'abc',
      isNewSub: false,
      ...overrides,
    };
  }

  it('should reject a missing response', async () => {
    await expect(verifier.handleCallback(null)).rejects.toBeInstanceOf(ArgumentError);
    await expect(verifier.handleCallback(undefined)).rejects.toBeInstanceOf(ArgumentError);
    await expect(verifier.handleCallback('')).rejects.toBeInstanceOf(ArgumentError);
  });

  it('should reject a URL without jwtResponse', async () => {
    const error = await verifier.handleCallback(`${CALLBACK}?foo=1`).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ArgumentError);
    expect(error).toMatchObject({ argument: 'responseUrl' });
  });

  it('should return the result of a valid callback', async () => {
    const url = await buildCallbackUrl(callbackClaims(), context);

    await expect(verifier.handleCallback(url)).resolves.toEqual({
      accountHref: ACCOUNT_HREF,
      status: 'AUTHENTICATED',
      state: 'abc',
      isNewAccount: false,
    });
    expect(audit.entries()).toHaveLength(1);
    expect(audit.entries()[0]).toMatchObject({
      source: 'idsite:callback',
      subject: ACCOUNT_HREF,
      success: true,
    });
  });

  it('should report a registration without state', async () => {
    const url = await buildCallbackUrl(
      callbackClaims({ status: 'REGISTERED', isNewSub: true, state: undefined }),
      context
    );

    const result = await verifier.handleCallback(url);

    expect(result).toEqual({ accountHref: ACCOUNT_HREF, status: 'REGISTERED', state: '', isNewAccount: true });
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('should accept a path-and-query callback', async () => {
    const url = await buildCallbackUrl(callbackClaims({ status: 'LOGOUT' }), context, '/callback');

    await expect(verifier.handleCallback(url)).resolves.toMatchObject({ status: 'LOGOUT' });
  });

  it('should reject an expired token with code 10011', async () => {
    const url = await buildCallbackUrl(callbackClaims({ exp: nowSeconds() - 10 }), context);
    const error = await verifier.handleCallback(url).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TokenClaimInvalidError);
    expect(error).toMatchObject({ status: 400, code: 10011, message: IdSiteMessages.TOKEN_INVALID });
    expect(audit.entries()[0]).toMatchObject({ success: false, error: 'token_claim_invalid' });
  });

  it('should reject a token for another issuer with code 10012', async () => {
    const url = await buildCallbackUrl(callbackClaims({ aud: 'other-key-id' }), context);

    await expect(verifier.handleCallback(url)).rejects.toMatchObject({
      code: 10012,
      message: IdSiteMessages.TOKEN_INVALID,
      developerMessage: IdSiteMessages.ISSUED_IN_FUTURE_DEVELOPER,
    });
  });

  it('should reject a token issued in the future', async () => {
    const url = await buildCallbackUrl(callbackClaims({ iat: nowSeconds() + 3600, exp: nowSeconds() + 7200 }), context);

    await expect(verifier.handleCallback(url)).rejects.toMatchObject({ code: 10012, claim: 'iat' });
  });

  it('should honour a custom clock tolerance', async () => {
    const strict = new IdSiteCallbackVerifier({ signingContext: context, clockTolerance: 0 });
    const url = await buildCallbackUrl(callbackClaims({ iat: nowSeconds() + 30 }), context);

    await expect(verifier.handleCallback(url)).resolves.toMatchObject({ status: 'AUTHENTICATED' });
    await expect(strict.handleCallback(url)).rejects.toMatchObject({ code: 10012 });
  });

  it('should reject an invalid exp with code 10010', async () => {
    const url = await buildCallbackUrl(callbackClaims({ exp: 'tomorrow' }), context);

    await expect(verifier.handleCallback(url)).rejects.toMatchObject({ code: 10010, claim: 'exp' });
  });

  it('should reject a token signed with another secret', async () => {
    const url = await buildCallbackUrl(callbackClaims(), createSigningContext('test-key-id', 'other-secret'));

    await expect(verifier.handleCallback(url)).rejects.toBeInstanceOf(SignatureInvalidError);
    expect(audit.entries()[0]).toMatchObject({ success: false, error: 'signature_invalid' });
  });
});
