/**
 * Identity client configuration schema
 */

import { z } from 'zod';

function isDevEnvironment(): boolean {
  return process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test';
}

/**
 * URL that must use HTTPS outside development/test.
 */
const secureUrl = (what: string) =>
  z
    .string()
    .url()
    .refine((url) => isDevEnvironment() || url.startsWith('https://'), {
      message: `${what} must use HTTPS (HTTP allowed in development/test)`,
    });

export const ApiKeySchema = z.object({
  id: z.string().min(1).describe('API key id; also the issuer id of signed tokens'),
  secret: z.string().min(1).describe('API key secret; signs ID Site tokens'),
});

export const IdSiteConfigSchema = z.object({
  baseUrl: secureUrl('ID Site base URL').describe('Base URL the /sso endpoints hang off'),
  clockToleranceSeconds: z
    .number()
    .min(0)
    .max(300)
    .default(60)
    .describe('Allowed clock skew for the callback iat claim (max 5 minutes)'),
});

export const HttpConfigSchema = z.object({
  timeoutMs: z.number().int().min(1).max(120_000).default(10_000),
  userAgent: z.string().min(1).optional(),
});

export const AuditConfigSchema = z.object({
  enabled: z.boolean().default(false),
  maxEntries: z.number().int().min(1).optional(),
});

export const ClientConfigSchema = z.object({
  apiKey: ApiKeySchema,
  applicationHref: secureUrl('Application href').describe('href of the application resource'),
  idSite: IdSiteConfigSchema.optional(),
  http: HttpConfigSchema.default({}),
  audit: AuditConfigSchema.default({}),
});

export type ApiKeyConfig = z.infer<typeof ApiKeySchema>;
export type IdSiteConfig = z.infer<typeof IdSiteConfigSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type AuditConfig = z.infer<typeof AuditConfigSchema>;
export type ClientConfig = z.infer<typeof ClientConfigSchema>;
/** Configuration as written by the caller, before defaults are applied */
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
