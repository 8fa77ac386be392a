export { ConfigManager, DEFAULT_CONFIG_PATH, type ConfigManagerOptions } from './manager.js';
export {
  ClientConfigSchema,
  ApiKeySchema,
  IdSiteConfigSchema,
  HttpConfigSchema,
  AuditConfigSchema,
  type ClientConfig,
  type ClientConfigInput,
  type ApiKeyConfig,
  type IdSiteConfig,
  type HttpConfig,
  type AuditConfig,
} from './schema.js';
export * from './secrets/index.js';
