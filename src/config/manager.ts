import { readFile } from 'fs/promises';
import { ZodError } from 'zod';
import { ClientConfigSchema, type ClientConfig } from './schema.js';
import { SecretResolver, FileSecretProvider, EnvProvider } from './secrets/index.js';
import type { AuditService } from '../core/audit-service.js';

export const DEFAULT_CONFIG_PATH = './config/identity-client.json';

export interface ConfigManagerOptions {
  /** AuditService instance for logging secret access */
  auditService?: AuditService;
  /** Directory for file-based secrets (default: '/run/secrets') */
  secretsDir?: string;
  /** Environment to read CONFIG_PATH and env secrets from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Loads, resolves and validates the client configuration.
 *
 * Loading order: read JSON → resolve `{"$secret": "NAME"}` descriptors
 * (files first, then environment) → validate with ClientConfigSchema.
 */
export class ConfigManager {
  private config: ClientConfig | null = null;
  private readonly env: NodeJS.ProcessEnv;
  private readonly secretResolver: SecretResolver;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;

    this.secretResolver = new SecretResolver({
      auditService: options.auditService,
      failFast: true,
    });
    this.secretResolver.addProvider(new FileSecretProvider(options.secretsDir ?? '/run/secrets'));
    this.secretResolver.addProvider(new EnvProvider(this.env));
  }

  async loadConfig(configPath?: string): Promise<ClientConfig> {
    if (this.config) {
      return this.config;
    }

    const path = configPath ?? this.env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;

    try {
      const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
      this.config = await this.resolveAndValidate(raw);
      console.log(`[ConfigManager] Configuration loaded from ${path}`);
      return this.config;
    } catch (error) {
      throw new Error(`Failed to load configuration: ${describe(error)}`, { cause: error });
    }
  }

  /**
   * Resolve and validate an in-memory configuration object.
   */
  async loadFromObject(raw: unknown): Promise<ClientConfig> {
    try {
      this.config = await this.resolveAndValidate(structuredClone(raw));
      return this.config;
    } catch (error) {
      throw new Error(`Invalid configuration: ${describe(error)}`, { cause: error });
    }
  }

  getConfig(): ClientConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  async reloadConfig(configPath?: string): Promise<ClientConfig> {
    this.config = null;
    return this.loadConfig(configPath);
  }

  getSecretResolver(): SecretResolver {
    return this.secretResolver;
  }

  private async resolveAndValidate(raw: unknown): Promise<ClientConfig> {
    await this.secretResolver.resolveSecrets(raw);
    const config = ClientConfigSchema.parse(raw);

    if (this.env.NODE_ENV === 'production' && !config.audit.enabled) {
      console.warn('[ConfigManager] Audit logging is disabled in a production environment');
    }

    return config;
  }
}

function describe(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}
