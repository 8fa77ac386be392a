/**
 * Secret Resolver
 *
 * Walks a raw configuration object and replaces every `{"$secret": "NAME"}`
 * descriptor with the value from the first provider in the chain that has it.
 * Runs before schema validation, so the API key secret never has to be
 * written into the configuration file.
 *
 * ```typescript
 * const resolver = new SecretResolver();
 * resolver.addProvider(new FileSecretProvider('/run/secrets'));
 * resolver.addProvider(new EnvProvider());
 * await resolver.resolveSecrets(rawConfig); // modified in place
 * ```
 */

import { type ISecretProvider, isSecretProvider } from './ISecretProvider.js';
import type { AuditService } from '../../core/audit-service.js';

export interface SecretResolverConfig {
  /** Optional audit service for logging secret access */
  auditService?: AuditService;

  /** Throw when a descriptor cannot be resolved (default: true) */
  failFast?: boolean;
}

type SecretDescriptor = { $secret: string };

export class SecretResolver {
  private providers: ISecretProvider[] = [];
  private readonly auditService?: AuditService;
  private readonly failFast: boolean;

  constructor(config?: SecretResolverConfig) {
    this.auditService = config?.auditService;
    this.failFast = config?.failFast ?? true;
  }

  /**
   * Append a provider. Providers are queried in insertion order.
   */
  public addProvider(provider: ISecretProvider): void {
    if (!isSecretProvider(provider)) {
      throw new Error('Provider must implement ISecretProvider interface');
    }
    this.providers.push(provider);
  }

  /**
   * Resolve every descriptor in `config`, in place.
   *
   * @throws Error if failFast is set and a descriptor cannot be resolved
   */
  public async resolveSecrets(config: unknown): Promise<void> {
    await this.resolveNode(config, 'config');
  }

  public getProviders(): ISecretProvider[] {
    return [...this.providers];
  }

  public clearProviders(): void {
    this.providers = [];
  }

  private async resolveNode(node: unknown, path: string): Promise<void> {
    if (Array.isArray(node)) {
      for (let i = 0; i < node.length; i++) {
        node[i] = await this.resolveChild(node[i], `${path}[${i}]`);
      }
      return;
    }

    if (isRecord(node)) {
      for (const key of Object.keys(node)) {
        node[key] = await this.resolveChild(node[key], `${path}.${key}`);
      }
    }
  }

  private async resolveChild(child: unknown, path: string): Promise<unknown> {
    if (!isSecretDescriptor(child)) {
      await this.resolveNode(child, path);
      return child;
    }

    const value = await this.resolveSecret(child.$secret, path);
    if (value !== undefined) {
      return value;
    }

    const message = `Secret "${child.$secret}" at path "${path}" could not be resolved by any provider.`;
    if (this.failFast) {
      throw new Error(`[SecretResolver] ${message}`);
    }
    console.warn(`[SecretResolver] ${message}`);
    return child;
  }

  private async resolveSecret(logicalName: string, path: string): Promise<string | undefined> {
    for (const provider of this.providers) {
      try {
        const value = await provider.resolve(logicalName);
        if (value !== undefined) {
          await this.auditService?.record({
            source: 'config:secrets',
            action: `resolve:${logicalName}`,
            success: true,
            metadata: { provider: provider.constructor.name, configPath: path },
          });
          return value;
        }
      } catch (error) {
        console.warn(
          `[SecretResolver] Provider ${provider.constructor.name} failed to resolve "${logicalName}": ${
            error instanceof Error ? error.message : 'Unknown error'
          }`
        );
      }
    }

    await this.auditService?.record({
      source: 'config:secrets',
      action: `resolve:${logicalName}`,
      success: false,
      error: 'No provider could resolve this secret',
      metadata: { configPath: path },
    });
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSecretDescriptor(value: unknown): value is SecretDescriptor {
  return (
    isRecord(value) &&
    typeof value.$secret === 'string' &&
    value.$secret.length > 0 &&
    Object.keys(value).length === 1
  );
}
