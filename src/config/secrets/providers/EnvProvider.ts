import type { ISecretProvider } from '../ISecretProvider.js';

/**
 * Resolves secrets from environment variables. Intended as the fallback after
 * FileSecretProvider.
 */
export class EnvProvider implements ISecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  public async resolve(logicalName: string): Promise<string | undefined> {
    const value = this.env[logicalName];

    if (value === undefined || value.trim() === '') {
      return undefined;
    }

    return value.trim();
  }
}
