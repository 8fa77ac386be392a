/**
 * File-Based Secret Provider
 *
 * Reads `{secretDir}/{logicalName}`, the layout Docker and Kubernetes secret
 * mounts use. Names that would escape `secretDir` resolve to undefined.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ISecretProvider } from '../ISecretProvider.js';

export class FileSecretProvider implements ISecretProvider {
  private readonly secretDir: string;

  constructor(secretDir: string = '/run/secrets') {
    this.secretDir = secretDir;
  }

  public async resolve(logicalName: string): Promise<string | undefined> {
    if (logicalName.includes('..') || path.isAbsolute(logicalName)) {
      return undefined;
    }

    const root = path.resolve(this.secretDir);
    const filePath = path.resolve(root, logicalName);
    if (!filePath.startsWith(root + path.sep)) {
      return undefined;
    }

    try {
      const value = (await fs.readFile(filePath, 'utf-8')).trim();
      return value === '' ? undefined : value;
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code !== 'ENOENT' && code !== 'EACCES' && code !== 'EISDIR') {
        console.warn(
          `[FileSecretProvider] Unexpected error reading ${filePath}: ${
            error instanceof Error ? error.message : String(error)
          }`
        );
      }
      return undefined;
    }
  }

  public getSecretDir(): string {
    return this.secretDir;
  }
}
