/**
 * Audit Service - write-only event trail with Null Object Pattern
 *
 * Every authentication and token operation reports one AuditEntry here.
 * Disabled by default: `log()` is then a no-op, so components never need to
 * check whether auditing is configured.
 */

import type { AuditEntry } from './types.js';

// ============================================================================
// Interfaces
// ============================================================================

export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Maximum entries kept by the default in-memory storage (default: 1000) */
  maxEntries?: number;

  /** Called with all buffered entries when the in-memory storage is full */
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Storage interface for audit entries. Write-only by design: querying belongs
 * in whatever indexed store a custom implementation forwards to.
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

// ============================================================================
// In-Memory Storage Implementation
// ============================================================================

/**
 * Bounded in-memory storage. Calls onOverflow before discarding the oldest entry.
 */
export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];

  constructor(
    private readonly maxEntries: number = 1000,
    private readonly onOverflow?: (entries: AuditEntry[]) => void
  ) {}

  log(entry: AuditEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.onOverflow?.([...this.entries]);
      this.entries.shift();
    }
  }

  /**
   * Get all entries (for testing only - not exposed via AuditService)
   * @internal
   */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  /** @internal */
  clear(): void {
    this.entries = [];
  }
}

// ============================================================================
// Audit Service
// ============================================================================

/**
 * Usage:
 * ```typescript
 * const audit = new AuditService({
 *   enabled: true,
 *   onOverflow: (entries) => shipToSiem(entries),
 * });
 * const client = new IdentityClient(config, { auditService: audit });
 * ```
 */
export class AuditService {
  private readonly enabled: boolean;
  private readonly storage: AuditStorage;

  constructor(config?: AuditServiceConfig) {
    this.enabled = config?.enabled ?? false;
    this.storage =
      config?.storage ?? new InMemoryAuditStorage(config?.maxEntries, config?.onOverflow);
  }

  /**
   * Record an entry. Entries without a source are rejected.
   */
  async log(entry: AuditEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    if (!entry.source) {
      throw new Error('AuditEntry missing required field: source');
    }

    await this.storage.log({ ...entry, timestamp: entry.timestamp ?? new Date() });
  }

  /**
   * Record an entry on behalf of an operation. A storage failure is reported
   * on the console and never fails the operation being audited.
   */
  async record(entry: Omit<AuditEntry, 'timestamp'>): Promise<void> {
    try {
      await this.log({ ...entry, timestamp: new Date() });
    } catch (error) {
      console.error(
        `[AuditService] Failed to record ${entry.source}/${entry.action}:`,
        error instanceof Error ? error.message : error
      );
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Get internal storage (for testing only)
   * @internal
   */
  _getStorage(): AuditStorage {
    return this.storage;
  }
}
