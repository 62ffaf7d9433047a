import type { PiiMapping, PiiStore } from './types.js';

export const DEFAULT_PII_TTL_MS = (Number(process.env.PII_TTL_HOURS) || 24) * 60 * 60 * 1000;

interface StoredMapping {
  mapping: PiiMapping;
  expiresAt: number;
}

/**
 * Process-local PII store keyed by run ID. Entries expire after `ttlMs` and
 * are evicted on access.
 */
export class InMemoryPiiStore implements PiiStore {
  private readonly entries = new Map<string, StoredMapping>();

  constructor(
    private readonly ttlMs: number = DEFAULT_PII_TTL_MS,
    private readonly clock: () => number = Date.now,
  ) {}

  async put(runId: string, mapping: PiiMapping): Promise<void> {
    this.purgeExpired();
    this.entries.set(runId, {
      mapping: { ...mapping },
      expiresAt: this.clock() + this.ttlMs,
    });
  }

  async get(runId: string): Promise<PiiMapping | undefined> {
    const entry = this.entries.get(runId);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(runId);
      return undefined;
    }
    return { ...entry.mapping };
  }

  async delete(runId: string): Promise<void> {
    this.entries.delete(runId);
  }

  /** Drop every expired entry; returns how many were removed. */
  purgeExpired(): number {
    const now = this.clock();
    let removed = 0;
    for (const [runId, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(runId);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}
