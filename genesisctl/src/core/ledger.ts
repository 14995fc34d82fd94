import type { RunSummary, UnitResult, UnitStatus } from "../types/build.js";

/**
 * Per-run result ledger. Append-only, keyed by unit key; recording a unit
 * that is already present is a no-op.
 */
export class ResultLedger {
  private readonly entries = new Map<string, UnitResult>();

  /** Returns false when the unit was already recorded. */
  record(result: UnitResult): boolean {
    if (this.entries.has(result.key)) return false;
    this.entries.set(result.key, result);
    return true;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): UnitResult | undefined {
    return this.entries.get(key);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Results in the given key order; keys never recorded are left out. */
  summarize(order: readonly string[]): RunSummary {
    const results: UnitResult[] = [];
    for (const key of order) {
      const r = this.entries.get(key);
      if (r) results.push(r);
    }
    const counts: Record<UnitStatus, number> = { built: 0, skipped: 0, failed: 0, cancelled: 0 };
    for (const r of results) counts[r.status]++;
    return {
      ok: counts.failed === 0 && counts.cancelled === 0 && results.length === order.length,
      results,
      counts,
    };
  }
}
