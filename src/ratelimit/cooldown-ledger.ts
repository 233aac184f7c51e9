/**
 * Cooldown ledger: how many request slots stay reserved until which moment.
 *
 * Entries are kept sorted by expiry. Two expiries closer than
 * `DROP_ROUND_MS` share one entry, so a burst of responses from the same
 * rate limit window costs one entry instead of one per request.
 */

/** Expiries closer than this are merged */
export const DROP_ROUND_MS = 200;

export interface CooldownEntry {
  /** Monotonic time (ms) at which the slots are freed */
  drop: number;
  /** Number of slots freed at `drop` */
  allocates: number;
}

export class CooldownLedger {
  private readonly entries: CooldownEntry[] = [];

  /**
   * Records `allocates` slots that free up at `drop`.
   */
  updateWith(drop: number, allocates: number): void {
    const entries = this.entries;

    for (let index = 0; index < entries.length; index++) {
      const entry = entries[index];

      if (drop + DROP_ROUND_MS < entry.drop) {
        entries.splice(index, 0, { drop, allocates });
        return;
      }

      if (drop - DROP_ROUND_MS <= entry.drop) {
        if (drop < entry.drop) {
          entry.drop = drop;
        }
        entry.allocates += allocates;
        return;
      }
    }

    entries.push({ drop, allocates });
  }

  /**
   * Total slots reserved by entries that have not expired yet.
   */
  countDrops(): number {
    let total = 0;
    for (const entry of this.entries) {
      total += entry.allocates;
    }
    return total;
  }

  head(): Readonly<CooldownEntry> | undefined {
    return this.entries[0];
  }

  /**
   * Discards the earliest entry.
   */
  shift(): CooldownEntry | undefined {
    return this.entries.shift();
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  get size(): number {
    return this.entries.length;
  }

  toArray(): CooldownEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  clear(): void {
    this.entries.length = 0;
  }

  toString(): string {
    const parts = this.entries.map((entry) => `(${entry.drop}, ${entry.allocates})`);
    return `CooldownLedger[${parts.join(', ')}]`;
  }
}
