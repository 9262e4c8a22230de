import { ActivityRecord, SubscriberId } from "../core/types.js";

/**
 * Leading run of `records` (newest first) strictly newer than `cursor`.
 * Scanning stops at the first record at or below the cursor.
 */
export const takeNewer = (records: readonly ActivityRecord[], cursor: number): ActivityRecord[] => {
  const fresh: ActivityRecord[] = [];
  for (const record of records) {
    if (record.timestamp <= cursor) {
      break;
    }
    fresh.push(record);
  }
  return fresh;
};

export interface AdvanceResult {
  /** Oldest first. */
  events: ActivityRecord[];
  cursor: number;
  seeded: boolean;
}

const keyOf = (subscriber: SubscriberId, address: string): string => `${subscriber}:${address.toLowerCase()}`;

/** High-water mark per (subscriber, address). Lives only as long as the process. */
export class CursorStore {
  private readonly cursors = new Map<string, number>();

  get(subscriber: SubscriberId, address: string): number | undefined {
    return this.cursors.get(keyOf(subscriber, address));
  }

  /**
   * Folds a successful fetch into the cursor. The first fetch for a pair only
   * seeds the baseline; history that existed before watching is never reported.
   */
  advance(subscriber: SubscriberId, address: string, records: readonly ActivityRecord[]): AdvanceResult {
    const key = keyOf(subscriber, address);
    const current = this.cursors.get(key);

    if (current === undefined) {
      const baseline = records[0]?.timestamp ?? 0;
      this.cursors.set(key, baseline);
      return { events: [], cursor: baseline, seeded: true };
    }

    const fresh = takeNewer(records, current);
    if (fresh.length === 0) {
      return { events: [], cursor: current, seeded: false };
    }
    const next = Math.max(current, fresh[0].timestamp);
    this.cursors.set(key, next);
    return { events: fresh.reverse(), cursor: next, seeded: false };
  }

  /** Drops cursors of addresses the subscriber no longer watches. */
  retain(subscriber: SubscriberId, addresses: readonly string[]): void {
    const keep = new Set(addresses.map((address) => keyOf(subscriber, address)));
    const prefix = `${subscriber}:`;
    for (const key of [...this.cursors.keys()]) {
      if (key.startsWith(prefix) && !keep.has(key)) {
        this.cursors.delete(key);
      }
    }
  }

  size(): number {
    return this.cursors.size;
  }
}
