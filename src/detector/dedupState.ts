import { getLogger } from '@fluidware-it/saddlebag';

const logger = getLogger();

export interface DedupPolicy {
  // Soft bound on tracked workloads; the least recently observed go first,
  // but never a key observed in the current poll
  maxEntries: number;
  // Polls a key may go unobserved before it is dropped
  idleCycles: number;
}

export const DEFAULT_DEDUP_POLICY: DedupPolicy = {
  maxEntries: 10_000,
  idleCycles: 120
};

interface DedupEntry {
  startTime: Date;
  lastSeenCycle: number;
}

/**
 * Latest notified restart start time per `namespace/name` key.
 *
 * Owned by the polling loop alone: analysis tasks never read or write it.
 * Map insertion order doubles as recency order, so the first key is always
 * the least recently observed one.
 */
export class DedupState {
  private readonly entries = new Map<string, DedupEntry>();
  private cycle = 0;
  private overCapacityWarnedCycle = -1;

  constructor(private readonly policy: DedupPolicy = DEFAULT_DEDUP_POLICY) {}

  get size(): number {
    return this.entries.size;
  }

  get currentCycle(): number {
    return this.cycle;
  }

  get(key: string): Date | undefined {
    return this.entries.get(key)?.startTime;
  }

  beginCycle(): void {
    this.cycle++;
  }

  // Records the observation and reports whether it is a restart that has
  // not been notified yet: no entry, or a strictly later start time.
  observe(key: string, startTime: Date): boolean {
    const existing = this.entries.get(key);
    const isNew = !existing || startTime.getTime() > existing.startTime.getTime();
    const notified = existing && !isNew ? existing.startTime : startTime;

    this.entries.delete(key);
    this.entries.set(key, { startTime: notified, lastSeenCycle: this.cycle });
    this.enforceCapacity();
    return isNew;
  }

  // Drops keys nobody has observed for `idleCycles` polls; returns how many
  evictIdle(): number {
    let evicted = 0;
    for (const [key, entry] of this.entries) {
      if (this.cycle - entry.lastSeenCycle >= this.policy.idleCycles) {
        this.entries.delete(key);
        evicted++;
      }
    }
    return evicted;
  }

  // Entries observed this cycle sit at the tail, so once the head belongs to
  // the current cycle nothing else is evictable
  private enforceCapacity(): void {
    while (this.entries.size > this.policy.maxEntries) {
      const oldest = this.entries.entries().next();
      if (oldest.done) return;
      const [key, entry] = oldest.value;
      if (entry.lastSeenCycle === this.cycle) {
        if (this.overCapacityWarnedCycle !== this.cycle) {
          this.overCapacityWarnedCycle = this.cycle;
          logger.warn(
            `Dedup state holds ${this.entries.size} workloads observed in one poll, above the limit of ${this.policy.maxEntries}`
          );
        }
        return;
      }
      this.entries.delete(key);
    }
  }
}
