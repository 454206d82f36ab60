// =====================================================
// Waiting Pool
// =====================================================
// Players currently seeking an opponent, keyed by player id.
// The only mutation shared by concurrent callers is claimPair, which
// removes both players of a pairing as one compare-and-delete.

// ===========================================
// Types
// ===========================================

export interface WaitingEntry {
  playerId: string;
  rating: number;
  joinTime: number; // first enqueue, drives the wait bonus
  lastSeen: number; // last enqueue, drives expiry
  seq: number; // insertion order, also the compare token for claims
}

export interface WaitingPool {
  /**
   * Insert or refresh an entry. Re-enqueueing keeps joinTime and seq so a
   * polling client does not lose its place.
   */
  upsert(playerId: string, rating: number, now?: number): Promise<WaitingEntry>;
  remove(playerId: string): Promise<boolean>;
  get(playerId: string, now?: number): Promise<WaitingEntry | null>;
  /** Live entries in insertion order. */
  snapshot(now?: number): Promise<WaitingEntry[]>;
  /**
   * Remove both entries if, and only if, both are still present with the
   * seq the caller saw. Returns false and removes nothing otherwise.
   */
  claimPair(first: WaitingEntry, second: WaitingEntry): Promise<boolean>;
  /** Put claimed entries back, e.g. when session creation failed. */
  restore(entries: WaitingEntry[]): Promise<void>;
  size(now?: number): Promise<number>;
  purgeExpired(now?: number): Promise<number>;
}

export function isExpired(entry: WaitingEntry, ttlMs: number, now: number): boolean {
  return now - entry.lastSeen >= ttlMs;
}

// ===========================================
// In-Memory Implementation
// ===========================================

/**
 * Single-process pool. Every method body runs to completion without
 * awaiting, so the check and delete in claimPair cannot interleave with
 * another caller.
 */
export class InMemoryWaitingPool implements WaitingPool {
  private readonly entries = new Map<string, WaitingEntry>();
  private nextSeq = 1;

  constructor(private readonly ttlMs: number) {}

  async upsert(playerId: string, rating: number, now: number = Date.now()): Promise<WaitingEntry> {
    const existing = this.entries.get(playerId);

    if (existing && !isExpired(existing, this.ttlMs, now)) {
      const refreshed: WaitingEntry = { ...existing, rating, lastSeen: now };
      this.entries.set(playerId, refreshed);
      return refreshed;
    }

    // Expired or new: take a fresh place at the back of the line
    this.entries.delete(playerId);
    const entry: WaitingEntry = {
      playerId,
      rating,
      joinTime: now,
      lastSeen: now,
      seq: this.nextSeq++,
    };
    this.entries.set(playerId, entry);
    return entry;
  }

  async remove(playerId: string): Promise<boolean> {
    return this.entries.delete(playerId);
  }

  async get(playerId: string, now: number = Date.now()): Promise<WaitingEntry | null> {
    const entry = this.entries.get(playerId);
    if (!entry || isExpired(entry, this.ttlMs, now)) {
      return null;
    }
    return entry;
  }

  async snapshot(now: number = Date.now()): Promise<WaitingEntry[]> {
    const live: WaitingEntry[] = [];
    for (const entry of this.entries.values()) {
      if (!isExpired(entry, this.ttlMs, now)) {
        live.push(entry);
      }
    }
    // restore() appends, so Map order can drift from seq order
    return live.sort((a, b) => a.seq - b.seq);
  }

  async claimPair(first: WaitingEntry, second: WaitingEntry): Promise<boolean> {
    if (first.playerId === second.playerId) {
      return false;
    }

    const a = this.entries.get(first.playerId);
    const b = this.entries.get(second.playerId);

    if (!a || !b || a.seq !== first.seq || b.seq !== second.seq) {
      return false;
    }

    this.entries.delete(first.playerId);
    this.entries.delete(second.playerId);
    return true;
  }

  async restore(entries: WaitingEntry[]): Promise<void> {
    for (const entry of entries) {
      if (!this.entries.has(entry.playerId)) {
        this.entries.set(entry.playerId, entry);
      }
    }
  }

  async size(now: number = Date.now()): Promise<number> {
    return (await this.snapshot(now)).length;
  }

  async purgeExpired(now: number = Date.now()): Promise<number> {
    let purged = 0;
    for (const [playerId, entry] of this.entries) {
      if (isExpired(entry, this.ttlMs, now)) {
        this.entries.delete(playerId);
        purged++;
      }
    }
    return purged;
  }
}
