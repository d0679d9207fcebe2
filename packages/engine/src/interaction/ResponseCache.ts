/**
 * Response Cache
 *
 * Generated sequences keyed by song-part name, one cache per instrument
 * role. The first sequence stored for a part is kept for the life of the
 * cache. Its start time only ever moves forward, and the sequence moves
 * with it.
 */

import type { NoteSequence, Seconds } from "@antiphon/contracts";

import { adjustSequenceTimes } from "../sequences/sequenceUtils";

export interface CacheEntry {
  /** Absolute-time response, aligned to `responseStartTime` */
  readonly sequence: NoteSequence;
  readonly responseStartTime: Seconds;
}

export class ResponseCache {
  private entries: Map<string, CacheEntry> = new Map();

  get(partName: string): CacheEntry | undefined {
    return this.entries.get(partName);
  }

  has(partName: string): boolean {
    return this.entries.has(partName);
  }

  /**
   * Store the response for a part. A part that already has one keeps it;
   * the existing entry is returned.
   */
  set(partName: string, sequence: NoteSequence, responseStartTime: Seconds): CacheEntry {
    const existing = this.entries.get(partName);
    if (existing) return existing;

    const entry: CacheEntry = { sequence, responseStartTime };
    this.entries.set(partName, entry);
    return entry;
  }

  /**
   * Move a part's response later to `responseStartTime`. Earlier times are
   * ignored.
   */
  pushBack(partName: string, responseStartTime: Seconds): CacheEntry | undefined {
    const entry = this.entries.get(partName);
    if (!entry || responseStartTime <= entry.responseStartTime) return entry;

    const pushed: CacheEntry = {
      sequence: adjustSequenceTimes(entry.sequence, responseStartTime - entry.responseStartTime),
      responseStartTime,
    };
    this.entries.set(partName, pushed);
    return pushed;
  }

  get size(): number {
    return this.entries.size;
  }
}
