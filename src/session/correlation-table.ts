/**
 * Response Correlation Table — transmitted envelopes awaiting a reply,
 * keyed by correlation tag.
 *
 * Removal is identity-checked where it matters: a tag can be re-used by a
 * later envelope, and an operation holding the older envelope must not
 * evict the newer one.
 */

import type { NonNumericTagPolicy } from "../config.js";
import { InvalidTagError } from "../errors.js";
import type { Envelope } from "./envelope.js";

/** Integer value of a tag, or null when the tag is not a plain integer. */
export function parseTagNumber(tag: string): number | null {
  if (!/^[+-]?\d+$/.test(tag)) return null;
  const n = Number(tag);
  return Number.isSafeInteger(n) ? n : null;
}

export class CorrelationTable {
  private entries = new Map<string, Envelope>();

  get size(): number {
    return this.entries.size;
  }

  /**
   * Insert keyed by the envelope's tag. Returns the envelope previously
   * held under that tag, if any (it is no longer tracked).
   */
  insert(envelope: Envelope): Envelope | undefined {
    const previous = this.entries.get(envelope.tag);
    this.entries.set(envelope.tag, envelope);
    return previous === envelope ? undefined : previous;
  }

  get(tag: string): Envelope | undefined {
    return this.entries.get(tag);
  }

  /** Remove and return the entry for `tag`. The caller owns the result. */
  take(tag: string): Envelope | undefined {
    const envelope = this.entries.get(tag);
    if (envelope) this.entries.delete(tag);
    return envelope;
  }

  has(envelope: Envelope): boolean {
    return this.entries.get(envelope.tag) === envelope;
  }

  /** Remove this exact envelope. False if its tag is absent or now maps to another envelope. */
  remove(envelope: Envelope): boolean {
    if (this.entries.get(envelope.tag) !== envelope) return false;
    this.entries.delete(envelope.tag);
    return true;
  }

  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  /**
   * Remove every entry whose tag is an integer strictly below `threshold`.
   *
   * Tags that are not integers are left in place under "skip" and reported
   * back; under "fail" an InvalidTagError is thrown before anything is removed.
   */
  removeBefore(
    threshold: number,
    policy: NonNumericTagPolicy,
  ): { removed: Envelope[]; skipped: string[] } {
    const doomed: string[] = [];
    const skipped: string[] = [];

    for (const tag of this.entries.keys()) {
      const n = parseTagNumber(tag);
      if (n === null) {
        if (policy === "fail") throw new InvalidTagError(tag);
        skipped.push(tag);
        continue;
      }
      if (n < threshold) doomed.push(tag);
    }

    const removed: Envelope[] = [];
    for (const tag of doomed) {
      const envelope = this.take(tag);
      if (envelope) removed.push(envelope);
    }
    return { removed, skipped };
  }

  /** Entries past their deadline at `now`. Does not remove them. */
  collectExpired(now: number): Envelope[] {
    const expired: Envelope[] = [];
    for (const envelope of this.entries.values()) {
      if (envelope.isTimeout(now)) expired.push(envelope);
    }
    return expired;
  }

  values(): Envelope[] {
    return [...this.entries.values()];
  }
}
