/**
 * Outbound Queue — envelopes waiting for their first (or next) transmission.
 *
 * Backed by an insertion-ordered Set: FIFO iteration with O(1) removal,
 * which cancelMsg needs. An envelope can be queued once at a time.
 */

import type { Envelope } from "./envelope.js";

export class OutboundQueue {
  private items = new Set<Envelope>();

  /**
   * @param maxSize - Bound on queued envelopes. Undefined = unbounded.
   */
  constructor(private readonly maxSize?: number) {}

  get size(): number {
    return this.items.size;
  }

  get capacity(): number | undefined {
    return this.maxSize;
  }

  isEmpty(): boolean {
    return this.items.size === 0;
  }

  /**
   * Append at the tail. Returns false when the queue is bounded and full.
   * Re-enqueueing an envelope that is already queued moves it to the tail.
   */
  enqueue(envelope: Envelope): boolean {
    if (this.items.delete(envelope)) {
      this.items.add(envelope);
      return true;
    }
    if (this.maxSize !== undefined && this.items.size >= this.maxSize) {
      return false;
    }
    this.items.add(envelope);
    return true;
  }

  /** Remove and return the head, or null when empty. */
  poll(): Envelope | null {
    for (const head of this.items) {
      this.items.delete(head);
      return head;
    }
    return null;
  }

  has(envelope: Envelope): boolean {
    return this.items.has(envelope);
  }

  /** Returns true if the envelope was queued. */
  remove(envelope: Envelope): boolean {
    return this.items.delete(envelope);
  }

  clear(): void {
    this.items.clear();
  }

  /** Snapshot in FIFO order. */
  toArray(): Envelope[] {
    return [...this.items];
  }
}
