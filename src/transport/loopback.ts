/**
 * In-process transport that delivers straight into another SessionFactory.
 *
 * Messages are structured-cloned, as a wire would copy them, and delivered
 * on a later turn of the event loop so the sender has recorded the send
 * before any reply can come back.
 */

import type { Envelope } from "../session/envelope.js";
import type { SessionFactory } from "../session/factory.js";
import type { SessionTransport } from "./types.js";

export class LoopbackTransport implements SessionTransport {
  /** Messages written so far, in order. */
  readonly written: Array<{ from: string; to: string; tag: string }> = [];

  constructor(private readonly remote: SessionFactory) {}

  write(envelope: Envelope): Promise<void> {
    const { from, to, tag } = envelope;
    const copy = structuredClone(envelope.msg);
    this.written.push({ from, to, tag });
    setImmediate(() => {
      this.remote.deliver(from, to, copy);
    });
    return Promise.resolve();
  }
}
