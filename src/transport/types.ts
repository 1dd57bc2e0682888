/**
 * Transport port.
 *
 * Courier does not do I/O. A transport moves one envelope's message to the
 * peer named by `envelope.to`; framing, serialization and connection
 * handling are its business.
 */

import type { Envelope } from "../session/envelope.js";

export interface SessionTransport {
  /**
   * Transmit the envelope. Resolve once the message is handed to the wire;
   * reject if it could not be sent (the pump re-queues it).
   */
  write(envelope: Envelope): Promise<void>;
}

/** Outcome of one pump pass. */
export interface FlushResult {
  sent: number;
  failed: number;
}
