/**
 * Envelope — a message plus the delivery metadata a session needs to track it.
 *
 * An envelope lives in at most one of the session's two containers at a
 * time: the outbound queue before transmission, the correlation table after
 * it (and only when a reply is expected).
 */

import type { SessionMessage } from "../types.js";
import type { SessionHandler } from "./handler.js";
import { NOOP_HANDLER } from "./handler.js";
import type { Session } from "./session.js";

/** Shortest timeout a message may be given. */
export const MIN_TIMEOUT_MS = 500;

/** Clamp a requested timeout to the floor. Non-finite values other than +Infinity also clamp. */
export function clampTimeout(timeoutMs: number): number {
  if (timeoutMs === Number.POSITIVE_INFINITY) return timeoutMs;
  if (!Number.isFinite(timeoutMs) || timeoutMs < MIN_TIMEOUT_MS) return MIN_TIMEOUT_MS;
  return timeoutMs;
}

export interface EnvelopeInit {
  /** Absolute deadline on the session clock. Default: never. */
  deadline?: number;
  handler?: SessionHandler;
  needResponse?: boolean;
}

export class Envelope {
  /** Owning session. Routing only; the session does not belong to the envelope. */
  readonly session: Session;
  readonly msg: SessionMessage;
  readonly deadline: number;
  readonly handler: SessionHandler;
  readonly needResponse: boolean;
  /** Correlation key: the message id in string form, fixed at construction. Empty when the message has no id. */
  readonly tag: string;
  /** Failed transmissions reported through failureSentMsg. */
  attempts = 0;

  constructor(session: Session, msg: SessionMessage, init: EnvelopeInit = {}) {
    this.session = session;
    this.msg = msg;
    this.deadline = init.deadline ?? Number.POSITIVE_INFINITY;
    this.handler = init.handler ?? NOOP_HANDLER;
    this.needResponse = init.needResponse ?? false;
    this.tag = msg.msgId === undefined ? "" : String(msg.msgId);
  }

  get from(): string {
    return this.session.from;
  }

  get to(): string {
    return this.session.to;
  }

  isTimeout(now: number): boolean {
    return now > this.deadline;
  }
}
