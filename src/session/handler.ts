/**
 * Session handlers.
 *
 * A handler gets two chances to claim a message or an error. Returning
 * false means "not mine" and routes the event on to the session's default
 * handler; it is never treated as a failure.
 */

import type { SessionMessage } from "../types.js";
import type { Session } from "./session.js";

export interface SessionHandler {
  /** Called with an inbound message. Return true when fully handled. */
  onReceive(session: Session, msg: SessionMessage): boolean;
  /** Called when `msg` failed (timeout, transport error). Return true when fully handled. */
  onException(session: Session, msg: SessionMessage, error: Error): boolean;
}

/** Handler that declines everything. Stands in wherever no handler was given. */
export const NOOP_HANDLER: SessionHandler = Object.freeze({
  onReceive: () => false,
  onException: () => false,
});

/**
 * Build a handler from partial callbacks. Missing callbacks decline.
 *
 * @example
 * session.sendMsg(msg, {
 *   handler: createHandler({ onReceive: (_s, reply) => { resolve(reply); return true; } }),
 *   timeoutMs: 2_000,
 * });
 */
export function createHandler(parts: Partial<SessionHandler>): SessionHandler {
  return {
    onReceive: parts.onReceive ?? NOOP_HANDLER.onReceive,
    onException: parts.onException ?? NOOP_HANDLER.onException,
  };
}
