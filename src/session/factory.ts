/**
 * Session Factory — sole constructor of sessions and their last-resort
 * error sink.
 *
 * Keeps exactly one live Session per (from, to) pair. Closing a session
 * drops its pending state and unregisters it; a later openSession for the
 * same pair builds a fresh one.
 */

import { resolveCourierConfig, type CourierConfig } from "../config.js";
import { toError } from "../errors.js";
import { silentLogger } from "../logger.js";
import { monotonicClock, type Clock, type CourierLogger, type SessionMessage } from "../types.js";
import type { Envelope } from "./envelope.js";
import type { SessionHandler } from "./handler.js";
import { Session, type SessionOwner } from "./session.js";

export interface SessionFactoryOptions {
  config?: CourierConfig;
  logger?: CourierLogger;
  /** Monotonic clock for deadlines. Default: performance.now(). */
  clock?: Clock;
}

function sessionKey(from: string, to: string): string {
  return JSON.stringify([from, to]);
}

export class SessionFactory implements SessionOwner {
  readonly config: CourierConfig;
  private readonly logger: CourierLogger;
  private readonly clock: Clock;
  private sessions = new Map<string, Session>();
  private fallback: SessionHandler | null = null;

  constructor(opts: SessionFactoryOptions = {}) {
    this.config = opts.config ?? resolveCourierConfig({});
    this.logger = opts.logger ?? silentLogger;
    this.clock = opts.clock ?? monotonicClock;
  }

  /** Return the session for (from, to), creating it on first use. */
  openSession(from: string, to: string): Session {
    const key = sessionKey(from, to);
    const existing = this.sessions.get(key);
    if (existing) return existing;

    const session = new Session(from, to, {
      owner: this,
      clock: this.clock,
      logger: this.logger,
      defaultTimeoutMs: this.config.defaultTimeoutMs,
      maxQueueSize: this.config.maxQueueSize,
      nonNumericTags: this.config.nonNumericTags,
    });
    this.sessions.set(key, session);
    this.logger.info(`[courier:factory] opened session ${from}->${to}`);
    return session;
  }

  getSession(from: string, to: string): Session | undefined {
    return this.sessions.get(sessionKey(from, to));
  }

  listSessions(): Session[] {
    return [...this.sessions.values()];
  }

  /** Drop the session's pending state and unregister it. Idempotent. */
  closeSession(session: Session): void {
    const key = sessionKey(session.from, session.to);
    if (this.sessions.get(key) !== session) return;

    this.sessions.delete(key);
    const dropped = session.pendingSendCount + session.pendingResponseCount;
    session.discardAll();
    this.logger.info(
      `[courier:factory] closed session ${session.from}->${session.to} (${dropped} pending envelope(s) dropped)`,
    );
  }

  closeAll(): void {
    for (const session of this.listSessions()) {
      this.closeSession(session);
    }
  }

  /**
   * Handler consulted when neither an envelope's own handler nor its
   * session's default handler accepts an error. null removes it.
   */
  setFallbackHandler(handler: SessionHandler | null): void {
    this.fallback = handler;
  }

  /**
   * Route an error for `envelope` through its session, then to the fallback
   * handler. Sessions report timeouts and queue overflow through here.
   */
  dispatchException(error: unknown, envelope: Envelope): boolean {
    const err = toError(error);
    if (envelope.session.dispatchException(envelope, err)) return true;
    if (!this.fallback) return false;

    try {
      return this.fallback.onException(envelope.session, envelope.msg, err) === true;
    } catch (thrown) {
      this.logger.error(
        `[courier:factory] fallback onException threw for msg ${envelope.tag}: ${toError(thrown).message}`,
      );
      return false;
    }
  }

  /**
   * Hand an inbound message from peer `from` addressed to local endpoint
   * `to` to the matching session. Returns false if no such session is open.
   */
  deliver(from: string, to: string, msg: SessionMessage): boolean {
    const session = this.getSession(to, from);
    if (!session) {
      this.logger.warn(`[courier:factory] no session ${to}->${from} for inbound msg ${String(msg.msgId)}`);
      return false;
    }
    return session.receiveMsg(msg);
  }
}
