/**
 * Session — correlation state for one (from, to) endpoint pair.
 *
 * Application code calls sendMsg / replyMsg / cancelMsg. A transport driver
 * pulls envelopes with nextWaitSendMsg, reports each attempt with
 * successSentMsg / failureSentMsg, and feeds inbound traffic to dispatchMsg.
 * A timer calls checkResponseTimeout. Every operation is synchronous and
 * returns immediately.
 *
 * Sessions are created by SessionFactory; there is one per endpoint pair.
 */

import type { NonNumericTagPolicy } from "../config.js";
import { QueueFullError, ResponseTimeoutError, SendTimeoutError } from "../errors.js";
import type { Clock, CourierLogger, SessionMessage } from "../types.js";
import { createIdSequence } from "../utils/id.js";
import { CorrelationTable } from "./correlation-table.js";
import { Dispatcher } from "./dispatcher.js";
import { Envelope, clampTimeout } from "./envelope.js";
import { NOOP_HANDLER, type SessionHandler } from "./handler.js";
import { OutboundQueue } from "./outbound-queue.js";

/** The factory side of a session: teardown and the last-resort error sink. */
export interface SessionOwner {
  closeSession(session: Session): void;
  dispatchException(error: unknown, envelope: Envelope): boolean;
}

export interface SessionContext {
  owner: SessionOwner;
  clock: Clock;
  logger: CourierLogger;
  /** Applied when sendMsg gets no timeout. null = unbounded. */
  defaultTimeoutMs: number | null;
  /** null = unbounded outbound queue. */
  maxQueueSize: number | null;
  nonNumericTags: NonNumericTagPolicy;
}

export interface SendOptions {
  /** One-shot handler for the reply. Supplying one marks the message as expecting a reply. */
  handler?: SessionHandler;
  /** Milliseconds until the message expires. Clamped to at least 500. */
  timeoutMs?: number;
}

export class Session {
  readonly from: string;
  readonly to: string;

  private readonly ctx: SessionContext;
  private readonly queue: OutboundQueue;
  private readonly table = new CorrelationTable();
  private readonly dispatcher: Dispatcher;
  private readonly nextId = createIdSequence();
  /** Latest envelope built for each message, for cancelMsg. */
  private readonly envelopes = new WeakMap<SessionMessage, Envelope>();
  private defaultResponse: SessionHandler = NOOP_HANDLER;

  /** @internal Use SessionFactory.openSession. */
  constructor(from: string, to: string, ctx: SessionContext) {
    this.from = from;
    this.to = to;
    this.ctx = ctx;
    this.queue = new OutboundQueue(ctx.maxQueueSize ?? undefined);
    this.dispatcher = new Dispatcher({
      session: this,
      table: this.table,
      defaultHandler: () => this.defaultResponse,
      logger: ctx.logger,
    });
  }

  // -------------------------------------------------------------------------
  // Application-facing
  // -------------------------------------------------------------------------

  /**
   * Queue a message for transmission. Assigns a new msgId unless the message
   * already has one. Never throws; a full bounded queue is reported to the
   * handlers as QueueFullError.
   */
  sendMsg(msg: SessionMessage, opts: SendOptions = {}): Envelope {
    if (msg.msgId === undefined) {
      msg.msgId = this.nextId();
    }
    const envelope = new Envelope(this, msg, {
      deadline: this.deadlineFor(opts.timeoutMs),
      handler: opts.handler,
      needResponse: opts.handler !== undefined,
    });
    this.enqueue(envelope);
    return envelope;
  }

  /**
   * Queue `reply` as the answer to `original`. The reply carries the
   * original's msgId and never expects a reply of its own.
   */
  replyMsg(reply: SessionMessage, original: SessionMessage, timeoutMs?: number): Envelope {
    if (original.msgId === undefined) {
      reply.msgId = this.nextId();
      this.ctx.logger.warn(
        `[courier:session] ${this.from}->${this.to} replying to a message without msgId; assigned ${reply.msgId}`,
      );
    } else {
      reply.msgId = original.msgId;
    }
    const envelope = new Envelope(this, reply, { deadline: this.deadlineFor(timeoutMs) });
    this.enqueue(envelope);
    return envelope;
  }

  /**
   * Withdraw a message. Removes it from the outbound queue, or stops waiting
   * for its reply. Once the transport has taken it, or its reply has been
   * dispatched, this does nothing.
   *
   * @returns Whether anything was removed.
   */
  cancelMsg(msg: SessionMessage): boolean {
    const envelope = this.envelopes.get(msg);
    if (!envelope) return false;

    if (this.queue.remove(envelope)) return true;
    return this.table.remove(envelope);
  }

  /** Replace the fallback handler. null / undefined are ignored. */
  setDefaultResponse(handler: SessionHandler | null | undefined): void {
    if (handler) {
      this.defaultResponse = handler;
    }
  }

  /** Reset the fallback handler to one that declines everything. */
  removeDefaultResponse(): void {
    this.defaultResponse = NOOP_HANDLER;
  }

  get defaultHandler(): SessionHandler {
    return this.defaultResponse;
  }

  close(): void {
    this.ctx.owner.closeSession(this);
  }

  // -------------------------------------------------------------------------
  // Transport-driver-facing
  // -------------------------------------------------------------------------

  hasWaitSendMsg(): boolean {
    return !this.queue.isEmpty();
  }

  /**
   * Next envelope to transmit, or null. Envelopes that expired while queued
   * are dropped on the way, each reported once as SendTimeoutError.
   */
  nextWaitSendMsg(): Envelope | null {
    for (let envelope = this.queue.poll(); envelope; envelope = this.queue.poll()) {
      if (envelope.isTimeout(this.ctx.clock())) {
        this.ctx.owner.dispatchException(new SendTimeoutError(envelope.tag), envelope);
        continue;
      }
      return envelope;
    }
    return null;
  }

  /** Transmission succeeded: wait for the reply if one is expected, else forget the envelope. */
  successSentMsg(envelope: Envelope): void {
    this.queue.remove(envelope);
    if (!envelope.needResponse) return;

    const replaced = this.table.insert(envelope);
    if (replaced) {
      this.ctx.logger.warn(
        `[courier:session] ${this.from}->${this.to} msg ${envelope.tag} replaced an earlier request still awaiting a reply`,
      );
    }
  }

  /** Transmission failed: back to the tail of the queue. The deadline still applies. */
  failureSentMsg(envelope: Envelope): void {
    envelope.attempts++;
    if (!this.queue.enqueue(envelope)) {
      this.reportQueueFull(envelope);
    }
  }

  /** Route an inbound envelope. See Dispatcher.dispatchMsg. */
  dispatchMsg(inbound: Envelope): boolean {
    return this.dispatcher.dispatchMsg(inbound);
  }

  /** Wrap an inbound message from the peer and dispatch it. */
  receiveMsg(msg: SessionMessage): boolean {
    return this.dispatchMsg(new Envelope(this, msg));
  }

  dispatchException(envelope: Envelope, error: unknown): boolean {
    return this.dispatcher.dispatchException(envelope, error);
  }

  /** Stop waiting for every pending reply. No handler is notified. */
  clearWaitResponseMsg(): void {
    this.table.clear();
  }

  /**
   * Stop waiting for replies whose numeric msgId is below `threshold`.
   * Non-numeric tags follow the configured policy ("skip" or "fail").
   *
   * @returns Number of entries removed.
   */
  clearWaitResponsesBefore(threshold: number): number {
    const { removed, skipped } = this.table.removeBefore(threshold, this.ctx.nonNumericTags);
    if (skipped.length > 0) {
      this.ctx.logger.debug?.(
        `[courier:session] ${this.from}->${this.to} kept ${skipped.length} non-numeric tag(s) below ${threshold}: ${skipped.join(", ")}`,
      );
    }
    return removed.length;
  }

  /**
   * Expire pending replies past their deadline. Expired entries are
   * collected first, then each is removed and, if this call was the one to
   * remove it, reported as ResponseTimeoutError.
   *
   * @returns Number of timeouts dispatched.
   */
  checkResponseTimeout(): number {
    if (this.table.size === 0) return 0;

    const expired = this.table.collectExpired(this.ctx.clock());
    let count = 0;
    for (const envelope of expired) {
      if (!this.table.remove(envelope)) continue;
      this.ctx.owner.dispatchException(new ResponseTimeoutError(envelope.tag), envelope);
      count++;
    }
    return count;
  }

  /**
   * Expire queued envelopes past their deadline without waiting for the
   * transport to reach them.
   *
   * @returns Number of timeouts dispatched.
   */
  checkSendTimeout(): number {
    if (this.queue.isEmpty()) return 0;

    const now = this.ctx.clock();
    const expired = this.queue.toArray().filter((e) => e.isTimeout(now));
    let count = 0;
    for (const envelope of expired) {
      if (!this.queue.remove(envelope)) continue;
      this.ctx.owner.dispatchException(new SendTimeoutError(envelope.tag), envelope);
      count++;
    }
    return count;
  }

  // -------------------------------------------------------------------------
  // Introspection
  // -------------------------------------------------------------------------

  get pendingSendCount(): number {
    return this.queue.size;
  }

  get pendingResponseCount(): number {
    return this.table.size;
  }

  /** @internal Called by SessionFactory on close. Drops all state without notifying handlers. */
  discardAll(): void {
    this.queue.clear();
    this.table.clear();
  }

  private deadlineFor(timeoutMs: number | undefined): number {
    return this.ctx.clock() + clampTimeout(
      timeoutMs ?? this.ctx.defaultTimeoutMs ?? Number.POSITIVE_INFINITY,
    );
  }

  private enqueue(envelope: Envelope): void {
    this.envelopes.set(envelope.msg, envelope);
    if (!this.queue.enqueue(envelope)) {
      this.reportQueueFull(envelope);
    }
  }

  private reportQueueFull(envelope: Envelope): void {
    const maxSize = this.queue.capacity ?? this.queue.size;
    this.ctx.logger.warn(
      `[courier:session] ${this.from}->${this.to} outbound queue full (${maxSize}), dropping msg ${envelope.tag}`,
    );
    this.ctx.owner.dispatchException(new QueueFullError(envelope.tag, maxSize), envelope);
  }
}
