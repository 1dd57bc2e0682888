/**
 * Session Pump — the transport-driving loop.
 *
 * Each pass walks the open sessions and drains their outbound queues
 * through the transport: nextWaitSendMsg → write → successSentMsg, or
 * failureSentMsg when the write rejects. A pass handles at most as many
 * envelopes per session as were queued when it reached that session, so a
 * failing transport cannot spin one pass forever. Passes never overlap.
 */

import type { CourierLogger } from "../types.js";
import { toError } from "../errors.js";
import type { SessionFactory } from "../session/factory.js";
import type { Session } from "../session/session.js";
import type { FlushResult, SessionTransport } from "./types.js";

export interface SessionPumpDeps {
  factory: SessionFactory;
  transport: SessionTransport;
  logger: CourierLogger;
  /** Override the pass interval (ms). Default: factory.config.flushIntervalMs. */
  intervalMs?: number;
}

export class SessionPump {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<FlushResult> | null = null;
  private readonly intervalMs: number;

  constructor(private readonly deps: SessionPumpDeps) {
    this.intervalMs = deps.intervalMs ?? deps.factory.config.flushIntervalMs;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Start the pump loop. Idempotent.
   */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.flush().catch((err: unknown) => {
        this.deps.logger.error(`[courier:pump] pass failed: ${toError(err).message}`);
      });
    }, this.intervalMs);
    this.deps.logger.info(`[courier:pump] started (interval: ${this.intervalMs}ms)`);
  }

  /**
   * Stop the pump loop. Idempotent. A pass already running finishes.
   */
  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.deps.logger.info(`[courier:pump] stopped`);
  }

  /**
   * Run one pass now. If a pass is already running, returns that pass.
   */
  flush(): Promise<FlushResult> {
    if (this.inFlight) return this.inFlight;
    this.inFlight = this.runPass().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async runPass(): Promise<FlushResult> {
    const total: FlushResult = { sent: 0, failed: 0 };
    for (const session of this.deps.factory.listSessions()) {
      const result = await this.flushSession(session);
      total.sent += result.sent;
      total.failed += result.failed;
    }
    return total;
  }

  private async flushSession(session: Session): Promise<FlushResult> {
    const { factory, transport, logger } = this.deps;
    const result: FlushResult = { sent: 0, failed: 0 };

    for (let budget = session.pendingSendCount; budget > 0; budget--) {
      const envelope = session.nextWaitSendMsg();
      if (!envelope) break;

      // A session closed while the write was in flight keeps nothing: no
      // retry, no pending reply.
      try {
        await transport.write(envelope);
      } catch (err) {
        result.failed++;
        if (factory.getSession(session.from, session.to) !== session) break;
        session.failureSentMsg(envelope);
        logger.warn(
          `[courier:pump] write ${session.from}->${session.to} msg ${envelope.tag} failed ` +
          `(attempt ${envelope.attempts}): ${toError(err).message}`,
        );
        continue;
      }

      result.sent++;
      if (factory.getSession(session.from, session.to) !== session) break;
      session.successSentMsg(envelope);
    }

    return result;
  }
}
