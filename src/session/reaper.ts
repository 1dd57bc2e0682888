/**
 * Timeout Reaper
 *
 * Periodically expires envelopes across every open session: queued
 * envelopes that missed their send deadline, and transmitted envelopes
 * whose reply never came. The interval stays below the 500ms timeout floor
 * so an expiry is noticed within one interval.
 */

import type { CourierLogger } from "../types.js";
import { toError } from "../errors.js";
import type { SessionFactory } from "./factory.js";

export interface TimeoutReaperDeps {
  factory: SessionFactory;
  logger: CourierLogger;
  /** Override the sweep interval (ms). Default: factory.config.sweepIntervalMs. */
  intervalMs?: number;
}

export interface SweepResult {
  sendTimeouts: number;
  responseTimeouts: number;
}

export class TimeoutReaper {
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly intervalMs: number;

  constructor(private readonly deps: TimeoutReaperDeps) {
    this.intervalMs = deps.intervalMs ?? deps.factory.config.sweepIntervalMs;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Start sweeping. Idempotent.
   */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.sweep(), this.intervalMs);
    this.deps.logger.info(`[courier:reaper] started (interval: ${this.intervalMs}ms)`);
  }

  /**
   * Stop sweeping. Idempotent.
   */
  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.deps.logger.info(`[courier:reaper] stopped`);
  }

  /** One pass over every open session. */
  sweep(): SweepResult {
    const result: SweepResult = { sendTimeouts: 0, responseTimeouts: 0 };

    for (const session of this.deps.factory.listSessions()) {
      try {
        result.sendTimeouts += session.checkSendTimeout();
        result.responseTimeouts += session.checkResponseTimeout();
      } catch (err) {
        this.deps.logger.error(
          `[courier:reaper] sweep of ${session.from}->${session.to} failed: ${toError(err).message}`,
        );
      }
    }

    if (result.sendTimeouts + result.responseTimeouts > 0) {
      this.deps.logger.debug?.(
        `[courier:reaper] expired ${result.sendTimeouts} queued, ${result.responseTimeouts} awaiting reply`,
      );
    }
    return result;
  }
}
