/**
 * Shared test fixtures: a hand-driven clock, a mock logger, and a handler
 * that records what it was offered.
 */

import { vi } from "vitest";
import { resolveCourierConfig } from "../../src/config.js";
import { SessionFactory } from "../../src/session/factory.js";
import type { SessionHandler } from "../../src/session/handler.js";
import type { CourierLogger, SessionMessage } from "../../src/types.js";

export function makeLogger(): CourierLogger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export interface ManualClock {
  (): number;
  advance(ms: number): void;
}

/** Clock that only moves when told to. Starts at 1000. */
export function manualClock(start = 1_000): ManualClock {
  let now = start;
  const clock = () => now;
  clock.advance = (ms: number) => {
    now += ms;
  };
  return clock;
}

export interface RecordingHandler extends SessionHandler {
  received: SessionMessage[];
  errors: Array<{ msg: SessionMessage; error: Error }>;
}

/** Handler that records every call and answers with the given verdicts. */
export function recordingHandler(verdict: { receive?: boolean; exception?: boolean } = {}): RecordingHandler {
  const received: SessionMessage[] = [];
  const errors: Array<{ msg: SessionMessage; error: Error }> = [];
  return {
    received,
    errors,
    onReceive: (_session, msg) => {
      received.push(msg);
      return verdict.receive ?? true;
    },
    onException: (_session, msg, error) => {
      errors.push({ msg, error });
      return verdict.exception ?? true;
    },
  };
}

export function makeFactory(
  raw: Record<string, unknown> = {},
  clock: ManualClock = manualClock(),
): { factory: SessionFactory; clock: ManualClock; logger: CourierLogger } {
  const logger = makeLogger();
  const factory = new SessionFactory({ config: resolveCourierConfig(raw), logger, clock });
  return { factory, clock, logger };
}
