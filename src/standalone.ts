/**
 * Courier Standalone Runtime
 *
 * Wires a SessionFactory to a transport and starts the two timers that
 * drive it: the pump (outbound) and the reaper (timeouts).
 *
 * Usage:
 *   import { startCourier } from "./standalone.js";
 *   const courier = startCourier({ transport });          // config from file
 *   const courier = startCourier({ transport, config });  // explicit config
 *   const session = courier.factory.openSession("me", "peer");
 *   ...
 *   await courier.stop();
 */

import { loadCourierConfig, type CourierConfig } from "./config.js";
import { createCourierLogger, type CourierLoggerOptions } from "./logger.js";
import { SessionFactory } from "./session/factory.js";
import { TimeoutReaper } from "./session/reaper.js";
import { SessionPump } from "./transport/pump.js";
import type { SessionTransport } from "./transport/types.js";
import type { Clock, CourierLogger } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CourierInstance {
  config: CourierConfig;
  factory: SessionFactory;
  pump: SessionPump;
  reaper: TimeoutReaper;
  logger: CourierLogger;
  /** Stop both timers, drain one final pass, close every session. */
  stop: () => Promise<void>;
}

export interface StartCourierOptions {
  transport: SessionTransport;
  /** Config override. If not provided, loaded from file. */
  config?: CourierConfig;
  /** Logger instance. Takes precedence over loggerOptions. */
  logger?: CourierLogger;
  /** Logger options. Level defaults to config.logLevel. */
  loggerOptions?: CourierLoggerOptions;
  clock?: Clock;
  /** Build everything but leave the timers stopped. */
  noTimers?: boolean;
}

// ---------------------------------------------------------------------------
// Boot
// ---------------------------------------------------------------------------

export function startCourier(opts: StartCourierOptions): CourierInstance {
  const config = opts.config ?? loadCourierConfig();
  const logger = opts.logger ?? createCourierLogger({
    level: config.logLevel,
    ...opts.loggerOptions,
  });

  logger.info(
    `[courier:standalone] starting (sweep: ${config.sweepIntervalMs}ms, flush: ${config.flushIntervalMs}ms, ` +
    `queue: ${config.maxQueueSize ?? "unbounded"})`,
  );

  const factory = new SessionFactory({ config, logger, clock: opts.clock });
  const pump = new SessionPump({ factory, transport: opts.transport, logger });
  const reaper = new TimeoutReaper({ factory, logger });

  if (!opts.noTimers) {
    pump.start();
    reaper.start();
  }

  const stop = async () => {
    logger.info("[courier:standalone] shutting down...");
    pump.stop();
    reaper.stop();
    await pump.flush();
    factory.closeAll();
    logger.info("[courier:standalone] shutdown complete");
  };

  return { config, factory, pump, reaper, logger, stop };
}
