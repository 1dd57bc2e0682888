/**
 * Courier — per-peer message correlation
 *
 * For each (from, to) endpoint pair, Courier:
 * - queues outbound messages until a transport takes them
 * - matches replies to requests by msgId and calls the request's one-shot handler
 * - expires messages that miss their send or reply deadline
 * - routes everything unclaimed to the session's default handler
 *
 * Transports, framing and connection management live outside; see
 * SessionTransport and SessionPump.
 */

export { startCourier, type CourierInstance, type StartCourierOptions } from "./standalone.js";
export { createCourierLogger, silentLogger, type CourierLoggerOptions, type CourierLogLevel } from "./logger.js";
export {
  loadCourierConfig,
  resolveCourierConfig,
  type CourierConfig,
  type NonNumericTagPolicy,
} from "./config.js";
export {
  CourierError,
  SendTimeoutError,
  ResponseTimeoutError,
  QueueFullError,
  InvalidTagError,
  toError,
  type CourierErrorCode,
} from "./errors.js";
export type { CourierLogger, MsgId, SessionMessage, Clock } from "./types.js";
export { monotonicClock } from "./types.js";
export * from "./session/index.js";
export * from "./transport/index.js";
