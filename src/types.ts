/**
 * Shared type definitions for Courier.
 * Kept dependency-free so transports and hosts can import them directly.
 */

// --- Logging ---

export interface CourierLogger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug?(msg: string): void;
}

// --- Messages ---

/** Message identifier. Numbers are generated by sessions; strings come from peers. */
export type MsgId = number | string;

/**
 * Application-level message. Courier never inspects `body`; only `msgId`
 * takes part in correlation.
 */
export interface SessionMessage<TBody = unknown> {
  msgId?: MsgId;
  body: TBody;
}

/** Monotonic clock in milliseconds. */
export type Clock = () => number;

/** Default clock: `performance.now()` is monotonic, unlike `Date.now()`. */
export const monotonicClock: Clock = () => performance.now();
