/**
 * Courier error classes.
 *
 * These are delivered to handlers through `onException`; none of them is
 * thrown out of sendMsg / replyMsg / cancelMsg. Errors reported by a
 * transport are passed through as-is and need not extend CourierError.
 */

export type CourierErrorCode =
  | "SEND_TIMEOUT"
  | "RESPONSE_TIMEOUT"
  | "QUEUE_FULL"
  | "INVALID_TAG";

export class CourierError extends Error {
  constructor(
    message: string,
    public readonly code: CourierErrorCode,
  ) {
    super(message);
    this.name = "CourierError";
  }
}

/** Envelope expired in the outbound queue before it was transmitted. */
export class SendTimeoutError extends CourierError {
  constructor(public readonly tag: string) {
    super(`wait send timed out (msg ${tag})`, "SEND_TIMEOUT");
    this.name = "SendTimeoutError";
  }
}

/** Envelope was transmitted but no reply arrived before its deadline. */
export class ResponseTimeoutError extends CourierError {
  constructor(public readonly tag: string) {
    super(`wait response timed out (msg ${tag})`, "RESPONSE_TIMEOUT");
    this.name = "ResponseTimeoutError";
  }
}

/** Outbound queue is bounded and already holds `maxSize` envelopes. */
export class QueueFullError extends CourierError {
  constructor(
    public readonly tag: string,
    public readonly maxSize: number,
  ) {
    super(`outbound queue full (max: ${maxSize}), msg ${tag} not queued`, "QUEUE_FULL");
    this.name = "QueueFullError";
  }
}

/** A correlation tag could not be read as an integer during threshold eviction. */
export class InvalidTagError extends CourierError {
  constructor(public readonly tag: string) {
    super(`correlation tag "${tag}" is not an integer`, "INVALID_TAG");
    this.name = "InvalidTagError";
  }
}

/** Normalize an unknown thrown value to an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
