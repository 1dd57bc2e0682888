/**
 * Courier Session Layer
 *
 * Envelope tracking + reply correlation + timeout expiry + handler dispatch.
 */

// Handlers — one-shot and default routing targets
export type { SessionHandler } from "./handler.js";
export { NOOP_HANDLER, createHandler } from "./handler.js";

// Envelope — message plus delivery metadata
export type { EnvelopeInit } from "./envelope.js";
export { Envelope, MIN_TIMEOUT_MS, clampTimeout } from "./envelope.js";

// Containers
export { OutboundQueue } from "./outbound-queue.js";
export { CorrelationTable, parseTagNumber } from "./correlation-table.js";

// Routing
export type { DispatcherDeps } from "./dispatcher.js";
export { Dispatcher } from "./dispatcher.js";

// Session + factory
export type { SessionContext, SessionOwner, SendOptions } from "./session.js";
export { Session } from "./session.js";
export type { SessionFactoryOptions } from "./factory.js";
export { SessionFactory } from "./factory.js";

// Expiry
export type { TimeoutReaperDeps, SweepResult } from "./reaper.js";
export { TimeoutReaper } from "./reaper.js";
