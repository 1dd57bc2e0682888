/**
 * Courier transport driver: pump loop, transport port, loopback transport.
 */

export type { SessionTransport, FlushResult } from "./types.js";
export type { SessionPumpDeps } from "./pump.js";
export { SessionPump } from "./pump.js";
export { LoopbackTransport } from "./loopback.js";
