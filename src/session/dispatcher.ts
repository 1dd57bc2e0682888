/**
 * Dispatcher — routes inbound messages and per-message errors to handlers.
 *
 * Routing order is always: the envelope's own one-shot handler, then the
 * session's default handler. If both decline, the event is absorbed.
 */

import type { CourierLogger } from "../types.js";
import { toError } from "../errors.js";
import type { CorrelationTable } from "./correlation-table.js";
import type { Envelope } from "./envelope.js";
import type { SessionHandler } from "./handler.js";
import type { Session } from "./session.js";

export interface DispatcherDeps {
  session: Session;
  table: CorrelationTable;
  /** Read on every dispatch so default-handler swaps take effect immediately. */
  defaultHandler: () => SessionHandler;
  logger: CourierLogger;
}

export class Dispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  /**
   * Dispatch an inbound envelope. If its tag matches a pending request, that
   * entry is consumed (removed) before its handler runs, so a concurrent
   * sweep or a second reply cannot also claim it.
   *
   * @returns Whether some handler accepted the message.
   */
  dispatchMsg(inbound: Envelope): boolean {
    const { session, table } = this.deps;
    const pending = inbound.tag === "" ? undefined : table.take(inbound.tag);

    if (pending) {
      const handled = this.invoke("onReceive", pending.tag, () =>
        pending.handler.onReceive(session, inbound.msg),
      );
      if (handled) return true;
    }

    return this.invoke("onReceive", inbound.tag, () =>
      this.deps.defaultHandler().onReceive(session, inbound.msg),
    );
  }

  /**
   * Offer an error concerning `envelope` to its handler, then to the default
   * handler. Declines are normal; a handler that throws counts as a decline.
   */
  dispatchException(envelope: Envelope, error: unknown): boolean {
    const err = toError(error);
    const { session, logger } = this.deps;

    if (this.invoke("onException", envelope.tag, () =>
      envelope.handler.onException(session, envelope.msg, err),
    )) {
      return true;
    }

    const handled = this.invoke("onException", envelope.tag, () =>
      this.deps.defaultHandler().onException(session, envelope.msg, err),
    );
    if (!handled) {
      logger.debug?.(
        `[courier:dispatch] ${session.from}->${session.to} unhandled error for msg ${envelope.tag}: ${err.message}`,
      );
    }
    return handled;
  }

  private invoke(hook: keyof SessionHandler, tag: string, fn: () => boolean): boolean {
    try {
      return fn() === true;
    } catch (err) {
      const { session, logger } = this.deps;
      logger.error(
        `[courier:dispatch] ${session.from}->${session.to} ${hook} threw for msg ${tag}: ${toError(err).message}`,
      );
      return false;
    }
  }
}
