import type { LogContext, LogContextPatch } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

const discard = (): void => {}

/**
 * Logger that discards every entry; `child()` hands back another one.
 * Used by the environment loader when no logger is supplied.
 */
export function createNullLogger<
  TContext extends LogContext = LogContext,
>(): Logger<TContext> {
  return Object.freeze({
    trace: discard,
    debug: discard,
    info: discard,
    warn: discard,
    error: discard,
    fatal: discard,
    child: <U extends LogContextPatch>(_context: U) => createNullLogger<TContext & U>(),
  })
}
