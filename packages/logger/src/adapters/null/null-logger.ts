import type { LogContext, LogContextPatch } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

function discard(): void {}

/** A Logger that writes nowhere. Its children write nowhere too. */
export function createNullLogger<
  TContext extends LogContext = LogContext,
>(): Logger<TContext> {
  return {
    trace: discard,
    debug: discard,
    info: discard,
    warn: discard,
    error: discard,
    fatal: discard,
    child: <U extends LogContextPatch>() => createNullLogger<TContext & U>(),
  }
}
