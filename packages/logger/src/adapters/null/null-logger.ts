import type { LogContext, LogContextPatch } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

type LogMethod<TContext extends LogContext> = Logger<TContext>["info"]

const discard = (): void => {}

/**
 * Drops every record. Engines and databases fall back to it when no logger
 * is supplied.
 */
export class NullLogger<TContext extends LogContext = LogContext> implements Logger<TContext> {
  readonly trace: LogMethod<TContext> = discard
  readonly debug: LogMethod<TContext> = discard
  readonly info: LogMethod<TContext> = discard
  readonly warn: LogMethod<TContext> = discard
  readonly error: LogMethod<TContext> = discard
  readonly fatal: LogMethod<TContext> = discard

  child<U extends LogContextPatch>(_context: U): Logger<TContext & U> {
    return new NullLogger<TContext & U>()
  }
}

export function createNullLogger<TContext extends LogContext = LogContext>(): Logger<TContext> {
  return new NullLogger<TContext>()
}
