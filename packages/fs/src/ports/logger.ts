import type { LogContext, LogContextPatch, LogMeta } from "./log-context"

export interface Logger<TContext extends LogContext = LogContext> {
  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void
  fatal(message: string, meta?: LogMeta<TContext>): void

  /**
   * Creates a child logger whose entries all carry `context` on top of the
   * parent's bindings.
   */
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}
