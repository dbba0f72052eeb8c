import type { DestinationStream } from "pino"
import { PinoLogger } from "../adapters/pino/pino-logger"
import type { LogContext, LogContextPatch } from "../ports/log-context"
import type { Logger } from "../ports/logger"
import type { LoggerOptions } from "../ports/logger-options"

export type CreateLoggerOptions = Partial<LoggerOptions> & {
  destination?: DestinationStream
  context?: LogContextPatch
}

/**
 * Builds the engine's default logger: pino, JSON lines on stdout unless a
 * destination or `prettify` says otherwise.
 */
export function createLogger<TContext extends LogContext = LogContext>(
  options: CreateLoggerOptions = {},
): Logger<TContext> {
  const { destination, context, ...opts } = options

  return new PinoLogger<TContext>({ ...(destination && { destination }) }, opts, context)
}
