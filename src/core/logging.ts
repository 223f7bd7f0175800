/**
 * Failure reporting through Effect's logger
 *
 * Resolution never throws for bad input, so a warning is the only signal
 * a caller gets besides the result object. Callers can silence it per
 * call, or route it by passing their own `Logger`, which replaces Effect's
 * default logger for that call only.
 */

import { Effect, Logger } from "effect";

/**
 * Logger accepted by the public operations
 */
export type FailureLogger = Logger.Logger<unknown, void>;

export interface LogSettings {
  readonly logFailures: boolean;
  readonly logger?: FailureLogger | undefined;
}

/**
 * Emit a warning annotated with the call's identifying fields
 */
export function logWarning(
  message: string,
  annotations: Record<string, unknown>,
  settings: LogSettings
): void {
  if (!settings.logFailures) {
    return;
  }

  const program = Effect.logWarning(message).pipe(Effect.annotateLogs(annotations));
  const logger = settings.logger;

  Effect.runSync(
    logger === undefined
      ? program
      : program.pipe(Effect.provide(Logger.replace(Logger.defaultLogger, logger)))
  );
}
