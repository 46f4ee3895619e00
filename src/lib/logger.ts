import pino from "pino";
import type { DestinationStream, Logger } from "pino";

export type { Logger } from "pino";

export interface CreateLoggerOptions {
  level?: string;
  /** Append-only log file. Empty or omitted logs to stdout. */
  logFile?: string;
  /** Explicit destination, used by tests to capture output */
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? "info";

  if (options.destination) {
    return pino({ level }, options.destination);
  }

  if (options.logFile) {
    // sync writes so nothing is lost when the job calls process.exit()
    return pino(
      { level },
      pino.destination({ dest: options.logFile, append: true, mkdir: true, sync: true }),
    );
  }

  return pino({ level });
}

export function createChildLogger(
  logger: Logger,
  context: { repo?: string; channel?: string; pullRequestId?: number; [key: string]: unknown },
): Logger {
  return logger.child(context);
}
