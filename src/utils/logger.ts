import { createRequire } from "node:module";
import pino from "pino";

const require = createRequire(import.meta.url);

/**
 * Logger type
 */
export type Logger = pino.Logger;

/**
 * Check if pino-pretty is available
 */
function hasPinoPretty(): boolean {
  try {
    require.resolve("pino-pretty");
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a logger instance
 *
 * @param name - Logger name
 * @param level - Log level (default: from env or 'info')
 * @param fd - File descriptor to write to; the CLI logs to stderr so stdout stays JSON
 * @returns Pino logger instance
 */
export function createLogger(
  name: string = "vodhub",
  level: string = process.env.LOG_LEVEL || "info",
  fd: 1 | 2 = 1
): Logger {
  const usePretty =
    process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test" && hasPinoPretty();

  if (usePretty) {
    return pino({
      name,
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: fd,
        },
      },
    });
  }
  return pino({ name, level }, pino.destination(fd));
}

/**
 * Logger that discards everything, for tests and embedding hosts that log elsewhere
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
