/**
 * Logger Module
 *
 * One pino root logger; components log through children bound to their
 * name. Lines go to stderr so stdout carries only command output. Test runs
 * are silent unless LOG_LEVEL asks otherwise.
 */

import pino, { type Logger as PinoLogger } from "pino";

export type Logger = PinoLogger;
export type LogLevel = pino.LevelWithSilent;

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isTestRun(env: NodeJS.ProcessEnv): boolean {
  return env.NODE_ENV === "test" || env.VITEST !== undefined;
}

/**
 * LOG_LEVEL when it names a level, otherwise `silent` under test, `debug`
 * in development and `warn` elsewhere.
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env.LOG_LEVEL?.toLowerCase();
  if (requested && isLogLevel(requested)) return requested;
  if (isTestRun(env)) return "silent";
  return env.NODE_ENV === "development" ? "debug" : "warn";
}

let root: Logger | undefined;

function getRootLogger(): Logger {
  root ??= createRootLogger();
  return root;
}

function createRootLogger(): Logger {
  const options: pino.LoggerOptions = { name: "hookscan", level: getLogLevel() };

  // pino-pretty runs in a worker thread; only worth it on an interactive terminal
  if (process.stderr.isTTY && !isTestRun(process.env)) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

/**
 * Logger for one component of the scanner
 *
 * @example
 * ```typescript
 * const logger = createLogger("hook-scanner");
 * logger.warn({ module: "Kits.ts", err }, "Failed to scan module");
 * ```
 */
export function createLogger(component: string): Logger {
  return getRootLogger().child({ component });
}

/**
 * Narrower logger carrying extra bindings, such as the module being walked
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
