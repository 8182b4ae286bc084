import DEBUG, { Debugger } from "debug";

const LEVELS = ["error", "warn", "info", "debug"] as const;

export type Level = (typeof LEVELS)[number];

export type Logger = Record<Level, Debugger>;

/**
 * One `debug` instance per level, under `<namespace>:<level>`.
 */
export default function createLogger(namespace: string): Logger {
  return {
    error: DEBUG(`${namespace}:error`),
    warn: DEBUG(`${namespace}:warn`),
    info: DEBUG(`${namespace}:info`),
    debug: DEBUG(`${namespace}:debug`),
  };
}

export function namespacesFor(verbosity: number): string {
  const upTo = Math.max(0, Math.min(verbosity, LEVELS.length - 1));
  return LEVELS.slice(0, upTo + 1)
    .map((level) => `lighter.*:${level}`)
    .join(",");
}

// An explicit DEBUG variable always wins over -v flags.
export function setVerbosity(verbosity: number): void {
  if (process.env.DEBUG) {
    return;
  }
  DEBUG.enable(namespacesFor(verbosity));
}
