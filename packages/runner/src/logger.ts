import { destination, pino, type Logger } from "pino";

export type { Logger } from "pino";

const REDACT_PATHS = [
  "password",
  "*.password",
  "access_token",
  "*.access_token",
  "headers.authorization",
  "headers.cookie",
];

/**
 * Diagnostic logger. JSON lines go to stderr so the console report on stdout stays readable;
 * pipe through pino-pretty when reading them by hand.
 */
export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === "true";
  const level = process.env.E2E_LOG_LEVEL ?? process.env.PINO_LOG_LEVEL ?? "info";

  return pino(
    {
      level,
      enabled: !isVitest,
      base: { ...bindings, app: "anybank-e2e" },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    destination({ dest: 2, sync: true })
  );
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
