import pino from "pino";

// ── Structured Logger — pino ─────────────────────────────
// JSON on stderr by default. Pretty output when LOG_PRETTY=true, or on a TTY
// outside production. stdout is reserved for answers.

const isProduction = process.env.NODE_ENV === "production";
const isPretty =
  process.env.LOG_PRETTY !== undefined
    ? process.env.LOG_PRETTY === "true"
    : !isProduction && Boolean(process.stderr.isTTY);

export const log = pino(
  {
    level: process.env.LOG_LEVEL || "info",
    ...(isPretty
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss",
              ignore: "pid,hostname",
              destination: 2,
            },
          },
        }
      : {}),
  },
  isPretty ? undefined : pino.destination(2),
);

export type Logger = typeof log;
