import { pino, destination, type LevelWithSilent, type Logger } from "pino";

const LEVELS: ReadonlyArray<LevelWithSilent> = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function resolveLevel(value: string | undefined): LevelWithSilent {
  const wanted = (value ?? "").toLowerCase();
  return LEVELS.find((l) => l === wanted) ?? "info";
}

/**
 * Create the process logger. Diagnostics go to stderr so stdout stays
 * free for listings and plans.
 */
function createLogger(): Logger {
  return pino(
    {
      level: resolveLevel(process.env.LOG_LEVEL),
      base: { service: "tc-organizer" },
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination({ dest: 2, sync: true }),
  );
}

export const logger = createLogger();

export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
