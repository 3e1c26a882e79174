import pino, { type LevelWithSilent } from "pino";

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

const isTestEnv =
  process.env.NODE_ENV === "test" || Boolean(process.env.JEST_WORKER_ID);
const isProd = process.env.NODE_ENV === "production";

function parseLevel(value: string | undefined): LevelWithSilent | undefined {
  const level = value?.toLowerCase();
  return LEVELS.find((candidate) => candidate === level);
}

const resolvedLevel: LevelWithSilent =
  parseLevel(process.env.LOG_LEVEL) ?? (isTestEnv ? "silent" : "debug");

// Production logs stay as JSON lines for the log collector
const usePrettyPrint = !isProd && !isTestEnv;

export const logger = pino({
  level: resolvedLevel,
  base: { service: "plant-query" },
  serializers: {
    error: pino.stdSerializers.err,
  },
  ...(usePrettyPrint
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname,service",
          },
        },
      }
    : {}),
  formatters: {
    level: (label: string) => ({ level: label.toUpperCase() }),
  },
});
