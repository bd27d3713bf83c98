import pino from "pino";
import type { BaseLogger, LevelWithSilent } from "pino";

export type Logger = BaseLogger;

const levels: LevelWithSilent[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

const envLevel = (): LevelWithSilent => {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return levels.find((level) => level === raw) ?? "info";
};

export const createLogger = (name: string, level?: LevelWithSilent): Logger =>
  pino({ name, level: level ?? envLevel() });
