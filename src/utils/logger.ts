import chalk from "chalk";
import { loadConfig } from "../configs/environment";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: chalk.gray("DEBUG"),
  info: chalk.green("INFO "),
  warn: chalk.yellow("WARN "),
  error: chalk.red("ERROR"),
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_WEIGHT;

const formatMeta = (meta: unknown): string => {
  if (meta instanceof Error) {
    return meta.stack ?? `${meta.name}: ${meta.message}`;
  }
  if (typeof meta === "string") return meta;
  try {
    return JSON.stringify(meta);
  } catch {
    return String(meta);
  }
};

export class Logger {
  constructor(
    private readonly level: LogLevel,
    private readonly scope?: string
  ) {}

  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  debug(message: string, ...meta: unknown[]) {
    this.write("debug", message, meta);
  }

  info(message: string, ...meta: unknown[]) {
    this.write("info", message, meta);
  }

  warn(message: string, ...meta: unknown[]) {
    this.write("warn", message, meta);
  }

  error(message: string, ...meta: unknown[]) {
    this.write("error", message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown[]) {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.level]) return;

    const parts = [
      chalk.gray(`[${new Date().toISOString()}]`),
      LEVEL_LABEL[level],
      this.scope ? chalk.cyan(`[${this.scope}]`) : "",
      message,
      ...meta.map(formatMeta),
    ].filter((part) => part.length > 0);

    const line = parts.join(" ");
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

const configuredLevel = loadConfig().logging.level;

export const logger = new Logger(
  isLogLevel(configuredLevel) ? configuredLevel : "info"
);
