import chalk from "chalk";
import { LogLevel } from "../common/common-enum";
import { loadConfig } from "../configs/environment";

const severity: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3,
};

const colorize: Record<LogLevel, (text: string) => string> = {
  [LogLevel.ERROR]: chalk.red,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.INFO]: chalk.green,
  [LogLevel.DEBUG]: chalk.magenta,
};

export interface LoggerOptions {
  level: LogLevel;
  enableConsole: boolean;
}

export interface Logger {
  error(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  debug(message: string, ...meta: unknown[]): void;
}

export const formatLine = (level: LogLevel, message: string, now = new Date()) =>
  chalk.gray("[") +
  chalk.gray(now.toISOString()) +
  chalk.gray("]") +
  " " +
  colorize[level](level.toUpperCase()) +
  " " +
  chalk.white(message);

export const createLogger = ({ level, enableConsole }: LoggerOptions): Logger => {
  const write =
    (target: LogLevel) =>
    (message: string, ...meta: unknown[]) => {
      if (!enableConsole || severity[target] > severity[level]) return;
      const line = formatLine(target, message);
      if (target === LogLevel.ERROR || target === LogLevel.WARN) {
        console.error(line, ...meta);
      } else {
        console.log(line, ...meta);
      }
    };

  return {
    error: write(LogLevel.ERROR),
    warn: write(LogLevel.WARN),
    info: write(LogLevel.INFO),
    debug: write(LogLevel.DEBUG),
  };
};

export const logger = createLogger(loadConfig().logging);
