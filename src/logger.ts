import fs from 'fs';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  filePath?: string;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const LEVEL_COLOR: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

function timestamp(): string {
  return new Date().toISOString().replace('T', ' ').slice(0, 19);
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info'];

  const write = (level: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (LEVEL_RANK[level] < threshold) {
      return;
    }
    const label = level.toUpperCase().padEnd(5);
    const plain = `${timestamp()} ${label} [${scope}] ${message}`;
    const colored = `${chalk.dim(timestamp())} ${LEVEL_COLOR[level](label)} ${chalk.bold(`[${scope}]`)} ${message}`;

    if (level === 'error') {
      console.error(colored);
    } else if (level === 'warn') {
      console.warn(colored);
    } else {
      console.log(colored);
    }

    if (options.filePath) {
      fs.appendFileSync(options.filePath, `${plain}\n`, 'utf-8');
    }
  };

  return {
    debug: message => write('debug', message),
    info: message => write('info', message),
    warn: message => write('warn', message),
    error: message => write('error', message)
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
