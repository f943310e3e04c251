import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug: (text: string) => void;
  info: (text: string) => void;
  success: (text: string) => void;
  warning: (text: string) => void;
  error: (text: string) => void;
  question: (text: string) => void;
  source: (text: string) => void;
  setLevel: (level: LogLevel) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export function createLogger(level: LogLevel = 'info'): Logger {
  let threshold = LEVELS[level];
  const write = (at: LogLevel, line: string) => {
    if (LEVELS[at] < threshold) return;
    if (at === 'error') {
      console.error(line);
    } else if (at === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (text) => write('debug', chalk.dim(text)),
    info: (text) => write('info', chalk.blue(text)),
    success: (text) => write('info', chalk.green(text)),
    warning: (text) => write('warn', chalk.yellow(text)),
    error: (text) => write('error', chalk.red(text)),
    question: (text) => write('info', chalk.cyan(text)),
    source: (text) => write('info', chalk.gray(text)),
    setLevel: (next) => {
      threshold = LEVELS[next];
    },
  };
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase() ?? 'info';

export const logger: Logger = createLogger(isLogLevel(envLevel) ? envLevel : 'info');
