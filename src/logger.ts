import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const LEVEL_TAG: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: chalk.gray('[DEBUG]'),
  info: chalk.cyan('[INFO]'),
  warn: chalk.yellow('[WARN]'),
  error: chalk.red('[ERROR]')
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export class Logger {
  constructor(private readonly level: LogLevel = 'info', private readonly name?: string) {}

  debug(message: string): void {
    if (this.should('debug')) console.debug(this.line('debug', message));
  }

  info(message: string): void {
    if (this.should('info')) console.log(this.line('info', message));
  }

  warn(message: string): void {
    if (this.should('warn')) console.warn(this.line('warn', message));
  }

  error(message: string): void {
    if (this.should('error')) console.error(this.line('error', message));
  }

  child(name: string): Logger {
    return new Logger(this.level, this.name ? `${this.name}:${name}` : name);
  }

  private should(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private line(level: Exclude<LogLevel, 'silent'>, message: string): string {
    const scope = this.name ? ` ${chalk.dim(this.name)}` : '';
    return `${LEVEL_TAG[level]}${scope} ${message}`;
  }
}

export function createSilentLogger(): Logger {
  return new Logger('silent');
}
