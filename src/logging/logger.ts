import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, detail?: Record<string, unknown>): void;
  info(message: string, detail?: Record<string, unknown>): void;
  warn(message: string, detail?: Record<string, unknown>): void;
  error(message: string, detail?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function parseLevel(raw: string | undefined): LogLevel {
  switch (raw?.toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'warn':
      return 'warn';
    case 'error':
      return 'error';
    case 'silent':
      return 'silent';
    default:
      return 'info';
  }
}

function formatDetail(detail?: Record<string, unknown>): string {
  if (!detail) return '';
  const parts = Object.entries(detail)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`);
  return parts.length > 0 ? ' ' + chalk.dim(parts.join(' ')) : '';
}

/**
 * Console logger with chalk-coloured level tags. `scope` prefixes every line,
 * e.g. `[dispatch]`.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly scope?: string,
    private readonly level: LogLevel = parseLevel(process.env.ALERTCTL_LOG_LEVEL),
  ) {}

  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(this.scope ? `${this.scope}:${scope}` : scope, this.level);
  }

  debug(message: string, detail?: Record<string, unknown>): void {
    if (this.enabled('debug')) console.log(this.line(chalk.dim('DEBUG'), message, detail));
  }

  info(message: string, detail?: Record<string, unknown>): void {
    if (this.enabled('info')) console.log(this.line(chalk.cyan('INFO '), message, detail));
  }

  warn(message: string, detail?: Record<string, unknown>): void {
    if (this.enabled('warn')) console.warn(this.line(chalk.yellow('WARN '), message, detail));
  }

  error(message: string, detail?: Record<string, unknown>): void {
    if (this.enabled('error')) console.error(this.line(chalk.red('ERROR'), message, detail));
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private line(tag: string, message: string, detail?: Record<string, unknown>): string {
    const ts = chalk.dim(new Date().toISOString());
    const scope = this.scope ? chalk.dim(`[${this.scope}] `) : '';
    return `${ts} ${tag} ${scope}${message}${formatDetail(detail)}`;
  }
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

let _logger: ConsoleLogger | undefined;

export function getLogger(scope?: string): Logger {
  if (!_logger) _logger = new ConsoleLogger();
  return scope ? _logger.child(scope) : _logger;
}
