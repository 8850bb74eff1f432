export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function resolveLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const value = (raw ?? '').trim().toLowerCase();
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error'
    ? value
    : fallback;
}

export class Logger {
  constructor(
    private level: LogLevel = 'info',
    private scope?: string
  ) {}

  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, ...meta: unknown[]): void {
    if (!this.isEnabled('debug')) return;
    console.debug(this.format('debug', message), ...meta);
  }

  info(message: string, ...meta: unknown[]): void {
    if (!this.isEnabled('info')) return;
    console.log(this.format('info', message), ...meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    if (!this.isEnabled('warn')) return;
    console.warn(this.format('warn', message), ...meta);
  }

  error(message: string, ...meta: unknown[]): void {
    if (!this.isEnabled('error')) return;
    console.error(this.format('error', message), ...meta);
  }

  private format(level: LogLevel, message: string): string {
    const scope = this.scope ? ` [${this.scope}]` : '';
    return `${new Date().toISOString()} ${level.toUpperCase()}${scope} ${message}`;
  }
}
