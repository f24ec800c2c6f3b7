export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export function resolveLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = (raw ?? '').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

function formatMeta(meta: unknown[]): string {
  if (meta.length === 0) return '';
  const parts = meta.map((item) => {
    if (item instanceof Error) {
      return item.stack ?? `${item.name}: ${item.message}`;
    }
    if (typeof item === 'string') return item;
    try {
      return JSON.stringify(item);
    } catch {
      return String(item);
    }
  });
  return ` ${parts.join(' ')}`;
}

export class Logger {
  constructor(
    private level: LogLevel = 'info',
    private scope?: string
  ) {}

  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, ...meta: unknown[]): void {
    this.write('debug', message, meta);
  }

  info(message: string, ...meta: unknown[]): void {
    this.write('info', message, meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    this.write('warn', message, meta);
  }

  error(message: string, ...meta: unknown[]): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown[]): void {
    if (!this.isEnabled(level)) return;
    const scope = this.scope ? ` ${this.scope}` : '';
    const line = `${new Date().toISOString()} [${level.toUpperCase()}]${scope} - ${message}${formatMeta(meta)}`;
    // stdout is reserved for command output
    if (level === 'warn') {
      console.warn(line);
    } else {
      console.error(line);
    }
  }
}
