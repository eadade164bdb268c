type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLevel(raw: string | undefined): LogLevel {
  const lowered = raw?.toLowerCase();
  return LEVELS.find(level => level === lowered) ?? 'info';
}

/**
 * Structured JSON logger with redaction of credentials and API keys.
 * Errors placed in the context are flattened to name and message.
 */
class Logger {
  private level: LogLevel;
  private sensitiveFields = ['password', 'token', 'secret', 'authorization', 'api_key', 'apikey'];

  constructor() {
    this.level = parseLevel(process.env.LOG_LEVEL);
  }

  private redactSensitive(value: unknown): unknown {
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (Array.isArray(value)) {
      return value.map(item => this.redactSensitive(item));
    }
    if (typeof value !== 'object' || value === null) return value;

    const redacted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (this.sensitiveFields.some(field => key.toLowerCase().includes(field))) {
        redacted[key] = '[REDACTED]';
      } else {
        redacted[key] = this.redactSensitive(entry);
      }
    }
    return redacted;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const fields = this.redactSensitive(context ?? {});
    const logEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...(typeof fields === 'object' && fields !== null ? fields : {}),
    };

    if (level === 'error') {
      console.error(JSON.stringify(logEntry));
    } else {
      console.warn(JSON.stringify(logEntry));
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }
}

export const logger = new Logger();
