/**
 * Leveled logger. Everything goes to stderr: on the stdio MCP transport
 * stdout carries the protocol.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  constructor(private level: LogLevel = 'info') {}

  debug(message: string): void {
    if (this.enabled('debug')) {
      console.error(`[DEBUG] ${message}`);
    }
  }

  info(message: string): void {
    if (this.enabled('info')) {
      console.error(`[INFO] ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled('warn')) {
      console.error(`[WARN] ${message}`);
    }
  }

  error(message: string, error?: Error): void {
    console.error(`[ERROR] ${message}`);
    if (error) {
      console.error(error);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}
