import { LogLevel, type LogEntry } from '../types/common.js';

export type LogEmitter = (entry: LogEntry) => void;

/**
 * Structured logger for the contact finder server.
 * Emits logs via the MCP notifications/message mechanism once connected,
 * stderr before that.
 */
export class Logger {
  private minLevel: LogLevel = 'info';
  private emitter: LogEmitter | null = null;
  private serverName: string;

  private static readonly LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    notice: 2,
    warning: 3,
    error: 4,
    critical: 5,
    alert: 6,
    emergency: 7,
  };

  // Short names accepted from LOG_LEVEL
  private static readonly ALIASES: Record<string, LogLevel> = {
    warn: 'warning',
    err: 'error',
    crit: 'critical',
  };

  constructor(serverName: string) {
    this.serverName = serverName;
  }

  /**
   * Resolve a level name from configuration, falling back to `info`
   */
  static parseLevel(value: string | undefined): LogLevel {
    if (!value) return 'info';
    const lowered = value.toLowerCase();
    const parsed = LogLevel.safeParse(Logger.ALIASES[lowered] ?? lowered);
    return parsed.success ? parsed.data : 'info';
  }

  setEmitter(emitter: LogEmitter): void {
    this.emitter = emitter;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return Logger.LEVEL_ORDER[level] >= Logger.LEVEL_ORDER[this.minLevel];
  }

  private log(level: LogLevel, component: string, data: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      level,
      logger: `${this.serverName}/${component}`,
      data: {
        ...data,
        timestamp: new Date().toISOString(),
      },
    };

    if (this.emitter) {
      this.emitter(entry);
    } else {
      // stdout carries the MCP stream, so fallback output goes to stderr
      const levelStr = level.toUpperCase().padEnd(8);
      console.error(`[${levelStr}] ${entry.logger}: ${JSON.stringify(data)}`);
    }
  }

  debug(component: string, data: Record<string, unknown>): void {
    this.log('debug', component, data);
  }

  info(component: string, data: Record<string, unknown>): void {
    this.log('info', component, data);
  }

  notice(component: string, data: Record<string, unknown>): void {
    this.log('notice', component, data);
  }

  warning(component: string, data: Record<string, unknown>): void {
    this.log('warning', component, data);
  }

  error(component: string, data: Record<string, unknown>): void {
    this.log('error', component, data);
  }

  critical(component: string, data: Record<string, unknown>): void {
    this.log('critical', component, data);
  }
}
