// Centralized logging utility for the OBD live-data bridge
// Structured, category-tagged logging with a bounded in-memory history

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export enum LogCategory {
  APP = 'APP',
  INTEREST = 'INTEREST',
  LIFECYCLE = 'LIFECYCLE',
  STREAM = 'STREAM',
  TRANSPORT = 'TRANSPORT',
  API = 'API',
}

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  category: LogCategory;
  message: string;
  data?: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export class Logger {
  private logs: LogEntry[] = [];
  private maxLogs = 500;
  private enabled = process.env.NODE_ENV !== 'test';
  private minLevel: LogLevel = LogLevel.DEBUG;

  setEnabled(enabled: boolean) {
    this.enabled = enabled;
  }

  setMinLevel(level: LogLevel) {
    this.minLevel = level;
  }

  private log(level: LogLevel, category: LogCategory, message: string, data?: unknown) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      category,
      message,
      data: data instanceof Error ? { error: data.message } : data,
    };

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    if (this.enabled) {
      const prefix = `[${category}] ${level}:`;
      const logMessage = entry.data !== undefined ? `${message} ${JSON.stringify(entry.data)}` : message;

      switch (level) {
        case LogLevel.DEBUG:
          console.log(prefix, logMessage);
          break;
        case LogLevel.INFO:
          console.info(prefix, logMessage);
          break;
        case LogLevel.WARN:
          console.warn(prefix, logMessage);
          break;
        case LogLevel.ERROR:
          console.error(prefix, logMessage);
          break;
      }
    }
  }

  debug(category: LogCategory, message: string, data?: unknown) {
    this.log(LogLevel.DEBUG, category, message, data);
  }

  info(category: LogCategory, message: string, data?: unknown) {
    this.log(LogLevel.INFO, category, message, data);
  }

  warn(category: LogCategory, message: string, data?: unknown) {
    this.log(LogLevel.WARN, category, message, data);
  }

  error(category: LogCategory, message: string, data?: unknown) {
    this.log(LogLevel.ERROR, category, message, data);
  }

  getLogs(category?: LogCategory, limit = 200): LogEntry[] {
    let filtered = this.logs;
    if (category) {
      filtered = filtered.filter(log => log.category === category);
    }
    return filtered.slice(-limit);
  }

  clearLogs() {
    this.logs = [];
  }

  exportLogs(category?: LogCategory): string {
    return this.getLogs(category, this.maxLogs)
      .map(log => {
        const timestamp = log.timestamp.toISOString();
        const dataStr = log.data !== undefined ? ` | ${JSON.stringify(log.data)}` : '';
        return `${timestamp} [${log.category}] ${log.level}: ${log.message}${dataStr}`;
      })
      .join('\n');
  }
}

export const logger = new Logger();
