/**
 * Logging System
 *
 * Level-filtered logging with per-stage context. Entries are kept in a
 * bounded in-memory buffer so callers (and tests) can inspect what a
 * conversion reported after the fact.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
  context?: LogContext;
  stage?: string;
  error?: Error;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  enableConsole: boolean;
  maxLogEntries: number;
}

export interface StageStats {
  messages: number;
  warnings: number;
  errors: number;
}

class LoggerImpl {
  private config: LoggerConfig;
  private logs: LogEntry[] = [];
  private stageStats = new Map<string, StageStats>();

  constructor(config?: Partial<LoggerConfig>) {
    this.config = {
      minLevel: LogLevel.INFO,
      enableConsole: true,
      maxLogEntries: 10000,
      ...config,
    };
  }

  public configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  public debug(message: string, context?: LogContext, stage?: string): void {
    this.log(LogLevel.DEBUG, message, context, undefined, stage);
  }

  public info(message: string, context?: LogContext, stage?: string): void {
    this.log(LogLevel.INFO, message, context, undefined, stage);
  }

  public warn(message: string, context?: LogContext, stage?: string): void {
    this.log(LogLevel.WARN, message, context, undefined, stage);
  }

  public error(
    message: string,
    error?: Error,
    context?: LogContext,
    stage?: string,
  ): void {
    this.log(LogLevel.ERROR, message, context, error, stage);
  }

  /** Stats are counted for every call, including ones filtered by level */
  public recordStage(stage: string, level: LogLevel): void {
    const stats = this.stageStats.get(stage) ?? {
      messages: 0,
      warnings: 0,
      errors: 0,
    };
    if (level === LogLevel.WARN) {
      stats.warnings++;
    } else if (level === LogLevel.ERROR) {
      stats.errors++;
    } else {
      stats.messages++;
    }
    this.stageStats.set(stage, stats);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error,
    stage?: string,
  ): void {
    if (level < this.config.minLevel) return;

    const entry: LogEntry = {
      timestamp: Date.now(),
      level,
      message,
      context,
      stage,
      error,
    };

    this.logs.push(entry);
    if (this.logs.length > this.config.maxLogEntries) {
      this.logs.splice(0, this.logs.length - this.config.maxLogEntries);
    }

    if (this.config.enableConsole) {
      this.outputToConsole(entry);
    }
  }

  private outputToConsole(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toISOString();
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
    const logMessage = `[${timestamp}] ${entry.message}${contextStr}`;

    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(logMessage);
        break;
      case LogLevel.INFO:
        console.info(logMessage);
        break;
      case LogLevel.WARN:
        console.warn(logMessage);
        break;
      case LogLevel.ERROR:
        if (entry.error) {
          console.error(logMessage, entry.error);
        } else {
          console.error(logMessage);
        }
        break;
    }
  }

  public getStageStats(stage: string): StageStats {
    return (
      this.stageStats.get(stage) ?? { messages: 0, warnings: 0, errors: 0 }
    );
  }

  public getStageLogs(stage: string, count: number = 100): LogEntry[] {
    return this.logs.filter((log) => log.stage === stage).slice(-count);
  }

  public clearLogs(): void {
    this.logs = [];
    this.stageStats.clear();
  }

  public setLogLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  public isLevelEnabled(level: LogLevel): boolean {
    return level >= this.config.minLevel;
  }
}

export const Logger = new LoggerImpl();

/**
 * Logger bound to one pipeline stage ("fusion", "submesh", ...).
 * Messages are prefixed with the stage name.
 */
export class StageLogger {
  constructor(private readonly stage: string) {}

  debug(message: string, context?: LogContext): void {
    Logger.recordStage(this.stage, LogLevel.DEBUG);
    if (!Logger.isLevelEnabled(LogLevel.DEBUG)) return;
    Logger.debug(`[${this.stage}] ${message}`, context, this.stage);
  }

  info(message: string, context?: LogContext): void {
    Logger.recordStage(this.stage, LogLevel.INFO);
    Logger.info(`[${this.stage}] ${message}`, context, this.stage);
  }

  warn(message: string, context?: LogContext): void {
    Logger.recordStage(this.stage, LogLevel.WARN);
    Logger.warn(`[${this.stage}] ${message}`, context, this.stage);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    Logger.recordStage(this.stage, LogLevel.ERROR);
    Logger.error(`[${this.stage}] ${message}`, error, context, this.stage);
  }
}

// Environment-based configuration
if (typeof process !== "undefined" && process.env) {
  if (process.env.NODE_ENV === "production") {
    Logger.configure({ minLevel: LogLevel.WARN });
  } else if (process.env.NODE_ENV === "test") {
    Logger.configure({ minLevel: LogLevel.ERROR, enableConsole: false });
  } else {
    Logger.configure({ minLevel: LogLevel.DEBUG });
  }

  const levelsByName: Record<string, LogLevel | undefined> = {
    DEBUG: LogLevel.DEBUG,
    INFO: LogLevel.INFO,
    WARN: LogLevel.WARN,
    ERROR: LogLevel.ERROR,
  };
  const level = levelsByName[(process.env.LOG_LEVEL ?? "").toUpperCase()];
  if (level !== undefined) {
    Logger.setLogLevel(level);
  }
}

export default Logger;
