/**
 * Log severity levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARNING = 2,
  ERROR = 3,
}

/**
 * Types of events that can be logged
 */
export enum LogEventType {
  SCAN_START = "scan_start",
  DEVICE_FOUND = "device_found",
  CONNECT_START = "connect_start",
  CONNECTED = "connected",
  DISCOVER_CHAR = "discover_char",
  ENCODE_START = "encode_start",
  ENCODE_COMPLETE = "encode_complete",
  COMMAND_SEND = "command_send",
  DEVICE_READY = "device_ready",
  DATA_SEND_START = "data_send_start",
  DATA_SEND_PROGRESS = "data_send_progress",
  DATA_SEND_COMPLETE = "data_send_complete",
  FRAME_RETRY = "frame_retry",
  DISCONNECTED = "disconnected",
}

/**
 * A single log entry
 */
export type LogEntry = {
  level: LogLevel;
  message: string;
  timestamp: number;
  eventType?: LogEventType;
  data?: unknown;
};

type LogListener = (entry: LogEntry) => void;

/**
 * Application logger with severity levels and event tracking.
 * Writes to the console at or above the configured level. Listeners receive
 * every entry regardless of level, since the terminal UI advances its step
 * lists from INFO events while the console stays at WARNING.
 */
class Logger {
  private level: LogLevel = LogLevel.WARNING;
  private listeners: Set<LogListener> = new Set();
  private consoleEnabled = true;

  /**
   * Sets the minimum log level to output. Messages below this level are not printed.
   */
  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Turns console output on or off. Listeners are still notified, which lets
   * a full-screen UI render log lines itself.
   */
  public setConsoleEnabled(enabled: boolean): void {
    this.consoleEnabled = enabled;
  }

  /**
   * Registers a callback invoked for each log entry.
   * @returns Unsubscribe function
   */
  public onLog(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private log(
    level: LogLevel,
    message: string,
    eventType?: LogEventType,
    data?: unknown,
  ): void {
    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      eventType,
      data,
    };

    if (this.consoleEnabled && this.level <= level) {
      const output = `[${LogLevel[level]}] ${message}`;
      switch (level) {
        case LogLevel.DEBUG:
          console.debug(output);
          break;
        case LogLevel.INFO:
          console.log(output);
          break;
        case LogLevel.WARNING:
          console.warn(output);
          break;
        case LogLevel.ERROR:
          console.error(output);
          break;
      }
    }

    this.listeners.forEach((listener) => listener(entry));
  }

  public debug(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, eventType, data);
  }

  public info(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.INFO, message, eventType, data);
  }

  public warning(
    message: string,
    eventType?: LogEventType,
    data?: unknown,
  ): void {
    this.log(LogLevel.WARNING, message, eventType, data);
  }

  public error(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.ERROR, message, eventType, data);
  }
}

/**
 * Global logger instance for application-wide logging.
 */
export const logger = new Logger();
