export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export interface LoggerOptions {
  level?: LogLevel;
  silent?: boolean;
  timestamp?: boolean;
}

type LogKind = "error" | "warn" | "info" | "debug" | "success";

const colors = {
  reset: "\u001B[0m",
  red: "\u001B[31m",
  green: "\u001B[32m",
  yellow: "\u001B[33m",
  grey: "\u001B[90m",
};

const emoji: Record<LogKind, string> = {
  error: "❌",
  warn: "⚠️",
  info: "🔹",
  debug: "🐞",
  success: "⚡️",
};

const levelOf: Record<LogKind, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
  success: LogLevel.INFO,
};

export class Logger {
  private level: LogLevel;
  private silent: boolean;
  private timestamp: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.silent = options.silent ?? false;
    this.timestamp = options.timestamp ?? false;
  }

  private prefix(): string {
    return this.timestamp ? `[${new Date().toISOString()}] ` : "";
  }

  private formatData(data?: unknown): string {
    if (data === undefined) return "";
    if (data instanceof Error) {
      const stack = data.stack ? `\n${data.stack}` : "";
      return ` ${data.name}: ${data.message}${stack}`;
    }
    try {
      return ` ${JSON.stringify(data)}`;
    } catch {
      return ` ${String(data)}`;
    }
  }

  private write(kind: LogKind, message: string, data?: unknown): void {
    if (this.silent || levelOf[kind] > this.level) return;

    const line = `${this.prefix()}${emoji[kind]} ${message}${this.formatData(data)}`;

    // Diagnostics go to stderr so stdout stays clean for --json output
    switch (kind) {
      case "error":
        console.error(`${colors.red}${line}${colors.reset}`);
        return;
      case "warn":
        console.warn(`${colors.yellow}${line}${colors.reset}`);
        return;
      case "debug":
        console.error(`${colors.grey}${line}${colors.reset}`);
        return;
      case "success":
        console.log(`${colors.green}${line}${colors.reset}`);
        return;
      case "info":
        console.log(line);
        return;
    }
  }

  error(message: string, data?: unknown): void {
    this.write("error", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write("warn", message, data);
  }

  info(message: string, data?: unknown): void {
    this.write("info", message, data);
  }

  debug(message: string, data?: unknown): void {
    this.write("debug", message, data);
  }

  success(message: string, data?: unknown): void {
    this.write("success", message, data);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setSilent(silent: boolean): void {
    this.silent = silent;
  }

  setTimestamp(timestamp: boolean): void {
    this.timestamp = timestamp;
  }
}

// Default logger instance
export const logger = new Logger();
