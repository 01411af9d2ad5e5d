/**
 * Structured logging for spec generation runs
 * Contextual prefixes ([phase] <component> "command" @model), in-memory entries, timers
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  command?: string;
  model?: string;
  phase?: string;
  component?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: Record<string, unknown>;
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export class Logger {
  private entries: LogEntry[] = [];
  private level: LogLevel;
  private context: LogContext = {};
  private timers: Map<string, number> = new Map();
  private shouldLog: boolean;

  constructor(level: LogLevel = "info", shouldLog: boolean = true) {
    this.level = level;
    this.shouldLog = shouldLog;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Merge keys into the context of all subsequent logs
   */
  pushContext(context: Partial<LogContext>): void {
    this.context = { ...this.context, ...context };
  }

  popContext(keys: (keyof LogContext)[]): void {
    const next: LogContext = { ...this.context };
    for (const key of keys) {
      delete next[key];
    }
    this.context = next;
  }

  clearContext(): void {
    this.context = {};
  }

  /**
   * Run `fn` with extra context, restoring the previous context afterwards (also on throw)
   */
  withContext<T>(context: Partial<LogContext>, fn: () => T): T {
    const previous = this.context;
    this.context = { ...previous, ...context };
    try {
      return fn();
    } finally {
      this.context = previous;
    }
  }

  startTimer(name: string): void {
    this.timers.set(name, Date.now());
  }

  /**
   * End a timer and log its duration; returns the duration in milliseconds
   */
  endTimer(name: string, message: string, level: LogLevel = "debug"): number {
    const start = this.timers.get(name);
    if (start === undefined) {
      this.warn(`Timer "${name}" not found`);
      return 0;
    }

    const duration = Date.now() - start;
    this.timers.delete(name);
    this.log(level, message, { duration });
    return duration;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: Object.keys(this.context).length > 0 ? { ...this.context } : undefined,
      data: data && Object.keys(data).length > 0 ? { ...data } : undefined,
    };
    this.entries.push(entry);

    if (this.shouldLog) {
      this.write(level, formatEntry(entry));
    }
  }

  private write(level: LogLevel, line: string): void {
    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesForCommand(command: string): LogEntry[] {
    return this.entries.filter((entry) => entry.context?.command === command);
  }

  /**
   * Entries at or above a level
   */
  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    const index = LEVELS.indexOf(level);
    return this.entries.filter((entry) => LEVELS.indexOf(entry.level) >= index);
  }

  clear(): void {
    this.entries = [];
  }

  getSummary(): Record<LogLevel, number> & { totalEntries: number } {
    const count = (level: LogLevel) => this.entries.filter((e) => e.level === level).length;
    return {
      totalEntries: this.entries.length,
      debug: count("debug"),
      info: count("info"),
      warn: count("warn"),
      error: count("error"),
    };
  }
}

export function formatPrefix(context: LogContext | undefined): string {
  if (!context) return "";

  const parts: string[] = [];
  if (context.phase) parts.push(`[${context.phase}]`);
  if (context.component) parts.push(`<${context.component}>`);
  if (context.command) parts.push(`"${context.command}"`);
  if (context.model) parts.push(`@${context.model}`);

  return parts.length > 0 ? parts.join(" ") + ": " : "";
}

export function formatData(data: Record<string, unknown>): string {
  const parts: string[] = [];

  for (const [key, value] of Object.entries(data)) {
    if (key === "duration" && typeof value === "number") {
      parts.push(`${key}: ${value}ms`);
    } else if (Array.isArray(value)) {
      parts.push(`${key}: [${value.length} items]`);
    } else if (typeof value === "object" && value !== null) {
      parts.push(`${key}: ${JSON.stringify(value)}`);
    } else {
      parts.push(`${key}: ${String(value)}`);
    }
  }

  return parts.join(", ");
}

export function formatEntry(entry: LogEntry): string {
  const line = formatPrefix(entry.context) + entry.message;
  return entry.data ? `${line}\n  ${formatData(entry.data)}` : line;
}

/**
 * Process-wide logger used by the build CLI
 */
export const globalLogger = new Logger("info", true);
