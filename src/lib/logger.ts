const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  tag: string;
  message: string;
  args?: unknown[];
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Leveled, tagged logger.
 *
 * Everything goes to stderr: stdout belongs to the status bar and must carry
 * nothing but the JSON payload.
 */
export class Logger {
  private currentLogLevel: LogLevel = 'warn';
  private logLevelPriority: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
  private colors: boolean;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    const envLevel = env.LOG_LEVEL;
    if (isLogLevel(envLevel)) {
      this.currentLogLevel = envLevel;
    }
    this.colors = !env.NO_COLOR && Boolean(process.stderr.isTTY);
  }

  setLogLevel(level: LogLevel): void {
    this.currentLogLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.currentLogLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.logLevelPriority[level] >= this.logLevelPriority[this.currentLogLevel];
  }

  private getTimestamp() {
    return new Date().toISOString().replace('T', ' ').replace('Z', '');
  }

  private formatConsole(entry: LogEntry): unknown[] {
    const levelLabel = entry.level.toUpperCase().padEnd(5);
    if (!this.colors) {
      return [`${entry.timestamp} ${levelLabel} [${entry.tag}] ${entry.message}`, ...(entry.args || [])];
    }

    let levelColor = COLORS.reset;
    switch(entry.level) {
        case 'debug': levelColor = COLORS.blue; break;
        case 'info': levelColor = COLORS.green; break;
        case 'warn': levelColor = COLORS.yellow; break;
        case 'error': levelColor = COLORS.red; break;
    }

    const timestamp = `${COLORS.dim}${entry.timestamp}${COLORS.reset}`;
    const coloredLevel = `${levelColor}${levelLabel}${COLORS.reset}`;
    const coloredTag = `${COLORS.magenta}[${entry.tag}]${COLORS.reset}`;

    return [`${timestamp} ${coloredLevel} ${coloredTag} ${entry.message}`, ...(entry.args || [])];
  }

  private write(level: LogLevel, tag: string, message: string, args: unknown[]) {
      const entry: LogEntry = {
          timestamp: this.getTimestamp(),
          level,
          tag,
          message,
          args: args.length > 0 ? args : undefined
      };
      console.error(...this.formatConsole(entry));
  }

  debug(tag: string, message: string, ...args: unknown[]) {
      if (!this.shouldLog('debug')) return;
      this.write('debug', tag, message, args);
  }

  info(tag: string, message: string, ...args: unknown[]) {
      if (!this.shouldLog('info')) return;
      this.write('info', tag, message, args);
  }

  warn(tag: string, message: string, ...args: unknown[]) {
      if (!this.shouldLog('warn')) return;
      this.write('warn', tag, message, args);
  }

  error(tag: string, message: string, ...args: unknown[]) {
      // Always log errors
      this.write('error', tag, message, args);
  }
}

export const logger = new Logger();
