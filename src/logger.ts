// src/logger.ts

import * as fs from 'fs';
import * as path from 'path';
import type {
  LogContext,
  LogEvent,
  LogField,
  LoggerInstance,
  LogLevel,
} from './types/bridge-types.js';

class Logger {
  // One log file per process, shared by every Logger instance.
  private static fileStream: fs.WriteStream | null = null;
  private static filePath: string | null = null;
  // The file keeps every entry at this level or above, whatever the global level.
  // A level set for a category applies to the file as well.
  private static readonly FILE_LEVEL: LogLevel = 'info';

  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private consoleEnabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = ['timestamp', 'level', 'logger'];
  private watchCallback: ((data: LogEvent) => void) | null = null;

  /**
   * Opens the append-only log file. Resolves once the file is open.
   * @param filePath - Log file path; missing directories are created
   */
  static async openLogFile(filePath: string): Promise<void> {
    if (Logger.fileStream) {
      await Logger.closeLogFile();
    }
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    const stream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
    await new Promise<void>((resolve, reject) => {
      stream.once('open', () => resolve());
      stream.once('error', reject);
    });
    stream.on('error', (err: Error) => {
      console.error(`Log file ${filePath} failed: ${err.message}`);
    });
    Logger.fileStream = stream;
    Logger.filePath = filePath;
  }

  /**
   * Flushes and closes the log file, if one is open.
   */
  static async closeLogFile(): Promise<void> {
    const stream = Logger.fileStream;
    if (!stream) return;
    Logger.fileStream = null;
    Logger.filePath = null;
    await new Promise<void>(resolve => stream.end(() => resolve()));
  }

  static get logFilePath(): string | null {
    return Logger.filePath;
  }

  private getTimestamp(full: boolean): string {
    const iso = new Date().toISOString();
    return full ? iso : iso.slice(11, 19);
  }

  /**
   * Builds the header and body of one log line.
   * @param fullTimestamp - date and milliseconds in the timestamp (used for the file)
   */
  private format(
    level: LogLevel,
    args: unknown[],
    context: LogContext,
    fullTimestamp: boolean
  ): { header: string; body: string } {
    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) {
      headerParts.push(`[${this.getTimestamp(fullTimestamp)}]`);
    }
    if (this.logFormat.includes('level')) {
      headerParts.push(`[${level.toUpperCase()}]`);
    }
    if (this.logFormat.includes('logger') && context.logger) {
      headerParts.push(`[${context.logger}]`);
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.name}: ${arg.message}`;
      }
      return String(arg);
    });

    const contextToPrint: LogContext = { ...this.globalContext, ...context };
    delete contextToPrint.logger;
    if (Object.keys(contextToPrint).length > 0) {
      formattedArgs.push(JSON.stringify(contextToPrint));
    }

    return { header: headerParts.join(''), body: formattedArgs.join(' ') };
  }

  private hasCategoryLevel(context: LogContext): boolean {
    return context.logger !== undefined && context.logger in this.categoryLevels;
  }

  private shouldLog(level: LogLevel, context: LogContext): boolean {
    const category = context.logger;
    if (category !== undefined && category in this.categoryLevels) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none' || categoryLevel === undefined) return false;
      return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    const selected = this.shouldLog(level, context);
    const fileSelected =
      selected || (this.rank(level) >= this.rank(Logger.FILE_LEVEL) && !this.hasCategoryLevel(context));

    if (Logger.fileStream && fileSelected) {
      const { header, body } = this.format(level, args, context, true);
      Logger.fileStream.write(`${header} ${body}\n`);
    }

    if (!selected) return;

    this.logCounts[level]++;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    if (this.consoleEnabled) {
      const { header, body } = this.format(level, args, context, false);
      // console.trace would print a stack
      const method = level === 'trace' ? 'debug' : level;
      if (this.useColors) {
        console[method](`${this.COLORS[level]}${header}${this.COLORS.reset}`, body);
      } else {
        console[method](header, body);
      }
    }
  }

  private rank(level: LogLevel): number {
    return this.LEVELS.indexOf(level);
  }

  /**
   * Splits the arguments into the message parts and a trailing context object.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (isLogContext(lastArg)) {
        return { args: args.slice(0, -1), context: { ...lastArg } };
      }
    }
    return { args, context: {} };
  }

  private log(level: LogLevel, args: unknown[], category?: string): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    if (category !== undefined) context.logger = category;
    this.output(level, newArgs, context);
  }

  trace(...args: unknown[]): void {
    this.log('trace', args);
  }

  debug(...args: unknown[]): void {
    this.log('debug', args);
  }

  info(...args: unknown[]): void {
    this.log('info', args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', args);
  }

  error(...args: unknown[]): void {
    this.log('error', args);
  }

  setLevel(level: LogLevel): void {
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${String(level)}`);
    }
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${String(level)}`);
    this.categoryLevels[category] = level;
  }

  disableColors(): void {
    this.useColors = false;
  }

  /**
   * Stops console output; the log file and watch callback still receive entries.
   */
  muteConsole(): void {
    this.consoleEnabled = false;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  setLogFormat(fields: LogField[]): void {
    const validFields: LogField[] = ['timestamp', 'level', 'logger'];
    if (!Array.isArray(fields) || !fields.every(f => validFields.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${validFields.join(', ')}`);
    }
    this.logFormat = fields;
  }

  watch(callback: (data: LogEvent) => void): void {
    this.watchCallback = callback;
  }

  getCounts(): Record<LogLevel, number> {
    return { ...this.logCounts };
  }

  /**
   * Creates a logger instance with category.
   * @param name - Logger name
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, name),
      debug: (...args: unknown[]) => this.log('debug', args, name),
      info: (...args: unknown[]) => this.log('info', args, name),
      warn: (...args: unknown[]) => this.log('warn', args, name),
      error: (...args: unknown[]) => this.log('error', args, name),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.setLevelFor(name, 'none'),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error)
  );
}

/**
 * Process-wide instance; modules take their category loggers from it so that
 * the configured level applies everywhere.
 */
export const bridgeLogger = new Logger();

export default Logger;
