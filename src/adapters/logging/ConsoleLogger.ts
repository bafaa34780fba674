import { Logger, LogLevel } from '../../core/services/Logger';
import fs from 'fs';
import path from 'path';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export type FileSinkOptions = {
  maxSizeBytes?: number;
  maxFiles?: number;
};

// Console output plus an optional append-only log file, rotated by size
// (app.log -> app.log.1 -> app.log.2 ...).
export class ConsoleLogger implements Logger {
  private timers = new Map<string, number>();
  private fd?: number;
  private bytesWritten = 0;
  private readonly maxSizeBytes: number;
  private readonly maxFiles: number;

  constructor(
    private readonly level: LogLevel = 'info',
    private readonly filePath?: string,
    options: FileSinkOptions = {}
  ) {
    this.maxSizeBytes = options.maxSizeBytes ?? 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;
    if (filePath) this.open(filePath);
  }

  private open(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.fd = fs.openSync(filePath, 'a');
    this.bytesWritten = fs.fstatSync(this.fd).size;
  }

  private rotate(filePath: string): void {
    this.close();
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = `${filePath}.${i}`;
      if (fs.existsSync(from)) fs.renameSync(from, `${filePath}.${i + 1}`);
    }
    if (fs.existsSync(filePath)) fs.renameSync(filePath, `${filePath}.1`);
    this.open(filePath);
  }

  /** Closes the log file, if one is open. */
  close(): void {
    if (this.fd === undefined) return;
    fs.closeSync(this.fd);
    this.fd = undefined;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private format(level: LogLevel, message: string): string {
    return `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`;
  }

  private stringify(arg: unknown): string {
    if (arg instanceof Error) {
      return `${arg.name}: ${arg.message}${arg.stack ? `\n${arg.stack}` : ''}`;
    }
    if (typeof arg === 'string') return arg;
    try {
      return JSON.stringify(arg) ?? String(arg);
    } catch {
      return String(arg);
    }
  }

  private toFile(line: string, args: unknown[]): void {
    if (!this.filePath || this.fd === undefined) return;
    const extras = args.length ? ' ' + args.map((a) => this.stringify(a)).join(' ') : '';
    const text = `${line}${extras}\n`;
    const bytes = Buffer.byteLength(text, 'utf8');
    if (this.bytesWritten > 0 && this.bytesWritten + bytes > this.maxSizeBytes) {
      this.rotate(this.filePath);
    }
    if (this.fd === undefined) return;
    fs.writeSync(this.fd, text);
    this.bytesWritten += bytes;
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.enabled(level)) return;
    const line = this.format(level, message);
    console[level](line, ...args);
    this.toFile(line, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  time(label: string): void {
    this.timers.set(label, Date.now());
    this.debug(`Timer '${label}' started`);
  }

  timeEnd(label: string): number {
    const startTime = this.timers.get(label);
    if (startTime === undefined) {
      this.warn(`Timer '${label}' does not exist`);
      return 0;
    }
    const duration = Date.now() - startTime;
    this.timers.delete(label);
    this.info(`Timer '${label}': ${duration}ms`);
    return duration;
  }

  timeLog(label: string, message?: string, ...args: unknown[]): void {
    const startTime = this.timers.get(label);
    if (startTime === undefined) {
      this.warn(`Timer '${label}' does not exist`);
      return;
    }
    const duration = Date.now() - startTime;
    this.info(message ? `${message} (${duration}ms)` : `Timer '${label}': ${duration}ms`, ...args);
  }
}
