import { appendFileSync } from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success';

export type LogFields = Record<string, unknown>;

export class Logger {
  private debugEnabled: boolean;
  private lastDebugTime: number;
  private logFile?: string;

  // ANSI color codes
  private colors = {
    reset: '\x1b[0m',
    dim: '\x1b[2m',
    gray: '\x1b[90m',
    cyan: '\x1b[36m',
    yellow: '\x1b[33m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    blue: '\x1b[34m'
  };

  constructor(debug = false) {
    this.debugEnabled = debug || !!process.env.DEBUG;
    this.lastDebugTime = Date.now();
  }

  setDebug(enabled: boolean) {
    this.debugEnabled = !!enabled;
  }

  /**
   * Mirror every emitted record to a JSON-lines file. Pass undefined to detach.
   */
  setLogFile(filePath: string | undefined) {
    this.logFile = filePath;
  }

  getLogFile(): string | undefined {
    return this.logFile;
  }

  debug(msg: string, fields?: LogFields) {
    if (!this.debugEnabled) return;
    const now = Date.now();
    const elapsed = now - this.lastDebugTime;
    this.lastDebugTime = now;
    // eslint-disable-next-line no-console
    console.debug(`${this.colors.cyan}[DEBUG +${elapsed}ms]${this.colors.reset}`, msg + this.formatFields(fields));
    this.persist('debug', msg, fields);
  }

  info(msg: string, fields?: LogFields) {
    // eslint-disable-next-line no-console
    console.log(`${this.colors.blue}[INFO]${this.colors.reset}`, msg + this.formatFields(fields));
    this.persist('info', msg, fields);
  }

  warn(msg: string, fields?: LogFields) {
    // eslint-disable-next-line no-console
    console.warn(`${this.colors.yellow}[WARN]${this.colors.reset}`, msg + this.formatFields(fields));
    this.persist('warn', msg, fields);
  }

  error(msg: string, fields?: LogFields) {
    // eslint-disable-next-line no-console
    console.error(`${this.colors.red}[ERROR]${this.colors.reset}`, msg + this.formatFields(fields));
    this.persist('error', msg, fields);
  }

  success(msg: string, fields?: LogFields) {
    // eslint-disable-next-line no-console
    console.log(`${this.colors.green}[SUCCESS]${this.colors.reset}`, msg + this.formatFields(fields));
    this.persist('success', msg, fields);
  }

  private formatFields(fields?: LogFields): string {
    if (!fields || Object.keys(fields).length === 0) return '';

    const formatted = Object.entries(fields)
      .map(([key, value]) => {
        const valueStr = typeof value === 'string' ? value : JSON.stringify(value);
        return `${this.colors.dim}${key}=${valueStr}${this.colors.reset}`;
      })
      .join(' ');

    return ` ${formatted}`;
  }

  private persist(level: LogLevel, msg: string, fields?: LogFields) {
    if (!this.logFile) return;
    const record = {
      time: new Date().toISOString(),
      level,
      msg,
      ...(fields || {})
    };
    appendFileSync(this.logFile, JSON.stringify(record) + '\n', 'utf-8');
  }
}

const logger = new Logger();
export { logger };
export default logger;
