interface LogFields {
  [key: string]: unknown;
  msg: string;
  level: string;
  time: string; // ISO timestamp
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'human';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

// ANSI color codes
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red
};

export type LogSink = (line: string) => void;

/**
 * Structured logger. Everything goes to stderr: stdout belongs to the
 * remote-helper protocol and must only ever carry git's responses.
 */
export class Logger {
  private sink: LogSink;
  private colors: boolean;

  constructor(
    private level: LogLevel = 'warn',
    private format: LogFormat = 'human',
    sink?: LogSink
  ) {
    this.sink = sink ?? ((line) => process.stderr.write(line));
    this.colors = !sink && Boolean(process.stderr.isTTY);
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setFormat(format: LogFormat) {
    this.format = format;
  }

  setSink(sink: LogSink) {
    this.sink = sink;
    this.colors = false;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private paint(color: string, text: string): string {
    return this.colors ? `${color}${text}${COLORS.reset}` : text;
  }

  private formatFields(fields?: Record<string, unknown>): string {
    if (!fields || Object.keys(fields).length === 0) return '';

    const formatted = Object.entries(fields)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => {
        const valueStr = typeof value === 'string' ? value : JSON.stringify(value);
        return this.paint(COLORS.dim, `${key}=${valueStr}`);
      })
      .join(' ');

    return formatted ? ` ${formatted}` : '';
  }

  private writeHuman(level: LogLevel, msg: string, fields?: Record<string, unknown>) {
    const prefix = this.paint(LEVEL_COLORS[level], `dokuwiki: ${level}:`);
    this.sink(`${prefix} ${msg}${this.formatFields(fields)}\n`);
  }

  private writeJson(level: LogLevel, msg: string, fields?: Record<string, unknown>) {
    const rec: LogFields = {
      level,
      msg,
      time: new Date().toISOString(),
      ...(fields || {})
    };
    this.sink(JSON.stringify(rec) + '\n');
  }

  private write(level: LogLevel, msg: string, fields?: Record<string, unknown>) {
    if (!this.isEnabled(level)) return;

    if (this.format === 'human') {
      this.writeHuman(level, msg, fields);
    } else {
      this.writeJson(level, msg, fields);
    }
  }

  debug(msg: string, fields?: Record<string, unknown>) { this.write('debug', msg, fields); }
  info(msg: string, fields?: Record<string, unknown>) { this.write('info', msg, fields); }
  warn(msg: string, fields?: Record<string, unknown>) { this.write('warn', msg, fields); }
  error(msg: string, fields?: Record<string, unknown>) { this.write('error', msg, fields); }
}

export function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export function isLogFormat(value: string): value is LogFormat {
  return value === 'json' || value === 'human';
}

/**
 * git's verbosity scale: 0 quiet, 1 default, 2 for -v, 3+ for -vv.
 */
export function levelForVerbosity(verbosity: number): LogLevel {
  if (verbosity >= 3) return 'debug';
  if (verbosity === 2) return 'info';
  return 'warn';
}

const envLevel = process.env.LOG_LEVEL ?? '';
const envFormat = process.env.LOG_FORMAT ?? '';

export const logger = new Logger(
  isLogLevel(envLevel) ? envLevel : 'warn',
  isLogFormat(envFormat) ? envFormat : 'human'
);
