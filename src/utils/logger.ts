export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Defaults to process.stderr. */
  sink?: (line: string) => void;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  get level(): LogLevel {
    return this.opts.level ?? 'info';
  }

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }
  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }
  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    if (levelRank[level] < levelRank[this.level]) return;

    const timestamp = new Date().toISOString();
    const write = this.opts.sink ?? ((line: string) => process.stderr.write(line));

    if (this.opts.json) {
      write(`${JSON.stringify({ timestamp, level, message, data })}\n`);
      return;
    }

    const line = data === undefined ? `${timestamp} ${level} ${message}` : `${timestamp} ${level} ${message} ${safeJson(data)}`;
    write(`${line}\n`);
  }
}

export function isLogLevel(v: string | undefined): v is LogLevel {
  return v === 'debug' || v === 'info' || v === 'warn' || v === 'error';
}

/**
 * Logger configured from the environment.
 * GATEWISE_LOG_LEVEL wins over GATEWISE_VERBOSE; GATEWISE_QUIET switches to JSON lines.
 */
export function loggerFromEnv(env: NodeJS.ProcessEnv = process.env): Logger {
  const explicit = env.GATEWISE_LOG_LEVEL?.trim().toLowerCase();
  const level: LogLevel = isLogLevel(explicit) ? explicit : env.GATEWISE_VERBOSE === '1' ? 'debug' : 'warn';
  return new Logger({ level, json: env.GATEWISE_QUIET === '1' });
}

let _logger: Logger | null = null;

export function getLogger(): Logger {
  if (!_logger) _logger = loggerFromEnv();
  return _logger;
}

export function setLogger(logger: Logger): void {
  _logger = logger;
}

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
