/* Simple structured logger helper so we can swap implementations later if needed */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

export class Logger {
  private level: LogLevel;

  constructor(level?: string) {
    this.level = isLogLevel(level) ? level : 'info';
  }

  setLevel(level: string | undefined) {
    if (isLogLevel(level)) {
      this.level = level;
    }
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, meta?: Record<string, unknown>) {
    if (!this.isEnabled('debug')) return;
    console.debug(`[DEBUG] ${new Date().toISOString()} - ${message}`, meta ?? '');
  }

  info(message: string, meta?: Record<string, unknown>) {
    if (!this.isEnabled('info')) return;
    console.log(`[INFO] ${new Date().toISOString()} - ${message}`, meta ?? '');
  }

  error(message: string, meta?: unknown) {
    if (!this.isEnabled('error')) return;
    console.error(`[ERROR] ${new Date().toISOString()} - ${message}`, meta ?? '');
  }

  warn(message: string, meta?: Record<string, unknown>) {
    if (!this.isEnabled('warn')) return;
    console.warn(`[WARN] ${new Date().toISOString()} - ${message}`, meta ?? '');
  }
}

export const logger = new Logger(process.env.LOG_LEVEL);
