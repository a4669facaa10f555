/**
 * 構造化ロギングユーティリティ
 *
 * @description 1行1JSONで出力し、ログ基盤側で region / module 単位に集計できるようにする
 */

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogContext {
  /** モジュール名 (macro-fetcher, price-client など) */
  module?: string;
  /** 地域キー (us, eurozone, ...) */
  region?: string;
  /** 取得トポロジー (html / json) */
  topology?: string;
  url?: string;
  statusCode?: number;
  rowCount?: number;
  durationMs?: number;
  /** Error はそのまま渡す（出力時にシリアライズ） */
  error?: unknown;
  [key: string]: unknown;
}

export interface LogTimer {
  end(context?: LogContext): number;
  endWithError(error: unknown, context?: LogContext): number;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** 固定コンテキストを追加した子ロガー */
  child(context: LogContext): Logger;
  startTimer(label: string): LogTimer;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const MIN_LEVEL_INDEX = (() => {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  const level: LogLevel = isLogLevel(configured)
    ? configured
    : process.env.NODE_ENV === 'production'
      ? 'info'
      : 'debug';
  return LOG_LEVELS.indexOf(level);
})();

const STACK_LINES = 5;

/**
 * Error を JSON 化できる形に変換（cause は再帰）
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { value: String(error) };
  }
  const serialized: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack?.split('\n').slice(0, STACK_LINES).join('\n'),
  };
  if (error.cause !== undefined) {
    serialized.cause = serializeError(error.cause);
  }
  return serialized;
}

function write(level: LogLevel, line: string): void {
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

/**
 * ロガーを作成
 *
 * @example
 * ```typescript
 * const logger = createLogger({ module: 'macro-fetcher' }).child({ topology: 'html' });
 * logger.warn('Calendar request failed', { region: 'uk', error });
 * ```
 */
export function createLogger(baseContext: LogContext = {}): Logger {
  const log = (level: LogLevel, message: string, context: LogContext = {}): void => {
    if (LOG_LEVELS.indexOf(level) < MIN_LEVEL_INDEX) {
      return;
    }

    const { error, ...rest } = context;
    write(
      level,
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...baseContext,
        ...rest,
        ...(error !== undefined ? { error: serializeError(error) } : {}),
      })
    );
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
    child: (context) => createLogger({ ...baseContext, ...context }),
    startTimer: (label) => {
      const startedAt = Date.now();
      return {
        end: (context) => {
          const durationMs = Date.now() - startedAt;
          log('info', `${label} completed`, { ...context, durationMs });
          return durationMs;
        },
        endWithError: (error, context) => {
          const durationMs = Date.now() - startedAt;
          log('error', `${label} failed`, { ...context, durationMs, error });
          return durationMs;
        },
      };
    },
  };
}
