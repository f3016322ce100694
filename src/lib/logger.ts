/**
 * Structured Logger - 結構化日誌系統
 * JSON 格式日誌，一律寫到 stderr，stdout 保留給指令輸出
 * 特性：
 *   - 日誌級別控制（AMOCRM_LOG_LEVEL）
 *   - requestId 追蹤
 *   - 執行時間 (duration)
 *   - 錯誤堆棧記錄
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** 請求唯一識別碼 */
  requestId?: string;
  /** HTTP 方法 */
  method?: string;
  /** 請求 URL 或端點 */
  url?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  /** 返回狀態碼 */
  statusCode?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: AMOCRM_LOG_LEVEL 或 'warn') */
  minLevel?: LogLevel;
  /** 輸出函數 (default: 寫入 stderr) */
  write?: (line: string) => void;
  /** 是否包含堆棧追蹤 (default: true) */
  includeStack?: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

/**
 * 從環境變數決定預設級別
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const value = env.AMOCRM_LOG_LEVEL?.toLowerCase();
  return isLogLevel(value) ? value : 'warn';
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class StructuredLogger {
  private component: string;
  private minLevel: LogLevel;
  private write: (line: string) => void;
  private includeStack: boolean;
  private requestIdStack: string[] = [];

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.minLevel = config.minLevel ?? resolveLogLevel();
    this.write = config.write ?? ((line: string) => process.stderr.write(`${line}\n`));
    this.includeStack = config.includeStack !== false;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error | null, context?: LogContext): void {
    this.log('error', message, context, error ?? undefined);
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context: this.enrichContext(context),
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: this.includeStack ? error.stack : undefined,
      };
    }

    this.write(JSON.stringify(entry));
  }

  /**
   * 沒有指定 requestId 時補上目前的 requestId
   */
  private enrichContext(context?: LogContext): LogContext | undefined {
    const current = this.getCurrentRequestId();
    if (!context) {
      return current ? { requestId: current } : undefined;
    }
    if (!context.requestId && current) {
      return { ...context, requestId: current };
    }
    return context;
  }

  pushRequestId(requestId?: string): string {
    const id = requestId || randomUUID();
    this.requestIdStack.push(id);
    return id;
  }

  popRequestId(): string | undefined {
    return this.requestIdStack.pop();
  }

  getCurrentRequestId(): string | undefined {
    return this.requestIdStack[this.requestIdStack.length - 1];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * 執行帶日誌的非同步操作，失敗時記錄後原樣拋出
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await fn();
      this.info(`${operation} completed`, { ...context, duration: Date.now() - startTime });
      return result;
    } catch (error) {
      this.error(
        `${operation} failed`,
        error instanceof Error ? error : new Error(String(error)),
        { ...context, duration: Date.now() - startTime }
      );
      throw error;
    }
  }
}

/**
 * 預設的日誌記錄器實例，按組件分類
 */
export const loggers = {
  oauth: new StructuredLogger('OAuth'),
  http: new StructuredLogger('HTTP'),
  config: new StructuredLogger('Config'),
};

/**
 * 一次調整所有預設 logger 的級別（CLI --verbose 使用）
 */
export function setGlobalLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}
