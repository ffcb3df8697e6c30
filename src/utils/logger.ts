import { performance } from 'node:perf_hooks';
import { ConfigService } from '../config/config-service.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogMetadata {
  [key: string]: unknown;
}

/** 日志输出目标；默认写 stderr，测试可替换以捕获结构化日志 */
export type LogSink = (line: string) => void;

const stderrSink: LogSink = line => {
  console.error(line);
};

export class Logger {
  constructor(
    private readonly component: string,
    private readonly minLevel: LogLevel = LogLevel.INFO,
    private readonly sink: LogSink = stderrSink
  ) {}

  debug(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: Error, meta?: LogMetadata): void {
    const errorMeta = error
      ? {
          error: error.message,
          stack: error.stack,
          ...meta,
        }
      : meta;
    this.log(LogLevel.ERROR, message, errorMeta);
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  /**
   * 计时执行一个同步 pass，并以 DEBUG 级别记录耗时。
   */
  time<T>(operation: string, fn: () => T, meta?: LogMetadata): T {
    const start = performance.now();
    try {
      return fn();
    } finally {
      if (this.isEnabled(LogLevel.DEBUG)) {
        this.debug(`${operation} completed`, {
          duration_ms: Number((performance.now() - start).toFixed(3)),
          ...meta,
        });
      }
    }
  }

  private log(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (!this.isEnabled(level)) return;

    const entry = {
      level: LogLevel[level],
      timestamp: new Date().toISOString(),
      component: this.component,
      message,
      ...meta,
    };

    // stdout 留给 CLI 的诊断输出
    this.sink(JSON.stringify(entry));
  }
}

export interface PerformanceMetrics {
  component: string;
  operation: string;
  duration: number;
  metadata?: LogMetadata;
}

export function logPerformance(metrics: PerformanceMetrics): void {
  const logger = createLogger('performance');
  logger.info(`${metrics.operation} completed`, {
    component: metrics.component,
    duration_ms: metrics.duration,
    ...metrics.metadata,
  });
}

export function createLogger(component: string, sink?: LogSink): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel, sink);
}
