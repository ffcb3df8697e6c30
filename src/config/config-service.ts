/**
 * @module config-service
 *
 * 统一配置管理服务：集中管理所有环境变量配置。
 *
 * **使用方式**：
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const config = ConfigService.getInstance();
 * if (config.debugGraph) {
 *   // 输出调用图的强连通分量信息
 * }
 * ```
 */

import { LogLevel } from '../utils/logger.js';

export const DEFAULT_EFFECT_CONFIG_PATH = '.stract/effects.json';

/**
 * 配置服务单例类。
 *
 * 在首次调用 getInstance() 时初始化，从环境变量读取所有配置。
 * 配置项在实例生命周期内保持不变（只读）。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 内建调用前缀表路径（默认 .stract/effects.json） */
  readonly effectConfigPath: string;

  /** 日志级别（默认 INFO） */
  readonly logLevel: LogLevel;

  /** 是否输出调用图分量与收敛轮次（STRACT_DEBUG_GRAPH=1 启用） */
  readonly debugGraph: boolean;

  private constructor() {
    this.effectConfigPath = process.env.STRACT_EFFECT_CONFIG || DEFAULT_EFFECT_CONFIG_PATH;
    this.logLevel = ConfigService.parseLogLevel(process.env.LOG_LEVEL);
    this.debugGraph = process.env.STRACT_DEBUG_GRAPH === '1';
  }

  /**
   * 解析 LOG_LEVEL 环境变量；无法识别时回退为 INFO。
   */
  static parseLogLevel(raw: string | undefined): LogLevel {
    if (!raw) return LogLevel.INFO;
    switch (raw.trim().toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'INFO':
        return LogLevel.INFO;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  /**
   * 获取 ConfigService 单例实例。
   *
   * 若 STRACT_EFFECT_CONFIG 在两次调用之间发生变化，则重新读取环境变量。
   */
  static getInstance(): ConfigService {
    const currentPath = process.env.STRACT_EFFECT_CONFIG || DEFAULT_EFFECT_CONFIG_PATH;
    if (ConfigService.instance !== null && ConfigService.instance.effectConfigPath !== currentPath) {
      ConfigService.instance = null;
    }

    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  /**
   * 重置单例实例（仅用于测试）。
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
