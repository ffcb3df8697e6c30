/**
 * @module config/effect_config
 *
 * 内建调用前缀表：前端未给出效应标注的调用，按调用名前缀归类为效应种类。
 *
 * **功能**：
 * - 默认前缀：Network `Net.`/`Http.`，Filesystem `Fs.`/`File.`，Syscall `Sys.`
 * - 支持环境变量 STRACT_EFFECT_CONFIG 自定义配置路径（默认 .stract/effects.json）
 * - 按文件 mtime/size 判断缓存是否失效
 *
 * 配置文件不存在或解析失败时静默降级到默认配置。
 */

import * as fs from 'node:fs';
import { ConfigService } from './config-service.js';
import type { EffectKindRegistry } from '../effects/effect_kind.js';

/**
 * 前缀表配置：`{ "patterns": { "<EffectKind>": ["Prefix.", ...] } }`
 */
export interface EffectPrefixConfig {
  readonly patterns: Readonly<Record<string, readonly string[]>>;
}

export interface EffectConfigSnapshot {
  config: EffectPrefixConfig;
  filePath: string;
  /** 文件最近修改时间（毫秒）；-1 表示使用了默认配置 */
  mtimeMs: number;
  size: number;
}

/** 一条前缀规则 */
export interface PrefixRule {
  readonly prefix: string;
  readonly kind: string;
}

export const DEFAULT_EFFECT_PREFIXES: EffectPrefixConfig = {
  patterns: {
    Network: ['Net.', 'Http.'],
    Filesystem: ['Fs.', 'File.'],
    Syscall: ['Sys.'],
  },
};

let cachedSnapshot: EffectConfigSnapshot | null = null;

/**
 * 重置配置缓存（仅用于测试）。
 */
export function resetConfigForTesting(): void {
  cachedSnapshot = null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateStringArray(value: unknown, fallback: readonly string[]): readonly string[] {
  if (!Array.isArray(value)) {
    return fallback;
  }
  const cleaned = value.filter((item): item is string => typeof item === 'string' && item.length > 0);
  return cleaned.length > 0 ? cleaned : fallback;
}

/**
 * 合并用户配置与默认配置：用户条目覆盖同名种类，其余种类保留默认前缀。
 */
function mergeWithDefault(userConfig: unknown): EffectPrefixConfig {
  const userPatterns = isRecord(userConfig) && isRecord(userConfig.patterns) ? userConfig.patterns : {};
  const merged: Record<string, readonly string[]> = { ...DEFAULT_EFFECT_PREFIXES.patterns };
  for (const [kind, prefixes] of Object.entries(userPatterns)) {
    merged[kind] = validateStringArray(prefixes, DEFAULT_EFFECT_PREFIXES.patterns[kind] ?? []);
  }
  return { patterns: merged };
}

function shouldReload(filePath: string): boolean {
  if (!cachedSnapshot || cachedSnapshot.filePath !== filePath) {
    return true;
  }
  const usedDefault = cachedSnapshot.mtimeMs === -1 && cachedSnapshot.size === -1;
  try {
    const stat = fs.statSync(filePath);
    return usedDefault || cachedSnapshot.mtimeMs !== stat.mtimeMs || cachedSnapshot.size !== stat.size;
  } catch {
    return !usedDefault;
  }
}

/**
 * 加载前缀表配置。
 *
 * 配置来源优先级：
 * 1. 环境变量 STRACT_EFFECT_CONFIG 指定的路径
 * 2. 默认路径 .stract/effects.json
 * 3. 配置文件不存在或解析失败时使用 DEFAULT_EFFECT_PREFIXES
 */
export function loadEffectConfig(): EffectPrefixConfig {
  const configPath = ConfigService.getInstance().effectConfigPath;

  if (!shouldReload(configPath) && cachedSnapshot) {
    return cachedSnapshot.config;
  }

  try {
    const stat = fs.statSync(configPath);
    const content = fs.readFileSync(configPath, 'utf8');
    const parsed: unknown = JSON.parse(content);
    cachedSnapshot = {
      config: mergeWithDefault(parsed),
      filePath: configPath,
      mtimeMs: stat.mtimeMs,
      size: stat.size,
    };
    return cachedSnapshot.config;
  } catch {
    cachedSnapshot = {
      config: DEFAULT_EFFECT_PREFIXES,
      filePath: configPath,
      mtimeMs: -1,
      size: -1,
    };
    return cachedSnapshot.config;
  }
}

/**
 * @param force - 传入 true 时先清空缓存后再加载
 */
export function reloadEffectConfig(force = false): EffectPrefixConfig {
  if (force) {
    cachedSnapshot = null;
  }
  return loadEffectConfig();
}

/**
 * 将配置展开为前缀规则列表，只保留注册表中存在的种类（别名解析为规范名）。
 *
 * 规则按前缀长度降序排列，较长前缀优先匹配。
 */
export function prefixRules(config: EffectPrefixConfig, registry: EffectKindRegistry): PrefixRule[] {
  const rules: PrefixRule[] = [];
  for (const [kindName, prefixes] of Object.entries(config.patterns)) {
    const descriptor = registry.resolve(kindName);
    if (!descriptor) continue;
    for (const prefix of prefixes) rules.push({ prefix, kind: descriptor.name });
  }
  return rules.sort(
    (a, b) => b.prefix.length - a.prefix.length || (a.prefix < b.prefix ? -1 : a.prefix > b.prefix ? 1 : 0)
  );
}
