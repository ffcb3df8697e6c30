import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigService, DEFAULT_EFFECT_CONFIG_PATH } from '../../../src/config/config-service.js';
import { LogLevel, Logger, createLogger } from '../../../src/utils/logger.js';
import { snapshotEnv } from '../../helpers/test-utils.js';

const restoreEnv = snapshotEnv(['STRACT_EFFECT_CONFIG', 'STRACT_DEBUG_GRAPH', 'LOG_LEVEL']);

beforeEach(() => {
  restoreEnv();
  delete process.env.STRACT_EFFECT_CONFIG;
  delete process.env.STRACT_DEBUG_GRAPH;
  delete process.env.LOG_LEVEL;
  ConfigService.resetForTesting();
});

afterEach(() => {
  restoreEnv();
  ConfigService.resetForTesting();
});

describe('ConfigService', () => {
  it('未设置环境变量时使用默认值', () => {
    const config = ConfigService.getInstance();
    assert.equal(config.effectConfigPath, DEFAULT_EFFECT_CONFIG_PATH);
    assert.equal(config.logLevel, LogLevel.INFO);
    assert.equal(config.debugGraph, false);
  });

  it('读取环境变量', () => {
    process.env.STRACT_EFFECT_CONFIG = '/tmp/custom-effects.json';
    process.env.STRACT_DEBUG_GRAPH = '1';
    process.env.LOG_LEVEL = 'debug';
    const config = ConfigService.getInstance();
    assert.equal(config.effectConfigPath, '/tmp/custom-effects.json');
    assert.equal(config.debugGraph, true);
    assert.equal(config.logLevel, LogLevel.DEBUG);
  });

  it('单例在配置路径不变时复用', () => {
    assert.equal(ConfigService.getInstance(), ConfigService.getInstance());
  });

  it('STRACT_EFFECT_CONFIG 变化时重新读取', () => {
    const first = ConfigService.getInstance();
    process.env.STRACT_EFFECT_CONFIG = '/tmp/other.json';
    const second = ConfigService.getInstance();
    assert.notEqual(first, second);
    assert.equal(second.effectConfigPath, '/tmp/other.json');
  });

  it('无法识别的日志级别回退为 INFO', () => {
    assert.equal(ConfigService.parseLogLevel('verbose'), LogLevel.INFO);
    assert.equal(ConfigService.parseLogLevel(' warn '), LogLevel.WARN);
    assert.equal(ConfigService.parseLogLevel('ERROR'), LogLevel.ERROR);
    assert.equal(ConfigService.parseLogLevel(undefined), LogLevel.INFO);
  });
});

describe('Logger', () => {
  it('输出结构化 JSON 并按级别过滤', () => {
    const lines: string[] = [];
    const logger = new Logger('test.component', LogLevel.WARN, line => lines.push(line));
    logger.info('ignored');
    logger.warn('kept', { unit: 'app' });
    assert.equal(lines.length, 1);
    const entry: unknown = JSON.parse(lines[0] ?? '');
    assert.ok(typeof entry === 'object' && entry !== null);
    assert.deepEqual(
      { ...entry, timestamp: 'T' },
      { level: 'WARN', timestamp: 'T', component: 'test.component', message: 'kept', unit: 'app' }
    );
  });

  it('error 附带错误消息', () => {
    const lines: string[] = [];
    const logger = new Logger('test', LogLevel.DEBUG, line => lines.push(line));
    logger.error('failed', new Error('boom'));
    const entry: unknown = JSON.parse(lines[0] ?? '');
    assert.ok(typeof entry === 'object' && entry !== null && 'error' in entry);
    assert.equal(entry.error, 'boom');
  });

  it('createLogger 使用 LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'ERROR';
    ConfigService.resetForTesting();
    const lines: string[] = [];
    const logger = createLogger('test', line => lines.push(line));
    logger.warn('hidden');
    logger.error('shown');
    assert.equal(lines.length, 1);
    assert.equal(logger.isEnabled(LogLevel.WARN), false);
  });

  it('time 返回结果并在 DEBUG 级别记录耗时', () => {
    const lines: string[] = [];
    const logger = new Logger('test', LogLevel.DEBUG, line => lines.push(line));
    assert.equal(logger.time('sum', () => 1 + 2), 3);
    assert.equal(lines.length, 1);
    assert.match(lines[0] ?? '', /"message":"sum completed"/);
  });
});
