import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  DEFAULT_EFFECT_KINDS,
  EffectKindError,
  EffectKindRegistry,
  FILESYSTEM,
  NETWORK,
  SYSCALL,
  type EffectKindDescriptor,
} from '../../../src/effects/effect_kind.js';

const DATABASE: EffectKindDescriptor = {
  name: 'Database',
  aliases: ['Db'],
  protocolField: null,
  patternField: 'name',
  patternSyntax: { separator: '.', leadingSeparator: false, caseInsensitive: false, segmentChars: /^[a-z_]*$/i },
  deriveTarget: (_member, literal): Record<string, string> => (literal ? { name: literal } : {}),
};

describe('EffectKindRegistry', () => {
  it('按名称或别名大小写不敏感地解析', () => {
    assert.equal(DEFAULT_EFFECT_KINDS.resolve('net'), NETWORK);
    assert.equal(DEFAULT_EFFECT_KINDS.resolve('HTTP'), NETWORK);
    assert.equal(DEFAULT_EFFECT_KINDS.resolve('files'), FILESYSTEM);
    assert.equal(DEFAULT_EFFECT_KINDS.resolve('Sys'), SYSCALL);
    assert.equal(DEFAULT_EFFECT_KINDS.resolve('Clock'), undefined);
  });

  it('get 只接受规范名称', () => {
    assert.equal(DEFAULT_EFFECT_KINDS.get('Network'), NETWORK);
    assert.equal(DEFAULT_EFFECT_KINDS.get('Net'), undefined);
  });

  it('names 按字典序返回', () => {
    assert.deepEqual(DEFAULT_EFFECT_KINDS.names(), ['Filesystem', 'Network', 'Syscall']);
  });

  it('extend 返回包含新种类的副本', () => {
    const extended = DEFAULT_EFFECT_KINDS.extend(DATABASE);
    assert.equal(extended.resolve('db'), DATABASE);
    assert.deepEqual(extended.names(), ['Database', 'Filesystem', 'Network', 'Syscall']);
    assert.equal(DEFAULT_EFFECT_KINDS.resolve('db'), undefined);
  });

  it('重复注册与别名冲突抛出 EffectKindError', () => {
    assert.throws(() => new EffectKindRegistry([NETWORK, NETWORK]), EffectKindError);
    assert.throws(
      () => new EffectKindRegistry([NETWORK, { ...DATABASE, aliases: ['http'] }]),
      { name: 'EffectKindError', message: "Alias 'http' of 'Database' is already used by 'Network'" }
    );
  });
});

describe('内建调用的目标推导', () => {
  it('Network 从 URL 推导协议与域名', () => {
    assert.deepEqual(NETWORK.deriveTarget('get', 'https://API.Bank.com/v1?x=1'), {
      protocol: 'https',
      domain: 'api.bank.com',
    });
    assert.deepEqual(NETWORK.deriveTarget('get', 'Google.com/search'), { domain: 'google.com' });
    assert.deepEqual(NETWORK.deriveTarget('get', undefined), {});
  });

  it('Network 无法解析主机时只保留协议', () => {
    assert.deepEqual(NETWORK.deriveTarget('get', 'http://[broken'), { protocol: 'http' });
  });

  it('Filesystem 使用第一个字符串字面量作为路径', () => {
    assert.deepEqual(FILESYSTEM.deriveTarget('read', '/etc/hosts'), { path: '/etc/hosts' });
    assert.deepEqual(FILESYSTEM.deriveTarget('read', undefined), {});
  });

  it('Syscall 优先使用字面量，否则使用成员名', () => {
    assert.deepEqual(SYSCALL.deriveTarget('fork', undefined), { name: 'fork' });
    assert.deepEqual(SYSCALL.deriveTarget('exec', 'kill'), { name: 'kill' });
    assert.deepEqual(SYSCALL.deriveTarget('', undefined), {});
  });
});
