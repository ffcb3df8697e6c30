/**
 * @module vault/runtime_guard
 *
 * vault 运行时守卫：密钥生命周期与明文缓冲区卫生。
 *
 * - 每个 vault 绑定在创建时生成独立的 256 位密钥，只存在于进程内存
 * - 值以 AES-256-GCM 加密保存（12 字节随机 IV，16 字节认证标签）
 * - 进入 safe 块时将其拥有的绑定解密到短生命周期缓冲区；外层仍活动的块已解密的绑定直接复用
 * - 块以任何方式退出（正常结束、提前 return、抛错、Promise 拒绝）时，在 finally 中清零本块创建的缓冲区
 * - 活动 safe 链按异步执行上下文（AsyncLocalStorage）隔离，不同异步链之间不共享明文缓冲区
 *
 * 访问合法性已由静态分析保证，守卫不做运行时权限复查。
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { createLogger } from '../utils/logger.js';
import { findBlock, type VaultScopeMetadata } from './metadata.js';
import { VaultGuardError, globalZeroizationSink, zeroize, type ZeroizationSink } from './zeroize.js';

const ALGORITHM = 'aes-256-gcm';
const KEY_LEN = 32;
const IV_LEN = 12;
const TAG_LEN = 16;

interface SealedEntry {
  readonly guard: VaultGuard;
  readonly key: Buffer;
  readonly iv: Buffer;
  readonly ciphertext: Buffer;
  readonly tag: Buffer;
}

// 句柄本身不持有密钥材料
const sealed = new WeakMap<VaultHandle, SealedEntry>();

/**
 * 指向一个加密 vault 值的句柄。只能在 SafeScope 中通过 `reveal` 取得明文。
 */
export class VaultHandle {
  constructor(
    readonly name: string,
    readonly type: string
  ) {}

  get disposed(): boolean {
    return !sealed.has(this);
  }

  toString(): string {
    return `VaultHandle(${this.name}: ${this.type})`;
  }

  toJSON(): { vault: string; type: string } {
    return { vault: this.name, type: this.type };
  }
}

export interface SafeBlockSpec {
  readonly id: string;
  /** 由本块负责解密与清零的句柄 */
  readonly owned?: readonly VaultHandle[];
}

export interface ScopeEvent {
  readonly scopeId: string;
  readonly parentId: string | null;
  /** 本块创建（并负责清零）的缓冲区 */
  readonly buffers: readonly Buffer[];
}

/**
 * 观测钩子：在块进入与退出时对缓冲区做内存快照。onRelease 在清零之后调用。
 */
export interface VaultGuardObserver {
  onAcquire?(event: ScopeEvent): void;
  onRelease?(event: ScopeEvent): void;
}

export interface VaultGuardOptions {
  readonly observer?: VaultGuardObserver;
  readonly sink?: ZeroizationSink;
}

const logger = createLogger('vault.guard');

/**
 * 一个活动的 safe 块。退出后不可再使用。
 */
export class SafeScope {
  private readonly buffers = new Map<VaultHandle, Buffer>();
  private active = true;

  constructor(
    private readonly guard: VaultGuard,
    readonly id: string,
    readonly parent: SafeScope | null
  ) {}

  get isActive(): boolean {
    return this.active;
  }

  /**
   * 取得句柄的明文缓冲区。优先复用本块或外层活动块已解密的缓冲区；
   * 否则延迟解密到本块，并在本块退出时清零。
   */
  reveal(handle: VaultHandle): Buffer {
    if (!this.active) {
      throw new VaultGuardError(`safe scope '${this.id}' has exited; '${handle.name}' can no longer be revealed`);
    }
    for (let scope: SafeScope | null = this; scope !== null; scope = scope.parent) {
      const existing = scope.active ? scope.buffers.get(handle) : undefined;
      if (existing) return existing;
    }
    const buffer = this.guard.decrypt(handle);
    this.buffers.set(handle, buffer);
    return buffer;
  }

  /** 本块创建的缓冲区 */
  ownedBuffers(): Buffer[] {
    return [...this.buffers.values()];
  }

  /** @internal 进入时解密本块拥有的句柄 */
  acquire(handles: readonly VaultHandle[]): void {
    for (const handle of handles) {
      if (this.findInParents(handle)) continue;
      if (!this.buffers.has(handle)) this.buffers.set(handle, this.guard.decrypt(handle));
    }
  }

  /** @internal 退出时清零本块创建的全部缓冲区 */
  release(sink: ZeroizationSink): void {
    this.active = false;
    let failure: unknown = null;
    for (const buffer of this.buffers.values()) {
      try {
        zeroize(buffer, sink);
      } catch (error) {
        failure ??= error;
      }
    }
    if (failure) throw failure;
  }

  private findInParents(handle: VaultHandle): boolean {
    for (let scope = this.parent; scope !== null; scope = scope.parent) {
      if (scope.active && scope.buffers.has(handle)) return true;
    }
    return false;
  }
}

/**
 * vault 守卫。每个实例拥有自己创建的全部密钥；没有全局密钥存储。
 */
export class VaultGuard {
  private readonly storage = new AsyncLocalStorage<SafeScope>();
  private readonly handles = new Set<VaultHandle>();
  private readonly sink: ZeroizationSink;
  private readonly observer: VaultGuardObserver | undefined;
  private disposed = false;

  constructor(options: VaultGuardOptions = {}) {
    this.sink = options.sink ?? globalZeroizationSink;
    this.observer = options.observer;
  }

  /**
   * 创建 vault 绑定：生成独立密钥并加密明文。传入 Buffer 时，加密后立即清零调用方的缓冲区。
   */
  seal(name: string, type: string, plaintext: string | Buffer): VaultHandle {
    this.assertUsable();
    const input = typeof plaintext === 'string' ? Buffer.from(plaintext, 'utf8') : plaintext;
    const key = randomBytes(KEY_LEN);
    const iv = randomBytes(IV_LEN);
    const cipher = createCipheriv(ALGORITHM, key, iv);
    const ciphertext = Buffer.concat([cipher.update(input), cipher.final()]);
    const tag = cipher.getAuthTag();
    zeroize(input, this.sink);
    if (tag.byteLength !== TAG_LEN) {
      zeroize(key, this.sink);
      throw new VaultGuardError(`unexpected GCM tag length: ${tag.byteLength}`);
    }

    const handle = new VaultHandle(name, type);
    sealed.set(handle, { guard: this, key, iv, ciphertext, tag });
    this.handles.add(handle);
    return handle;
  }

  /**
   * 同步执行 safe 块。body 不应返回 Promise；异步代码使用 safeAsync。
   */
  safe<T>(block: SafeBlockSpec | string, body: (scope: SafeScope) => T): T {
    const scope = this.open(block);
    try {
      return this.storage.run(scope, () => body(scope));
    } finally {
      this.close(scope);
    }
  }

  async safeAsync<T>(block: SafeBlockSpec | string, body: (scope: SafeScope) => Promise<T>): Promise<T> {
    const scope = this.open(block);
    try {
      return await this.storage.run(scope, () => body(scope));
    } finally {
      this.close(scope);
    }
  }

  /**
   * 按静态分析产出的元数据进入 safe 块：块拥有的绑定名经 handles 映射到句柄。
   */
  enterWithMetadata<T>(
    metadata: VaultScopeMetadata,
    blockId: string,
    handles: ReadonlyMap<string, VaultHandle>,
    body: (scope: SafeScope) => T
  ): T {
    return this.safe(this.specFromMetadata(metadata, blockId, handles), body);
  }

  async enterWithMetadataAsync<T>(
    metadata: VaultScopeMetadata,
    blockId: string,
    handles: ReadonlyMap<string, VaultHandle>,
    body: (scope: SafeScope) => Promise<T>
  ): Promise<T> {
    return this.safeAsync(this.specFromMetadata(metadata, blockId, handles), body);
  }

  /** 当前异步上下文中最内层的活动 safe 块 */
  currentScope(): SafeScope | undefined {
    return this.storage.getStore();
  }

  /**
   * 销毁单个绑定：清零其密钥。之后无法再解密。
   */
  destroy(handle: VaultHandle): void {
    const entry = sealed.get(handle);
    if (!entry || entry.guard !== this) return;
    zeroize(entry.key, this.sink);
    sealed.delete(handle);
    this.handles.delete(handle);
  }

  /**
   * 清零本守卫持有的全部密钥。
   */
  dispose(): void {
    for (const handle of [...this.handles]) this.destroy(handle);
    this.disposed = true;
  }

  /** @internal 解密到新分配（不经缓冲池）的缓冲区 */
  decrypt(handle: VaultHandle): Buffer {
    this.assertUsable();
    const entry = sealed.get(handle);
    if (!entry) throw new VaultGuardError(`vault '${handle.name}' has been destroyed`);
    if (entry.guard !== this) throw new VaultGuardError(`vault '${handle.name}' belongs to another guard`);

    const decipher = createDecipheriv(ALGORITHM, entry.key, entry.iv);
    decipher.setAuthTag(entry.tag);
    const parts = [decipher.update(entry.ciphertext), decipher.final()];
    const length = parts.reduce((sum, part) => sum + part.length, 0);
    const plaintext = Buffer.alloc(length);
    let offset = 0;
    for (const part of parts) {
      part.copy(plaintext, offset);
      offset += part.length;
      zeroize(part, this.sink);
    }
    return plaintext;
  }

  private open(block: SafeBlockSpec | string): SafeScope {
    this.assertUsable();
    const spec: SafeBlockSpec = typeof block === 'string' ? { id: block } : block;
    const scope = new SafeScope(this, spec.id, this.storage.getStore() ?? null);
    try {
      scope.acquire(spec.owned ?? []);
    } catch (error) {
      scope.release(this.sink);
      throw error;
    }
    logger.debug('safe scope entered', { scope: scope.id, acquired: scope.ownedBuffers().length });
    this.observer?.onAcquire?.({ scopeId: scope.id, parentId: scope.parent?.id ?? null, buffers: scope.ownedBuffers() });
    return scope;
  }

  private close(scope: SafeScope): void {
    const buffers = scope.ownedBuffers();
    try {
      scope.release(this.sink);
    } finally {
      logger.debug('safe scope exited', { scope: scope.id, cleared: buffers.length });
      this.observer?.onRelease?.({ scopeId: scope.id, parentId: scope.parent?.id ?? null, buffers });
    }
  }

  private specFromMetadata(
    metadata: VaultScopeMetadata,
    blockId: string,
    handles: ReadonlyMap<string, VaultHandle>
  ): SafeBlockSpec {
    const block = findBlock(metadata, blockId);
    if (!block) throw new VaultGuardError(`unknown safe block '${blockId}'`);
    const owned = block.owned.map(name => {
      const handle = handles.get(name);
      if (!handle) throw new VaultGuardError(`safe block '${blockId}' owns '${name}' but no handle was provided`);
      return handle;
    });
    return { id: block.id, owned };
  }

  private assertUsable(): void {
    if (this.disposed) throw new VaultGuardError('vault guard has been disposed');
  }
}
