/**
 * 明文缓冲区清零。
 *
 * 写零之后逐字节回读并累积到 sink；回读发现残留字节时抛出 VaultGuardError。
 */

export class VaultGuardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VaultGuardError';
  }
}

export interface ZeroizationSink {
  /** 已清零的缓冲区数 */
  clears: number;
  /** 已清零的字节总数 */
  bytes: number;
  /** 所有回读字节的按位或；正常情况下恒为 0 */
  residue: number;
}

export function createZeroizationSink(): ZeroizationSink {
  return { clears: 0, bytes: 0, residue: 0 };
}

export const globalZeroizationSink: ZeroizationSink = createZeroizationSink();

export function zeroize(buffer: Uint8Array, sink: ZeroizationSink = globalZeroizationSink): void {
  buffer.fill(0);
  let residue = 0;
  for (let i = 0; i < buffer.length; i += 1) {
    residue |= buffer[i] ?? 0;
  }
  sink.clears += 1;
  sink.bytes += buffer.length;
  sink.residue |= residue;
  if (residue !== 0) {
    throw new VaultGuardError(`zeroization left residue in a ${buffer.length}-byte buffer`);
  }
}

export function isZeroed(buffer: Uint8Array): boolean {
  return buffer.every(byte => byte === 0);
}
