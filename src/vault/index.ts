/**
 * @module vault
 *
 * vault 绑定：静态作用域分析 (analyzeVaults) 与运行时守卫 (VaultGuard)。
 */

export { analyzeVaults, type VaultAnalysisOptions, type VaultAnalysisResult } from './analyzer.js';
export {
  findBlock,
  type FunctionVaultMetadata,
  type SafeBlockMetadata,
  type VaultBindingMetadata,
  type VaultScopeMetadata,
} from './metadata.js';
export {
  SafeScope,
  VaultGuard,
  VaultHandle,
  type SafeBlockSpec,
  type ScopeEvent,
  type VaultGuardObserver,
  type VaultGuardOptions,
} from './runtime_guard.js';
export {
  VaultGuardError,
  createZeroizationSink,
  globalZeroizationSink,
  isZeroed,
  zeroize,
  type ZeroizationSink,
} from './zeroize.js';
