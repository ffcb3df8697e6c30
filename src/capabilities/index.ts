/**
 * @module capabilities
 *
 * 能力授权：声明解析、glob/协议约束与能力闭包检查。
 */

export {
  EMPTY_ENVIRONMENT,
  createEnvironment,
  grantsOfKind,
  parseCapabilityDeclarations,
  type CapabilityEnvironment,
  type CapabilityGrant,
  type DeclarationResult,
} from './declarations.js';
export {
  matchGlob,
  matchProtocol,
  parseGlob,
  parseProtocol,
  type GlobPattern,
  type ParseResult,
  type ProtocolConstraint,
} from './glob.js';
export {
  checkCapabilities,
  isSiteCovered,
  matchGrant,
  resolveEntryPoints,
  type CheckContext,
  type CheckResult,
  type CoverageReport,
  type GrantMatch,
  type SiteCoverage,
} from './checker.js';
