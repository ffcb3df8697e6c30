/**
 * @module diagnostics
 *
 * 诊断系统模块。
 *
 * 包含：
 * - 结构化诊断 (Diagnostic, DiagnosticBuilder, DiagnosticError)
 * - 诊断种类与严重级别 (DiagnosticKind, DiagnosticSeverity)
 * - 错误码定义 (ErrorCode, ErrorMetadata)
 */

export {
  DiagnosticSeverity,
  DiagnosticError,
  DiagnosticBuilder,
  compareDiagnostics,
  comparePositions,
  sortDiagnostics,
  formatDiagnostic,
  type Diagnostic,
  type RelatedGrant,
  type ReportOptions,
} from './diagnostics.js';

export {
  DiagnosticKind,
  ErrorCode,
  ERROR_METADATA,
  formatErrorMessage,
  getErrorMetadata,
  type ErrorSeverity,
  type ErrorMetadata,
} from './error_codes.js';
