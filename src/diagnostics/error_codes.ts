/**
 * 错误码表：编号、所属诊断种类、严重级别、消息模板与帮助信息。
 *
 * 消息模板使用 `{param}` 占位符，由 `formatErrorMessage` 填充。
 */

export enum DiagnosticKind {
  DeclarationError = 'DeclarationError',
  CapabilityViolation = 'CapabilityViolation',
  VaultScopeError = 'VaultScopeError',
  MutabilityError = 'MutabilityError',
}

export type ErrorSeverity = 'error' | 'warning' | 'info';

export enum ErrorCode {
  // Capability declarations (D001-D099)
  DUPLICATE_CAPABILITY = 'D001',
  MALFORMED_PROTOCOL = 'D002',
  MALFORMED_PATTERN = 'D003',
  UNKNOWN_CAPABILITY_FIELD = 'D004',
  UNKNOWN_CAPABILITY_KIND = 'D005',
  UNSUPPORTED_CONSTRAINT = 'D006',
  DUPLICATE_CAPABILITY_FIELD = 'D007',
  INVALID_CAPABILITY_NAME = 'D008',
  DUPLICATE_FUNCTION = 'D009',

  // Capability closure (C001-C099)
  CAPABILITY_NOT_DECLARED = 'C001',
  CAPABILITY_TARGET_MISMATCH = 'C002',
  CAPABILITY_TARGET_FIELD_MISSING = 'C003',
  UNKNOWN_ENTRY_POINT = 'C004',

  // Vault scoping (V001-V099)
  VAULT_OUTSIDE_SAFE = 'V001',
  VAULT_ESCAPES_SAFE = 'V002',
  VAULT_UNDECLARED_CAPABILITY = 'V003',

  // Mutability (M001-M099)
  LOCK_REASSIGNED = 'M001',
  STRACT_RETYPED = 'M002',
  LOCK_USED_BEFORE_ASSIGNMENT = 'M003',
  VAULT_REASSIGNED = 'M004',
  VAULT_USED_BEFORE_ASSIGNMENT = 'M005',
}

export interface ErrorMetadata {
  readonly code: ErrorCode;
  readonly kind: DiagnosticKind;
  readonly severity: ErrorSeverity;
  readonly message: string;
  readonly help: string;
}

function entry(
  code: ErrorCode,
  kind: DiagnosticKind,
  message: string,
  help: string,
  severity: ErrorSeverity = 'error'
): ErrorMetadata {
  return { code, kind, severity, message, help };
}

export const ERROR_METADATA: Readonly<Record<ErrorCode, ErrorMetadata>> = {
  [ErrorCode.DUPLICATE_CAPABILITY]: entry(
    ErrorCode.DUPLICATE_CAPABILITY,
    DiagnosticKind.DeclarationError,
    "capability '{name}' is already declared",
    'Capability names must be unique within a unit; rename or merge the declarations.'
  ),
  [ErrorCode.MALFORMED_PROTOCOL]: entry(
    ErrorCode.MALFORMED_PROTOCOL,
    DiagnosticKind.DeclarationError,
    'capability \'{name}\': malformed protocol constraint "{value}"',
    'Use a comma-separated list of scheme names such as "https" or "https, wss", or "*".'
  ),
  [ErrorCode.MALFORMED_PATTERN]: entry(
    ErrorCode.MALFORMED_PATTERN,
    DiagnosticKind.DeclarationError,
    'capability \'{name}\': malformed {field} pattern "{value}" ({reason})',
    'Patterns are glob segments separated by the field separator; "*" matches within a segment, "**" spans segments.'
  ),
  [ErrorCode.UNKNOWN_CAPABILITY_FIELD]: entry(
    ErrorCode.UNKNOWN_CAPABILITY_FIELD,
    DiagnosticKind.DeclarationError,
    "capability '{name}': unknown field '{field}'",
    'Supported fields are kind and protocol plus the pattern field of each effect kind (domain, path, name).'
  ),
  [ErrorCode.UNKNOWN_CAPABILITY_KIND]: entry(
    ErrorCode.UNKNOWN_CAPABILITY_KIND,
    DiagnosticKind.DeclarationError,
    "capability '{name}': unknown capability kind '{kind}'",
    'Name the grant after an effect kind (Network, Filesystem, Syscall) or add an explicit kind field.'
  ),
  [ErrorCode.UNSUPPORTED_CONSTRAINT]: entry(
    ErrorCode.UNSUPPORTED_CONSTRAINT,
    DiagnosticKind.DeclarationError,
    "capability '{name}': {kind} grants do not support a {field} constraint",
    'Remove the constraint or declare the grant for an effect kind that defines it.'
  ),
  [ErrorCode.DUPLICATE_CAPABILITY_FIELD]: entry(
    ErrorCode.DUPLICATE_CAPABILITY_FIELD,
    DiagnosticKind.DeclarationError,
    "capability '{name}': field '{field}' is declared more than once",
    'Keep a single value per field; use a comma-separated protocol list to allow several protocols.'
  ),
  [ErrorCode.INVALID_CAPABILITY_NAME]: entry(
    ErrorCode.INVALID_CAPABILITY_NAME,
    DiagnosticKind.DeclarationError,
    "invalid capability name '{name}'",
    'Capability names are identifiers: a letter followed by letters, digits or underscores.'
  ),
  [ErrorCode.DUPLICATE_FUNCTION]: entry(
    ErrorCode.DUPLICATE_FUNCTION,
    DiagnosticKind.DeclarationError,
    "function '{name}' is defined more than once in unit '{unit}'",
    'Rename or remove one of the definitions; capability checks are skipped until function names are unique.'
  ),
  [ErrorCode.CAPABILITY_NOT_DECLARED]: entry(
    ErrorCode.CAPABILITY_NOT_DECLARED,
    DiagnosticKind.CapabilityViolation,
    "{kind} effect on {target} in '{func}': no grant declared for {kind}",
    'Declare `use capability {kind} { ... }` in the unit header or remove the effect.'
  ),
  [ErrorCode.CAPABILITY_TARGET_MISMATCH]: entry(
    ErrorCode.CAPABILITY_TARGET_MISMATCH,
    DiagnosticKind.CapabilityViolation,
    "{kind} effect on {target} in '{func}': grant {grant} does not cover target {value} ({field} does not match \"{pattern}\")",
    'Widen the grant constraint or change the call target.'
  ),
  [ErrorCode.CAPABILITY_TARGET_FIELD_MISSING]: entry(
    ErrorCode.CAPABILITY_TARGET_FIELD_MISSING,
    DiagnosticKind.CapabilityViolation,
    "{kind} effect on {target} in '{func}': grant {grant} constrains {field} but the call site has no {field}",
    'Pass a statically known target so the constraint can be checked.'
  ),
  [ErrorCode.UNKNOWN_ENTRY_POINT]: entry(
    ErrorCode.UNKNOWN_ENTRY_POINT,
    DiagnosticKind.CapabilityViolation,
    "unknown entry point '{name}' in unit '{unit}'",
    'Entry points must name functions declared in the unit.'
  ),
  [ErrorCode.VAULT_OUTSIDE_SAFE]: entry(
    ErrorCode.VAULT_OUTSIDE_SAFE,
    DiagnosticKind.VaultScopeError,
    "vault accessed outside safe scope: '{name}'",
    'Wrap the access in a `safe { ... }` block.'
  ),
  [ErrorCode.VAULT_ESCAPES_SAFE]: entry(
    ErrorCode.VAULT_ESCAPES_SAFE,
    DiagnosticKind.VaultScopeError,
    "vault value escapes safe scope: '{name}' {how}",
    'Keep decrypted values inside the safe block that produced them.'
  ),
  [ErrorCode.VAULT_UNDECLARED_CAPABILITY]: entry(
    ErrorCode.VAULT_UNDECLARED_CAPABILITY,
    DiagnosticKind.VaultScopeError,
    "vault value '{name}' passed to '{callee}' which requires undeclared capability {kind}",
    'Declare the capability in the unit header before passing decrypted values to this call.'
  ),
  [ErrorCode.LOCK_REASSIGNED]: entry(
    ErrorCode.LOCK_REASSIGNED,
    DiagnosticKind.MutabilityError,
    "lock reassigned: '{name}' already has its initializing assignment",
    'Declare the binding with `stract` if it needs to change.'
  ),
  [ErrorCode.STRACT_RETYPED]: entry(
    ErrorCode.STRACT_RETYPED,
    DiagnosticKind.MutabilityError,
    "stract retyped: '{name}' has type {expected} but is assigned {actual}",
    'A stract binding keeps the type of its first assignment.'
  ),
  [ErrorCode.LOCK_USED_BEFORE_ASSIGNMENT]: entry(
    ErrorCode.LOCK_USED_BEFORE_ASSIGNMENT,
    DiagnosticKind.MutabilityError,
    "lock used before assignment: '{name}'",
    'Assign the binding exactly once on every path before it is read.'
  ),
  [ErrorCode.VAULT_REASSIGNED]: entry(
    ErrorCode.VAULT_REASSIGNED,
    DiagnosticKind.MutabilityError,
    "vault reassigned: '{name}' is single-assignment",
    'Declare a new vault binding instead of overwriting the sealed value.'
  ),
  [ErrorCode.VAULT_USED_BEFORE_ASSIGNMENT]: entry(
    ErrorCode.VAULT_USED_BEFORE_ASSIGNMENT,
    DiagnosticKind.MutabilityError,
    "vault used before assignment: '{name}'",
    'Seal a value into the vault on every path before it is read.'
  ),
};

export function getErrorMetadata(code: ErrorCode): ErrorMetadata {
  return ERROR_METADATA[code];
}

export function formatErrorMessage(template: string, params: Readonly<Record<string, unknown>>): string {
  return template.replace(/\{(\w+)\}/g, (_, key: string) => {
    const value = params[key];
    if (value === undefined || value === null) return `{${key}}`;
    if (Array.isArray(value)) return value.join(', ');
    return String(value);
  });
}
