import { CallGraphError } from '../../effects/call_graph.js';
import { EffectKindError } from '../../effects/effect_kind.js';
import { VaultGuardError } from '../../vault/zeroize.js';
import { UnitLoadError } from '../unit-loader.js';
import { error as logError, warn as logWarn } from './logger.js';

type CliErrorCategory = 'input' | 'filesystem' | 'graph' | 'vault' | 'unknown';

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function classify(error: unknown): CliErrorCategory {
  if (error instanceof UnitLoadError) return 'input';
  if (error instanceof CallGraphError || error instanceof EffectKindError) return 'graph';
  if (error instanceof VaultGuardError) return 'vault';
  if (isNodeError(error)) return 'filesystem';
  return 'unknown';
}

function hintFor(category: CliErrorCategory): string | null {
  switch (category) {
    case 'input':
      return 'the unit file must be frontend JSON output matching schemas/unit.schema.json';
    case 'graph':
      return 'the unit could not be turned into a call graph; check its effect annotations';
    case 'vault':
      return 'vault guard failure; plaintext buffers of the failing scope have been cleared';
    default:
      return null;
  }
}

function handleNodeError(error: NodeJS.ErrnoException): void {
  const code = error.code ?? 'UNKNOWN';
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      logError(`permission denied: ${error.message}`);
      break;
    case 'ENOENT':
      logError(`file not found: ${error.message}`);
      break;
    default:
      logError(`filesystem error (${code}): ${error.message}`);
      break;
  }
}

/**
 * 把错误翻译成面向用户的输出，不退出进程。
 */
export function reportError(error: unknown): void {
  if (error instanceof UnitLoadError) {
    logError(error.message);
    for (const detail of error.details) {
      logError(`  ${detail}`);
    }
  } else if (isNodeError(error)) {
    handleNodeError(error);
  } else if (error instanceof Error) {
    logError(error.message);
  } else {
    logError('an unknown error occurred');
  }

  const hint = hintFor(classify(error));
  if (hint) {
    logWarn(hint);
  }
}

export function handleError(error: unknown): never {
  reportError(error);
  process.exit(1);
}
