import { formatDiagnostic, type Diagnostic } from '../../diagnostics/diagnostics.js';
import { checkUnit, type CheckOptions } from '../../pipeline.js';
import { loadUnit } from '../unit-loader.js';
import { error as logError, success as logSuccess } from '../utils/logger.js';

export interface CheckCommandOptions {
  /** 以 JSON 输出诊断，便于编辑器或 CI 消费 */
  json?: boolean;
  /** 测试或嵌入时传入自定义效应注册表与前缀规则 */
  pipeline?: CheckOptions;
}

export interface CheckCommandReport {
  readonly unit: string;
  readonly file: string;
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * `stract check <file>`：对单个编译单元运行全部安全检查。
 *
 * @returns 进程退出码；存在诊断时为 1
 */
export async function checkCommand(file: string, options: CheckCommandOptions = {}): Promise<number> {
  const unit = loadUnit(file);
  const result = checkUnit(unit, options.pipeline ?? {});

  if (options.json) {
    const report: CheckCommandReport = { unit: unit.name, file, diagnostics: result.diagnostics };
    console.log(JSON.stringify(report, null, 2));
    return result.diagnostics.length > 0 ? 1 : 0;
  }

  for (const diagnostic of result.diagnostics) {
    console.log(formatDiagnostic(diagnostic));
  }

  if (result.diagnostics.length === 0) {
    logSuccess(`${unit.name}: no diagnostics`);
    return 0;
  }
  const count = result.diagnostics.length;
  logError(`${unit.name}: ${count} diagnostic${count === 1 ? '' : 's'}`);
  return 1;
}
