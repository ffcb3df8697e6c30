/**
 * 编译单元加载器
 *
 * 读取前端导出的 JSON 形式 AST，按 schemas/unit.schema.json 校验后交给检查管线。
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import AjvModule, { type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import type { CompilationUnit } from '../ast/ast.js';

// ajv 以 CommonJS 发布，ESM 默认导入得到的是 module.exports
const Ajv = AjvModule.default;

export class UnitLoadError extends Error {
  constructor(
    message: string,
    readonly file: string,
    readonly details: readonly string[] = []
  ) {
    super(message);
    this.name = 'UnitLoadError';
  }
}

// schema 不参与编译：源码运行时位于 src/cli，构建产物位于 dist/src/cli
const __dirname = dirname(fileURLToPath(import.meta.url));
const SCHEMA_CANDIDATES = [
  join(__dirname, '..', '..', 'schemas', 'unit.schema.json'),
  join(__dirname, '..', '..', '..', 'schemas', 'unit.schema.json'),
];

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

let cachedValidator: ValidateFunction<CompilationUnit> | null = null;

function loadValidator(): ValidateFunction<CompilationUnit> {
  if (cachedValidator) return cachedValidator;
  const schemaPath = SCHEMA_CANDIDATES.find(candidate => existsSync(candidate));
  if (!schemaPath) {
    throw new Error(`unit schema not found (looked in ${SCHEMA_CANDIDATES.join(', ')})`);
  }
  const schema: unknown = JSON.parse(readFileSync(schemaPath, 'utf-8'));
  if (!isSchemaObject(schema)) {
    throw new Error(`unit schema at ${schemaPath} is not a JSON object`);
  }
  const ajv = new Ajv({ strict: true, allErrors: true });
  cachedValidator = ajv.compile<CompilationUnit>(schema);
  return cachedValidator;
}

function describeAjvError(error: ErrorObject): string {
  const location = error.instancePath || '/';
  return `${location}: ${error.message ?? error.keyword}`;
}

/**
 * 校验已解析的 JSON 值并返回类型化的编译单元。
 */
export function validateUnit(value: unknown, file = '<memory>'): CompilationUnit {
  const validate = loadValidator();
  if (validate(value)) return value;
  const details = (validate.errors ?? []).map(describeAjvError);
  throw new UnitLoadError(`${file} is not a valid compilation unit`, file, details);
}

/**
 * 从文件加载编译单元。文件读取错误原样抛出，由 CLI 错误处理器按 errno 分类。
 */
export function loadUnit(file: string): CompilationUnit {
  const content = readFileSync(file, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new UnitLoadError(`${file} is not valid JSON`, file, [reason]);
  }
  return validateUnit(parsed, file);
}
