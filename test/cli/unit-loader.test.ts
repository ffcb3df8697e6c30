import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Ast, spanAt } from '../../src/ast/builders.js';
import { UnitLoadError, loadUnit, validateUnit } from '../../src/cli/unit-loader.js';
import { isNodeError } from '../../src/cli/utils/error-handler.js';

const unit = Ast.Unit(
  'bank',
  [Ast.Capability('Network', { protocol: 'https', domain: '*.bank.com' }, spanAt(1, 1))],
  [
    Ast.Func(
      'main',
      [
        Ast.Let('vault', 'token', Ast.Text('test-secret'), spanAt(3, 3)),
        Ast.Safe(
          [
            Ast.Expr(
              Ast.Call('send', [Ast.Name('token', spanAt(5, 10))], spanAt(5, 5), {
                kind: 'Network',
                target: { protocol: 'https', domain: 'api.bank.com' },
              })
            ),
          ],
          spanAt(4, 3)
        ),
        Ast.Return(Ast.Binary('+', Ast.Num(1), Ast.Num(2), spanAt(7, 10)), spanAt(7, 3)),
      ],
      spanAt(2, 1),
      [{ name: 'input', type: 'Text' }]
    ),
  ],
  ['main']
);

describe('unit-loader', () => {
  let dir: string;

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stract-unit-'));
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content, 'utf-8');
    return file;
  }

  it('加载符合 schema 的编译单元', () => {
    const file = write('bank.json', JSON.stringify(unit, null, 2));
    assert.deepEqual(loadUnit(file), unit);
  });

  it('缺少必填字段时列出 schema 错误', () => {
    assert.throws(
      () => validateUnit({ kind: 'Unit', capabilities: [], functions: [] }, 'app.json'),
      (error: unknown) => {
        assert.ok(error instanceof UnitLoadError);
        assert.equal(error.message, 'app.json is not a valid compilation unit');
        assert.equal(error.file, 'app.json');
        assert.deepEqual(error.details, ["/: must have required property 'name'"]);
        return true;
      }
    );
  });

  it('多余字段被拒绝', () => {
    assert.throws(
      () => validateUnit({ kind: 'Unit', name: 'app', capabilities: [], functions: [], extra: true }),
      (error: unknown) => {
        assert.ok(error instanceof UnitLoadError);
        assert.equal(error.message, '<memory> is not a valid compilation unit');
        assert.deepEqual(error.details, ['/: must NOT have additional properties']);
        return true;
      }
    );
  });

  it('语句结构错误给出实例路径', () => {
    const broken = {
      kind: 'Unit',
      name: 'app',
      capabilities: [],
      functions: [
        {
          kind: 'Func',
          name: 'main',
          params: [],
          body: { kind: 'Block', statements: [{ kind: 'Goto', span: spanAt(1, 1) }], span: spanAt(1, 1) },
          span: spanAt(1, 1),
        },
      ],
    };
    assert.throws(
      () => validateUnit(broken),
      (error: unknown) => {
        assert.ok(error instanceof UnitLoadError);
        assert.ok(error.details.length > 0);
        assert.ok(error.details.every(detail => detail.startsWith('/functions/0/body/statements/0')));
        return true;
      }
    );
  });

  it('非法 JSON 报告解析错误', () => {
    const file = write('broken.json', '{ "kind": "Unit", ');
    assert.throws(
      () => loadUnit(file),
      (error: unknown) => {
        assert.ok(error instanceof UnitLoadError);
        assert.equal(error.message, `${file} is not valid JSON`);
        assert.equal(error.details.length, 1);
        return true;
      }
    );
  });

  it('文件不存在时抛出原始 errno 错误', () => {
    const missing = path.join(dir, 'missing.json');
    assert.throws(
      () => loadUnit(missing),
      (error: unknown) => isNodeError(error) && error.code === 'ENOENT'
    );
  });
});
