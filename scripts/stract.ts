#!/usr/bin/env node
import fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { cac } from 'cac';
import { checkCommand } from '../src/cli/commands/check.js';
import { handleError } from '../src/cli/utils/error-handler.js';

// tsx 运行时位于 scripts/，构建产物位于 dist/scripts/
function readVersion(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  for (const candidate of [path.join(here, '..', 'package.json'), path.join(here, '..', '..', 'package.json')]) {
    if (!fs.existsSync(candidate)) continue;
    const pkg: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  }
  return '0.0.0';
}

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => Promise<void> | void) {
  return async (...args: Args): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

async function main(): Promise<void> {
  const cli = cac('stract');

  cli
    .command('check <file>', 'Check capability closure, vault scoping and mutability of a unit (JSON AST)')
    .option('--json', 'Print diagnostics as JSON', { default: false })
    .option('--effects <file>', 'Builtin call prefix table (defaults to .stract/effects.json)')
    .action(
      wrapAction(async (file: string, options: { json?: boolean; effects?: string }) => {
        if (typeof options.effects === 'string') {
          process.env.STRACT_EFFECT_CONFIG = options.effects;
        }
        process.exitCode = await checkCommand(file, { json: Boolean(options.json) });
      })
    );

  cli
    .command('help', 'Show usage')
    .action(() => {
      cli.outputHelp();
    });

  cli.version(readVersion());
  cli.help();
  cli.parse();
}

main().catch(handleError);
