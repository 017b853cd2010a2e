#!/usr/bin/env node

// CLI entry point
// - Command name: `attrgroups` with subcommands `inspect`, `compare` and
//   `specialize`, each reading group description JSON files.
// - Failures are rendered through ErrorPresenter and exit with the error's
//   exit code.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  AttributeGroupError,
  ErrorCode,
  ErrorPresenter,
  isAttributeGroupError,
} from '@attrgroups/core';
import { renderCLIView } from './render.js';
import { registerInspectCommand } from './commands/inspect.js';
import { registerCompareCommand } from './commands/compare.js';
import { registerSpecializeCommand } from './commands/specialize.js';

const program = new Command();

program
  .name('attrgroups')
  .description('Inspect, compare and specialize attribute group descriptions')
  .version('0.1.0');

registerInspectCommand(program);
registerCompareCommand(program);
registerSpecializeCommand(program);

class UnexpectedCliError extends AttributeGroupError {}

function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: AttributeGroupError;
  if (isAttributeGroupError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new UnexpectedCliError({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program, handleCliError };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
