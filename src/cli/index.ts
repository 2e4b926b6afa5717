import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createCompareCommand } from './commands/compare.js';
import { createFilesCommand } from './commands/files.js';
import { createInspectCommand } from './commands/inspect.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const FALLBACK_VERSION = '0.0.0';

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return FALLBACK_VERSION;
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('codeprint')
    .description('Structural similarity between two source code collections')
    .version(readVersion());

  [createCompareCommand, createFilesCommand, createInspectCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
