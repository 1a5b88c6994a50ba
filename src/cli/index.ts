import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createCheckCommand, type CheckDependencies } from './commands/check.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Create the CLI program. `check` runs when no command is named. */
export function createCli(deps: Partial<CheckDependencies> = {}): Command {
  return new Command()
    .name('bracecheck')
    .description('Per-line bracket balance diagnostics for a single source file')
    .version(readVersion())
    .addCommand(createCheckCommand(deps), { isDefault: true });
}
