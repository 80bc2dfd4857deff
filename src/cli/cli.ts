#!/usr/bin/env node

import { readFileSync } from 'fs';
import { Command } from 'commander';
import { z } from 'zod';
import { registerSplitCommand } from './commands/split/index.js';
import { registerRestoreCommand } from './commands/restore/index.js';
import { registerManifestCommands } from './commands/manifest/index.js';

const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')));

const program = new Command();

program
  .name('file-parts')
  .description('Split large files into checksummed chunks and restore them byte-for-byte')
  .version(packageJson.version);

// Register all commands
registerSplitCommand(program);
registerRestoreCommand(program);
registerManifestCommands(program);

await program.parseAsync();
