#!/usr/bin/env node

import { Command } from 'commander';
import { resolveConfig } from './config.js';
import * as out from './output.js';

import { createDecodeCommand } from './commands/decode.js';
import { createEncodeCommand } from './commands/encode.js';
import { createNewCommand } from './commands/new.js';

const { config, warnings } = resolveConfig();
for (const w of warnings) out.warning(w);

// Build the CLI program
const program = new Command()
  .name('taskwire')
  .description('Read and write tasks in the task service JSON format')
  .version('0.1.0')
  .option('--compact', 'Emit single-line JSON');

// Register commands
program.addCommand(createDecodeCommand());
program.addCommand(createEncodeCommand(config));
program.addCommand(createNewCommand(config));

program.parse();
