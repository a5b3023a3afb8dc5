import { Command } from 'commander';
import { stringifyTask } from '@taskwire/core';
import type { CliConfig } from '../config.js';
import { withCompact } from '../config.js';
import * as out from '../output.js';
import { readInput, decodeInput, $try } from '../helpers.js';

export function createEncodeCommand(config: CliConfig): Command {
  return new Command('encode')
    .description('Convert read-model JSON into the payload sent when writing a task')
    .argument('[file]', "Read-model JSON file, or '-' for stdin")
    .action((file: string | undefined, _opts: unknown, cmd: Command) => $try(() => {
      const g = cmd.optsWithGlobals<{ compact?: boolean }>();
      const { jsonIndent } = withCompact(config, g.compact);

      for (const task of decodeInput(readInput(file))) {
        out.info(stringifyTask(task, jsonIndent));
      }
    }));
}
