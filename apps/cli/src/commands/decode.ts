import { Command } from 'commander';
import * as out from '../output.js';
import { readInput, decodeInput, $try } from '../helpers.js';

export function createDecodeCommand(): Command {
  return new Command('decode')
    .description('Show tasks read from the service (a task object or an array of them)')
    .argument('[file]', "Read-model JSON file, or '-' for stdin")
    .action((file: string | undefined) => $try(() => {
      const tasks = decodeInput(readInput(file));
      if (tasks.length === 0) {
        out.info('No tasks');
        return;
      }
      for (const task of tasks) out.info(out.formatTaskLine(task));
    }));
}
