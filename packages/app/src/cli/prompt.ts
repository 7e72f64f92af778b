/**
 * Interactive overwrite/rename/cancel prompt on the terminal.
 */

import { createInterface } from 'node:readline/promises';
import chalk from 'chalk';
import moment from 'moment-timezone';
import type { ConflictPrompt } from '@ibhist/bars-output';

export function createConsolePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ConflictPrompt {
  return async (info, attempt) => {
    if (attempt === 1) {
      const created = info.createdAt ? moment(info.createdAt).format('YYYY-MM-DD HH:mm:ss') : 'unknown';
      output.write(
        [
          chalk.yellow(`File already exists: ${info.path}`),
          `  Location: ${info.absolutePath}`,
          `  Created:  ${created}`,
          '',
          '  [O] Overwrite the existing file',
          '  [R] Rename (save under a timestamped name)',
          '  [C] Cancel (do not save)',
          '',
        ].join('\n')
      );
    } else {
      output.write(chalk.red('Invalid choice. Please enter O, R, or C.') + '\n');
    }

    const rl = createInterface({ input, output, terminal: false });
    try {
      return await rl.question('Choice [O/R/C]: ');
    } finally {
      rl.close();
    }
  };
}
