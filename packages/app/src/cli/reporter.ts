/**
 * Human-readable console output for a run.
 */

import chalk from 'chalk';
import { formatDuration, isIbHistError, isInputError, isOutputWriteError, isProviderError } from '@ibhist/contracts';
import type { DownloadOptions, DownloadOutcome } from '../pipeline/download.js';

type Print = (line: string) => void;

const defaultPrint: Print = (line) => console.log(line);

export function printBanner(options: DownloadOptions, providerName: string, print: Print = defaultPrint): void {
  const { instrument } = options;
  const range =
    options.startDate || options.endDate
      ? `${options.startDate ?? '(duration)'} -> ${options.endDate ?? options.startDate ?? ''}`
      : `last ${formatDuration(options.duration)}`;

  print(chalk.bold('ibhist: historical bar download'));
  print(`  Instrument: ${instrument.symbol} (${instrument.securityType}${instrument.contractMonth ? ` ${instrument.contractMonth}` : ''})`);
  print(`  Timeframe:  ${options.timeframe}`);
  print(`  Range:      ${range}`);
  print(`  Session:    ${options.sessionMode === 'extended' ? 'extended hours' : 'regular hours'}`);
  print(`  Data:       ${options.whatToShow}`);
  print(`  Timezone:   ${options.timezone}`);
  print(`  Source:     ${providerName}`);
  print('');
}

export function printOutcome(outcome: DownloadOutcome, print: Print = defaultPrint): void {
  for (const warning of outcome.warnings) {
    print(chalk.yellow(`Warning: ${warning}`));
  }

  switch (outcome.status) {
    case 'saved':
      print(chalk.green(`Saved ${outcome.rowCount} bars to ${outcome.path}`));
      print(`  Date column: ${outcome.dateColumn}`);
      break;
    case 'no-data':
      print(chalk.yellow('No data received. Possible reasons:'));
      for (const reason of outcome.diagnostics) {
        print(`  - ${reason}`);
      }
      break;
    case 'cancelled':
      print(chalk.yellow(`Download succeeded (${outcome.rowCount} bars) but the file was not saved: ${outcome.path}`));
      break;
  }
}

/**
 * Prints a failure. Returns the process exit code.
 */
export function printError(error: unknown, print: Print = defaultPrint): number {
  if (isInputError(error)) {
    print(chalk.red(`Invalid input: ${error.message}`));
  } else if (isProviderError(error)) {
    print(chalk.red(`Data source error (${error.kind}): ${error.message}`));
  } else if (isOutputWriteError(error)) {
    print(chalk.red(error.message));
    for (const line of error.guidance) {
      print(`  ${line}`);
    }
  } else if (isIbHistError(error)) {
    print(chalk.red(error.message));
  } else {
    print(chalk.red(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`));
  }
  return 1;
}
