/**
 * Tests for the conflict prompt and the run reporter
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { PassThrough } from 'node:stream';
import chalk from 'chalk';
import { OutputWriteError, ProviderError, parseDuration } from '@ibhist/contracts';
import { createConsolePrompt } from '../src/cli/prompt.js';
import { printBanner, printError, printOutcome } from '../src/cli/reporter.js';

beforeAll(() => {
  chalk.level = 0;
});

function collect(): { lines: string[]; print: (line: string) => void } {
  const lines: string[] = [];
  return { lines, print: (line) => lines.push(line) };
}

describe('createConsolePrompt', () => {
  const info = { path: 'SPY.csv', absolutePath: '/data/SPY.csv', createdAt: null };

  it('should describe the file and return the answer', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    let written = '';
    output.on('data', (chunk: Buffer) => {
      written += chunk.toString();
    });
    input.write('r\n');

    const answer = await createConsolePrompt(input, output)(info, 1);

    expect(answer).toBe('r');
    expect(written).toContain('File already exists: SPY.csv\n  Location: /data/SPY.csv\n  Created:  unknown\n');
    expect(written).toContain('Choice [O/R/C]: ');
  });

  it('should explain the choices again after a bad answer', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    let written = '';
    output.on('data', (chunk: Buffer) => {
      written += chunk.toString();
    });
    input.write('c\n');

    await createConsolePrompt(input, output)(info, 2);

    expect(written).toContain('Invalid choice. Please enter O, R, or C.\n');
    expect(written).not.toContain('File already exists');
  });
});

describe('printBanner', () => {
  it('should summarise the request', () => {
    const { lines, print } = collect();

    printBanner(
      {
        instrument: { symbol: 'ES', securityType: 'FUT', exchange: 'CME', currency: 'USD', contractMonth: '202503' },
        timeframe: '5 mins',
        duration: parseDuration('30 D'),
        sessionMode: 'extended',
        whatToShow: 'TRADES',
        timezone: 'market',
        overwrite: false,
      },
      'ibkr',
      print
    );

    expect(lines).toEqual([
      'ibhist: historical bar download',
      '  Instrument: ES (FUT 202503)',
      '  Timeframe:  5 mins',
      '  Range:      last 30 D',
      '  Session:    extended hours',
      '  Data:       TRADES',
      '  Timezone:   market',
      '  Source:     ibkr',
      '',
    ]);
  });
});

describe('printOutcome', () => {
  it('should report a saved file', () => {
    const { lines, print } = collect();

    printOutcome(
      { status: 'saved', path: 'SPY.csv', rowCount: 2, dateColumn: 'Date', action: 'create', warnings: ['slow'] },
      print
    );

    expect(lines).toEqual(['Warning: slow', 'Saved 2 bars to SPY.csv', '  Date column: Date']);
  });

  it('should list the no-data reasons', () => {
    const { lines, print } = collect();

    printOutcome({ status: 'no-data', diagnostics: ['first', 'second'], warnings: [] }, print);

    expect(lines).toEqual(['No data received. Possible reasons:', '  - first', '  - second']);
  });

  it('should report a cancelled save', () => {
    const { lines, print } = collect();

    printOutcome({ status: 'cancelled', path: 'SPY.csv', rowCount: 5, warnings: [] }, print);

    expect(lines).toEqual(['Download succeeded (5 bars) but the file was not saved: SPY.csv']);
  });
});

describe('printError', () => {
  it('should print write guidance and return exit code 1', () => {
    const { lines, print } = collect();
    const error = new OutputWriteError('Permission denied while saving file: SPY.csv', {
      path: 'SPY.csv',
      guidance: ['Close the file in other programs'],
    });

    expect(printError(error, print)).toBe(1);
    expect(lines).toEqual(['Permission denied while saving file: SPY.csv', '  Close the file in other programs']);
  });

  it('should name the provider failure kind', () => {
    const { lines, print } = collect();

    printError(new ProviderError('timeout', 'Connection timed out', { provider: 'ibkr' }), print);

    expect(lines).toEqual(['Data source error (timeout): Connection timed out']);
  });
});
