/**
 * `ibhist` command definition and run orchestration.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import moment from 'moment-timezone';
import {
  ConfigError,
  SECURITY_TYPES,
  TIMEFRAMES,
  WHAT_TO_SHOW_VALUES,
  parseDuration,
  parseTimeframe,
} from '@ibhist/contracts';
import type { HistoricalBarsProvider, InstrumentSpec, SecurityType, WhatToShow } from '@ibhist/contracts';
import { attachGlobalHandlers, createLogger } from '@ibhist/logger';
import type { Logger } from '@ibhist/logger';
import { FileConflictResolver, TIMEZONE_SELECTORS } from '@ibhist/bars-output';
import type { ConflictPolicy, ConflictPrompt, TimezoneSelector } from '@ibhist/bars-output';
import { IbkrHistoricalProvider } from '@ibhist/provider-ibkr';
import { loadConfig, getConfigSummary } from '../config/index.js';
import type { Config } from '../config/index.js';
import { runDownload } from '../pipeline/download.js';
import type { DownloadOptions } from '../pipeline/download.js';
import { FixtureProvider } from '../providers/fixture-provider.js';
import { createConsolePrompt } from './prompt.js';
import { printBanner, printError, printOutcome } from './reporter.js';

export const CONFLICT_CHOICES = ['prompt', 'overwrite', 'rename', 'cancel'] as const;
export type ConflictChoice = (typeof CONFLICT_CHOICES)[number];

/**
 * Parsed command-line options. Absent values fall back to configuration.
 */
export type CliOptions = {
  symbol?: string;
  timeframe?: string;
  duration?: string;
  output?: string;
  overwrite: boolean;
  timezone?: TimezoneSelector;
  startDate?: string;
  from?: string;
  endDate?: string;
  to?: string;
  eth: boolean;
  secType?: SecurityType;
  futureMonth?: string;
  futureExchange?: string;
  whatToShow?: WhatToShow;
  onConflict: ConflictChoice;
  fixture?: string;
  verbose: boolean;
};

export function buildProgram(): Command {
  return new Command()
    .name('ibhist')
    .description('Download historical OHLCV bars from Interactive Brokers to CSV')
    .version('0.1.0')
    .option('-s, --symbol <symbol>', 'instrument symbol, e.g. SPY or EURUSD')
    .addOption(new Option('-t, --timeframe <label>', 'bar size').choices(TIMEFRAMES))
    .option('-d, --duration <duration>', 'lookback when no start date is given, e.g. "30 D" or "1 Y"')
    .option('-o, --output <file>', 'output CSV path (generated when omitted)')
    .option('--overwrite', 'overwrite an existing output file', false)
    .addOption(new Option('--timezone <zone>', 'timezone for timestamps').choices(TIMEZONE_SELECTORS))
    .option('--start-date <date>', 'first day, YYYY-MM-DD [HH:MM[:SS]]')
    .option('--from <date>', 'alias for --start-date')
    .option('--end-date <date>', 'last day, YYYY-MM-DD [HH:MM[:SS]]')
    .option('--to <date>', 'alias for --end-date')
    .option('--eth', 'include extended trading hours', false)
    .addOption(new Option('--sec-type <type>', 'security type').choices(SECURITY_TYPES))
    .option('--future-month <month>', 'futures contract month, YYYYMM')
    .option('--future-exchange <exchange>', 'futures exchange, e.g. CME')
    .addOption(new Option('--what-to-show <type>', 'data type').choices(WHAT_TO_SHOW_VALUES))
    .addOption(
      new Option('--on-conflict <action>', 'what to do when the output file exists')
        .choices(CONFLICT_CHOICES)
        .default('prompt')
    )
    .option('--fixture <file>', 'read bars from a JSON fixture instead of IBKR')
    .option('-v, --verbose', 'debug logging', false);
}

/**
 * Combines configuration with command-line overrides.
 *
 * @throws {ConfigError} When a future lacks its contract month or exchange
 * @throws {InvalidTimeframeError | InvalidDurationError} On malformed values
 */
export function mergeOptions(config: Config, cli: CliOptions): DownloadOptions {
  const securityType = cli.secType ?? config.instrument.securityType;
  const symbol = cli.symbol ?? config.instrument.symbol;

  let instrument: InstrumentSpec;
  if (securityType === 'FUT') {
    const contractMonth = cli.futureMonth ?? config.instrument.futureMonth;
    const exchange = cli.futureExchange ?? config.instrument.futureExchange;
    const issues = [
      ...(contractMonth ? [] : ['instrument.futureMonth: Futures require a contract month (--future-month)']),
      ...(exchange ? [] : ['instrument.futureExchange: Futures require an exchange (--future-exchange)']),
    ];
    if (!contractMonth || !exchange) {
      throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
    }
    instrument = { symbol, securityType, exchange, currency: config.instrument.futureCurrency, contractMonth };
  } else {
    instrument = {
      symbol,
      securityType,
      exchange: config.instrument.stockExchange,
      currency: config.instrument.stockCurrency,
    };
  }

  return {
    instrument,
    timeframe: parseTimeframe(cli.timeframe ?? config.request.timeframe),
    duration: parseDuration(cli.duration ?? config.request.duration),
    startDate: cli.startDate ?? cli.from,
    endDate: cli.endDate ?? cli.to,
    sessionMode: cli.eth ? 'extended' : 'regular',
    whatToShow: cli.whatToShow ?? config.request.whatToShow,
    timezone: cli.timezone ?? config.request.timezone,
    output: cli.output,
    overwrite: cli.overwrite,
  };
}

/**
 * Maps `--on-conflict` onto a resolver policy. Prompting needs a terminal on
 * stdin; without one the run cancels instead and `notice` says so.
 */
export function conflictPolicy(
  choice: ConflictChoice,
  interactive: boolean,
  prompt: () => ConflictPrompt = createConsolePrompt
): { policy: ConflictPolicy; notice?: string } {
  switch (choice) {
    case 'overwrite':
      return { policy: { kind: 'auto-overwrite' } };
    case 'rename':
      return { policy: { kind: 'auto-rename' } };
    case 'cancel':
      return { policy: { kind: 'auto-cancel' } };
    case 'prompt':
      if (!interactive) {
        return {
          policy: { kind: 'auto-cancel' },
          notice: 'No terminal available for the overwrite prompt; existing files will not be replaced',
        };
      }
      return { policy: { kind: 'interactive', prompt: prompt() } };
  }
}

function createProvider(config: Config, cli: CliOptions, logger: Logger): HistoricalBarsProvider {
  if (cli.fixture) {
    return new FixtureProvider({ logger, fixturePath: cli.fixture });
  }
  return new IbkrHistoricalProvider({
    host: config.ib.host,
    port: config.ib.port,
    clientId: config.ib.clientId,
    connectTimeoutMs: config.ib.connectTimeoutMs,
    logger,
  });
}

/**
 * Parses arguments, runs one download and returns the exit code.
 */
export async function main(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const program = buildProgram().parse(argv);
  const cli = program.opts<CliOptions>();

  let config: Config;
  try {
    config = loadConfig(env);
  } catch (error) {
    return printError(error);
  }

  const logger = createLogger({
    level: cli.verbose ? 'debug' : config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
    defaultMeta: { run_id: `run-${moment().format('YYYYMMDD-HHmmss')}` },
  });
  attachGlobalHandlers(logger);
  logger.debug('Configuration loaded', getConfigSummary(config));

  try {
    const options = mergeOptions(config, cli);
    const provider = createProvider(config, cli, logger);
    const { policy, notice } = conflictPolicy(cli.onConflict, process.stdin.isTTY === true);
    if (notice) {
      logger.warn(notice, { onConflict: cli.onConflict });
      console.log(chalk.yellow(`Warning: ${notice}`));
    }

    printBanner(options, provider.name);

    const outcome = await runDownload(options, {
      provider,
      conflicts: new FileConflictResolver({ policy, logger }),
      logger,
    });
    printOutcome(outcome);
    return 0;
  } catch (error) {
    logger.error('Download failed', {
      error: error instanceof Error ? { name: error.name, message: error.message } : String(error),
    });
    return printError(error);
  }
}
