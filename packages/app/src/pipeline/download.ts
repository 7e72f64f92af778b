/**
 * @fileoverview One download run: resolve the request, fetch once, format,
 * settle the output path, write the CSV.
 */

import type {
  Duration,
  HistoricalBarsProvider,
  InstrumentSpec,
  ProviderBar,
  RequestEnvelope,
  SessionMode,
  Timeframe,
  WhatToShow,
} from '@ibhist/contracts';
import { createChildLogger, startTimer } from '@ibhist/logger';
import type { Logger } from '@ibhist/logger';
import {
  availabilityWarnings,
  buildRequestEnvelope,
  classifyTimeframe,
  noDataDiagnostics,
  resolveRequestWindow,
} from '@ibhist/request-window';
import {
  dateColumnName,
  formatRows,
  generateFilename,
  targetZone,
  writeBarsCsv,
  zoneAbbreviation,
} from '@ibhist/bars-output';
import type { ConflictAction, FileConflictResolver, TimezoneSelector } from '@ibhist/bars-output';

export interface DownloadOptions {
  instrument: InstrumentSpec;
  timeframe: Timeframe;
  duration: Duration;
  startDate?: string;
  endDate?: string;
  sessionMode: SessionMode;
  whatToShow: WhatToShow;
  timezone: TimezoneSelector;
  /** Explicit output path; generated from the request when absent. */
  output?: string;
  overwrite: boolean;
}

export interface DownloadDeps {
  provider: HistoricalBarsProvider;
  conflicts: FileConflictResolver;
  logger: Logger;
  clock?: () => Date;
}

export type DownloadOutcome =
  | {
      status: 'saved';
      path: string;
      rowCount: number;
      dateColumn: string;
      action: ConflictAction;
      warnings: string[];
    }
  | { status: 'no-data'; diagnostics: string[]; warnings: string[] }
  | { status: 'cancelled'; path: string; rowCount: number; warnings: string[] };

/**
 * Runs a single download.
 *
 * Date errors surface before the provider is touched. The provider is always
 * disconnected, whatever the fetch did.
 *
 * @throws {InvalidDateFormatError | InvalidRangeError} On bad dates
 * @throws {ProviderError} On connection, qualification or request failure
 * @throws {OutputWriteError} When the file cannot be written
 */
export async function runDownload(options: DownloadOptions, deps: DownloadDeps): Promise<DownloadOutcome> {
  const logger = createChildLogger(deps.logger, { component: 'pipeline' });
  const now = (deps.clock ?? (() => new Date()))();
  const { instrument, timeframe, sessionMode } = options;

  const resolved = resolveRequestWindow({
    startDate: options.startDate,
    endDate: options.endDate,
    defaultDuration: options.duration,
    sessionMode,
    now,
  });
  logger.info('Request resolved', {
    symbol: instrument.symbol,
    timeframe,
    mode: resolved.mode,
    duration: resolved.durationString,
    endDateTime: resolved.endTimestamp,
  });

  const classification = classifyTimeframe(timeframe);
  const warnings = availabilityWarnings(timeframe, resolved.duration);
  for (const warning of warnings) {
    logger.warn(warning, { symbol: instrument.symbol, timeframe });
  }

  const target =
    options.output ??
    generateFilename({
      symbol: instrument.symbol,
      securityType: instrument.securityType,
      duration: resolved.durationString,
      timeframe,
      futureMonth: instrument.contractMonth,
      extendedHours: sessionMode === 'extended',
    });

  const envelope = buildRequestEnvelope(resolved, timeframe, sessionMode, options.whatToShow);

  const bars = await fetchOnce(deps.provider, instrument, envelope);

  if (bars.length === 0) {
    const diagnostics = noDataDiagnostics(timeframe);
    logger.warn('No historical data received', { symbol: instrument.symbol, timeframe, reasons: diagnostics });
    return { status: 'no-data', diagnostics, warnings };
  }

  const zone = targetZone(options.timezone, instrument.symbol);
  const dateColumn = dateColumnName(classification.intraday, zoneAbbreviation(zone, options.timezone, now));
  const formatted = formatRows(bars, zone, classification.intraday);
  for (const problem of formatted.warnings) {
    logger.warn(problem.message, { symbol: instrument.symbol });
    warnings.push(problem.message);
  }

  const resolution = await deps.conflicts.resolve(target, options.overwrite);
  if (!resolution.proceed) {
    logger.warn('Download succeeded but file not saved', {
      path: resolution.path,
      status: 'cancelled',
      rows: formatted.rows.length,
    });
    return { status: 'cancelled', path: resolution.path, rowCount: formatted.rows.length, warnings };
  }

  const timer = startTimer();
  await writeBarsCsv(resolution.path, dateColumn, formatted.rows);
  logger.info('Saved bars', {
    path: resolution.path,
    rows: formatted.rows.length,
    dateColumn,
    action: resolution.action,
    duration_ms: timer.stop(),
  });

  return {
    status: 'saved',
    path: resolution.path,
    rowCount: formatted.rows.length,
    dateColumn,
    action: resolution.action,
    warnings,
  };
}

async function fetchOnce(
  provider: HistoricalBarsProvider,
  instrument: InstrumentSpec,
  envelope: RequestEnvelope
): Promise<ProviderBar[]> {
  await provider.connect();
  try {
    const qualified = await provider.qualify(instrument);
    return await provider.fetchBars(qualified, envelope);
  } finally {
    await provider.disconnect();
  }
}
