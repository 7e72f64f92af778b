/**
 * @fileoverview Request, bar and provider contracts.
 *
 * Pure data shapes shared by the resolver, the output pipeline and the data
 * provider adapters. No I/O lives here.
 *
 * @module @ibhist/contracts/market
 */

import type { Duration } from './duration.js';
import type { Timeframe } from './timeframes.js';

/**
 * Trading session scope of a request.
 * - regular: regular trading hours only (session close 16:00)
 * - extended: pre-market and after-hours included (post-market ends 02:00 next day)
 */
export type SessionMode = 'regular' | 'extended';

/**
 * How a request window was resolved from the user's input.
 */
export type ResolutionMode = 'date_range' | 'single_day' | 'duration_with_end' | 'duration_only';

/**
 * User's partial description of the data they want.
 *
 * @invariant If both dates are present, startDate <= endDate
 */
export interface RequestWindow {
  /** `YYYY-MM-DD`, `YYYY-MM-DD HH:MM` or `YYYY-MM-DD HH:MM:SS` */
  startDate?: string;
  endDate?: string;
  defaultDuration: Duration;
  sessionMode: SessionMode;
}

/**
 * Canonical end anchor plus backward-looking duration.
 *
 * @invariant durationString matches `<int> <S|D|W|M|Y>`
 * @invariant endTimestamp is never empty (`YYYYMMDD HH:mm:ss`)
 */
export interface ResolvedRequest {
  readonly endTimestamp: string;
  readonly duration: Duration;
  readonly durationString: string;
  readonly mode: ResolutionMode;
  readonly startDate?: string;
  readonly endDate?: string;
}

/**
 * Data type requested from the provider.
 */
export type WhatToShow = 'TRADES' | 'MIDPOINT' | 'BID' | 'ASK' | 'ADJUSTED_LAST';

export const WHAT_TO_SHOW_VALUES: readonly WhatToShow[] = ['TRADES', 'MIDPOINT', 'BID', 'ASK', 'ADJUSTED_LAST'];

/**
 * Parameters handed to the provider's historical-data call.
 *
 * `formatDate` is fixed at 2 so intraday bar times arrive as UTC epoch seconds.
 */
export interface RequestEnvelope {
  readonly endDateTime: string;
  readonly durationStr: string;
  readonly barSizeSetting: Timeframe;
  readonly whatToShow: WhatToShow;
  readonly useRTH: boolean;
  readonly formatDate: 2;
}

/**
 * Supported security types.
 * STK = stock, CASH = forex pair, FUT = future.
 */
export type SecurityType = 'STK' | 'CASH' | 'FUT';

export const SECURITY_TYPES: readonly SecurityType[] = ['STK', 'CASH', 'FUT'];

/**
 * Instrument description built from configuration and CLI input.
 */
export interface InstrumentSpec {
  readonly symbol: string;
  readonly securityType: SecurityType;
  readonly exchange: string;
  readonly currency: string;
  /** `YYYYMM` or `YYYYMMDD`; futures only */
  readonly contractMonth?: string;
}

/**
 * Instrument as resolved by the provider.
 */
export interface QualifiedInstrument {
  readonly symbol: string;
  readonly securityType: SecurityType;
  readonly localSymbol: string;
  readonly exchange: string;
  readonly conId?: number;
}

/**
 * Raw timestamp as a provider returns it: epoch seconds, an ISO string, or
 * the provider's own date text.
 */
export type RawTimestamp = string | number;

/**
 * A single OHLCV bar as returned by a provider, before timezone conversion.
 *
 * @invariant high >= low
 * @invariant volume >= 0
 */
export interface ProviderBar {
  readonly time: RawTimestamp;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/**
 * A bar ready for output. `timestamp` is rendered in the target zone, or keeps
 * the provider's original text when it could not be parsed.
 */
export interface OutputRow {
  readonly timestamp: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/**
 * Historical data source. One instance serves one run: connect, qualify,
 * fetch once, disconnect.
 */
export interface HistoricalBarsProvider {
  /** Provider identifier used in logs and errors (e.g. 'ibkr', 'fixture') */
  readonly name: string;

  connect(): Promise<void>;

  /**
   * Resolves an instrument description into the provider's contract.
   */
  qualify(instrument: InstrumentSpec): Promise<QualifiedInstrument>;

  /**
   * Issues a single historical-data request. Bars come back in chronological order.
   */
  fetchBars(instrument: QualifiedInstrument, envelope: RequestEnvelope): Promise<ProviderBar[]>;

  disconnect(): Promise<void>;

  isConnected(): boolean;
}
