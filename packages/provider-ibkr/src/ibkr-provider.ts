/**
 * @fileoverview Interactive Brokers historical-data provider.
 *
 * Wraps `IBApiNext` from @stoqey/ib behind the HistoricalBarsProvider
 * contract. One instance serves one run: connect, qualify, a single
 * historical-data request, disconnect. Nothing is retried.
 *
 * @module @ibhist/provider-ibkr
 */

import { ConnectionState, IBApiNext } from '@stoqey/ib';
import type { Bar, Contract, ContractDetails } from '@stoqey/ib';
import { filter, firstValueFrom, timeout, TimeoutError } from 'rxjs';
import { ProviderError } from '@ibhist/contracts';
import type {
  HistoricalBarsProvider,
  InstrumentSpec,
  ProviderBar,
  QualifiedInstrument,
  RequestEnvelope,
} from '@ibhist/contracts';
import { createChildLogger, startTimer } from '@ibhist/logger';
import type { Logger } from '@ibhist/logger';
import { createContract } from './contract.js';
import { toBarSizeSetting, toProviderBars, toWhatToShow } from './mapping.js';
import type { IbkrApi, IbkrConnectionOptions, IbkrProviderConfig } from './types.js';

const PROVIDER = 'ibkr';

function defaultApi(options: IbkrConnectionOptions): IbkrApi {
  return new IBApiNext({ host: options.host, port: options.port });
}

/**
 * Pulls a readable message out of whatever the client rejected with. Request
 * failures arrive as `{ error: Error, code, reqId }` rather than Error instances.
 */
export function describeClientError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'error' in error) {
    const inner = error.error;
    const code = 'code' in error && typeof error.code === 'number' ? ` (code ${error.code})` : '';
    if (inner instanceof Error) {
      return `${inner.message}${code}`;
    }
  }
  return String(error);
}

/**
 * IBKR implementation of HistoricalBarsProvider.
 *
 * @example
 * ```typescript
 * const provider = new IbkrHistoricalProvider({
 *   host: '127.0.0.1',
 *   port: 4001,
 *   clientId: 77,
 *   connectTimeoutMs: 10000,
 *   logger,
 * });
 * await provider.connect();
 * try {
 *   const instrument = await provider.qualify({ symbol: 'SPY', securityType: 'STK', exchange: 'SMART', currency: 'USD' });
 *   const bars = await provider.fetchBars(instrument, envelope);
 * } finally {
 *   await provider.disconnect();
 * }
 * ```
 */
export class IbkrHistoricalProvider implements HistoricalBarsProvider {
  readonly name = PROVIDER;

  private readonly config: IbkrProviderConfig;
  private readonly logger: Logger;
  private readonly createApi: (options: IbkrConnectionOptions) => IbkrApi;
  private api: IbkrApi | null = null;
  private connected = false;
  private readonly qualified = new Map<string, Contract>();

  constructor(config: IbkrProviderConfig) {
    this.config = config;
    this.logger = createChildLogger(config.logger, { component: 'provider', provider: PROVIDER });
    this.createApi = config.createApi ?? defaultApi;
  }

  isConnected(): boolean {
    return this.connected;
  }

  /**
   * Opens the session and waits for the Connected state.
   *
   * @throws {ProviderError} kind `timeout` when the gateway does not answer in
   * time, `connection` when the client fails outright
   */
  async connect(): Promise<void> {
    const { host, port, clientId, connectTimeoutMs } = this.config;
    this.logger.info('Connecting to IBKR', { host, port, clientId });

    const api = this.createApi({ host, port });
    this.api = api;
    const timer = startTimer();

    try {
      api.connect(clientId);
      await firstValueFrom(
        api.connectionState.pipe(
          filter((state) => state === ConnectionState.Connected),
          timeout({ first: connectTimeoutMs })
        )
      );
    } catch (error) {
      this.release();
      if (error instanceof TimeoutError) {
        throw new ProviderError(
          'timeout',
          `Connection to IBKR at ${host}:${port} timed out after ${connectTimeoutMs}ms. Ensure IB Gateway or TWS is running and API access is enabled.`,
          { provider: PROVIDER, host, port, clientId },
          { cause: error }
        );
      }
      throw new ProviderError(
        'connection',
        `Connection to IBKR at ${host}:${port} failed: ${describeClientError(error)}`,
        { provider: PROVIDER, host, port, clientId },
        { cause: error }
      );
    }

    this.connected = true;
    this.logger.info('Connected to IBKR', { host, port, duration_ms: timer.stop() });
  }

  /**
   * Resolves the instrument through contract details.
   *
   * @throws {ProviderError} kind `qualification` when IBKR knows no such contract
   */
  async qualify(instrument: InstrumentSpec): Promise<QualifiedInstrument> {
    const api = this.requireApi();
    const contract = createContract(instrument);
    this.logger.info('Qualifying contract', {
      symbol: instrument.symbol,
      secType: instrument.securityType,
      exchange: contract.exchange,
    });

    let details: ContractDetails[];
    try {
      details = await api.getContractDetails(contract);
    } catch (error) {
      throw new ProviderError(
        'qualification',
        `Contract lookup for ${instrument.symbol} failed: ${describeClientError(error)}`,
        { provider: PROVIDER, symbol: instrument.symbol, securityType: instrument.securityType },
        { cause: error }
      );
    }

    const resolved = details[0]?.contract;
    if (!resolved) {
      throw new ProviderError(
        'qualification',
        `No contract found for ${instrument.symbol} (${instrument.securityType})`,
        { provider: PROVIDER, symbol: instrument.symbol, securityType: instrument.securityType }
      );
    }

    const qualifiedContract: Contract = { ...contract, ...resolved };
    const localSymbol = resolved.localSymbol ?? contract.symbol ?? instrument.symbol;
    this.qualified.set(localSymbol, qualifiedContract);

    this.logger.info('Contract qualified', { symbol: instrument.symbol, localSymbol, conId: resolved.conId });

    return {
      symbol: instrument.symbol,
      securityType: instrument.securityType,
      localSymbol,
      exchange: resolved.exchange ?? instrument.exchange,
      ...(resolved.conId !== undefined ? { conId: resolved.conId } : {}),
    };
  }

  /**
   * Issues one historical-data request.
   *
   * @throws {ProviderError} kind `request` when the request is rejected
   */
  async fetchBars(instrument: QualifiedInstrument, envelope: RequestEnvelope): Promise<ProviderBar[]> {
    const api = this.requireApi();
    const contract = this.qualified.get(instrument.localSymbol) ?? {
      conId: instrument.conId,
      exchange: instrument.exchange,
    };

    this.logger.info('Requesting historical data', {
      symbol: instrument.symbol,
      timeframe: envelope.barSizeSetting,
      endDateTime: envelope.endDateTime,
      durationStr: envelope.durationStr,
      useRTH: envelope.useRTH,
      whatToShow: envelope.whatToShow,
    });

    const timer = startTimer();
    let bars: Bar[];
    try {
      bars = await api.getHistoricalData(
        contract,
        envelope.endDateTime,
        envelope.durationStr,
        toBarSizeSetting(envelope.barSizeSetting),
        toWhatToShow(envelope.whatToShow),
        envelope.useRTH ? 1 : 0,
        envelope.formatDate
      );
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      throw new ProviderError(
        'request',
        `Historical data request for ${instrument.symbol} failed: ${describeClientError(error)}`,
        { provider: PROVIDER, symbol: instrument.symbol, envelope: { ...envelope } },
        { cause: error }
      );
    }

    const result = toProviderBars(bars);
    this.logger.info('Historical data received', {
      symbol: instrument.symbol,
      count: result.length,
      dropped: bars.length - result.length,
      duration_ms: timer.stop(),
    });
    return result;
  }

  async disconnect(): Promise<void> {
    if (!this.api) {
      return;
    }
    this.release();
    this.logger.info('Disconnected from IBKR');
  }

  private release(): void {
    this.api?.disconnect();
    this.api = null;
    this.connected = false;
    this.qualified.clear();
  }

  private requireApi(): IbkrApi {
    if (!this.api || !this.connected) {
      throw new ProviderError('connection', 'Not connected to IBKR; call connect() first', { provider: PROVIDER });
    }
    return this.api;
  }
}
