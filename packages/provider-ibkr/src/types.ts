/**
 * @fileoverview Types for the IBKR provider
 */

import type { Bar, BarSizeSetting, ConnectionState, Contract, ContractDetails, WhatToShow } from '@stoqey/ib';
import type { Observable } from 'rxjs';
import type { Logger } from '@ibhist/logger';

/**
 * The subset of `IBApiNext` the provider relies on. Tests substitute an
 * in-process fake.
 */
export interface IbkrApi {
  readonly connectionState: Observable<ConnectionState>;
  connect(clientId?: number): unknown;
  disconnect(): unknown;
  getContractDetails(contract: Contract): Promise<ContractDetails[]>;
  getHistoricalData(
    contract: Contract,
    endDateTime: string | undefined,
    durationStr: string,
    barSizeSetting: BarSizeSetting,
    whatToShow: WhatToShow,
    useRTH: number,
    formatDate: number
  ): Promise<Bar[]>;
}

export interface IbkrConnectionOptions {
  host: string;
  port: number;
}

export interface IbkrProviderConfig {
  host: string;
  port: number;
  clientId: number;
  /** How long to wait for the Connected state. */
  connectTimeoutMs: number;
  logger: Logger;
  /** Builds the API client; defaults to `new IBApiNext({ host, port })`. */
  createApi?: (options: IbkrConnectionOptions) => IbkrApi;
}
