/**
 * @ibhist/provider-ibkr
 *
 * Interactive Brokers historical bars through IB Gateway or TWS.
 *
 * @packageDocumentation
 */

export { IbkrHistoricalProvider, describeClientError } from './ibkr-provider.js';
export { createContract } from './contract.js';
export { toBarSizeSetting, toWhatToShow, toProviderBars } from './mapping.js';
export type { IbkrApi, IbkrConnectionOptions, IbkrProviderConfig } from './types.js';
