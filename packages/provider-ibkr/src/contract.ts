/**
 * @fileoverview Instrument descriptions to IBKR contracts
 */

import { SecType } from '@stoqey/ib';
import type { Contract } from '@stoqey/ib';
import { ProviderError } from '@ibhist/contracts';
import type { InstrumentSpec } from '@ibhist/contracts';

/** Forex is quoted on IDEALPRO regardless of configured exchange. */
const FOREX_EXCHANGE = 'IDEALPRO';

const CURRENCY_PAIR = /^([A-Z]{3})([A-Z]{3})$/;

/**
 * Builds the contract for an instrument.
 *
 * - STK: symbol, exchange and currency as given
 * - CASH: a six-letter pair such as `EURUSD`, split into base symbol and quote currency
 * - FUT: symbol, contract month, exchange and currency
 *
 * @throws {ProviderError} kind `qualification` for a malformed pair or a future without a contract month
 *
 * @example
 * ```typescript
 * createContract({ symbol: 'EURUSD', securityType: 'CASH', exchange: 'SMART', currency: 'USD' })
 * // { symbol: 'EUR', secType: 'CASH', exchange: 'IDEALPRO', currency: 'USD' }
 * ```
 */
export function createContract(instrument: InstrumentSpec): Contract {
  const symbol = instrument.symbol.toUpperCase();

  switch (instrument.securityType) {
    case 'STK':
      return { symbol, secType: SecType.STK, exchange: instrument.exchange, currency: instrument.currency };

    case 'CASH': {
      const pair = CURRENCY_PAIR.exec(symbol);
      if (!pair?.[1] || !pair[2]) {
        throw new ProviderError('qualification', `Forex symbol must be a six-letter currency pair such as EURUSD, got ${symbol}`, {
          provider: 'ibkr',
          symbol,
        });
      }
      return { symbol: pair[1], secType: SecType.CASH, exchange: FOREX_EXCHANGE, currency: pair[2] };
    }

    case 'FUT':
      if (!instrument.contractMonth) {
        throw new ProviderError('qualification', 'Futures require a contract month and an exchange', {
          provider: 'ibkr',
          symbol,
        });
      }
      return {
        symbol,
        secType: SecType.FUT,
        lastTradeDateOrContractMonth: instrument.contractMonth,
        exchange: instrument.exchange,
        currency: instrument.currency,
      };
  }
}
