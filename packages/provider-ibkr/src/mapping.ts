/**
 * @fileoverview Catalog values to @stoqey/ib request enums
 */

import { BarSizeSetting, WhatToShow } from '@stoqey/ib';
import type { Bar } from '@stoqey/ib';
import { ProviderError } from '@ibhist/contracts';
import type { ProviderBar, Timeframe, WhatToShow as RequestedData } from '@ibhist/contracts';

/**
 * Short forms some client releases use instead of the catalog label.
 */
const BAR_SIZE_SHORT_FORM: Partial<Record<Timeframe, string>> = {
  '1 week': '1W',
  '1 month': '1M',
};

export function toBarSizeSetting(timeframe: Timeframe): BarSizeSetting {
  const shortForm = BAR_SIZE_SHORT_FORM[timeframe];
  const setting = Object.values(BarSizeSetting).find((value) => value === timeframe || value === shortForm);
  if (setting === undefined) {
    throw new ProviderError('request', `Bar size ${timeframe} is not supported by the IBKR client`, {
      provider: 'ibkr',
      timeframe,
    });
  }
  return setting;
}

export function toWhatToShow(value: RequestedData): WhatToShow {
  const setting = Object.values(WhatToShow).find((candidate) => candidate === value);
  if (setting === undefined) {
    throw new ProviderError('request', `Data type ${value} is not supported by the IBKR client`, {
      provider: 'ibkr',
      whatToShow: value,
    });
  }
  return setting;
}

/**
 * Maps client bars to provider bars. Bars without a time or a price are
 * dropped; a missing volume counts as zero.
 */
export function toProviderBars(bars: readonly Bar[]): ProviderBar[] {
  const result: ProviderBar[] = [];
  for (const bar of bars) {
    const { time, open, high, low, close } = bar;
    if (time === undefined || open === undefined || high === undefined || low === undefined || close === undefined) {
      continue;
    }
    result.push({ time, open, high, low, close, volume: bar.volume ?? 0 });
  }
  return result;
}
