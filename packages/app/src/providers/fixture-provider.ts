/**
 * Fixture-based provider for offline runs and tests.
 *
 * Reads bars from a JSON file shaped as `{ "bars": [{ time, open, high, low, close, volume? }] }`.
 */

import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ProviderError } from '@ibhist/contracts';
import type {
  HistoricalBarsProvider,
  InstrumentSpec,
  ProviderBar,
  QualifiedInstrument,
  RequestEnvelope,
} from '@ibhist/contracts';
import { createChildLogger } from '@ibhist/logger';
import type { Logger } from '@ibhist/logger';

const PROVIDER = 'fixture';

/** Fixture shipped with the package. */
export const SAMPLE_FIXTURE = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'fixtures', 'spy-5mins.json');

const fixtureSchema = z.object({
  symbol: z.string().min(1).optional(),
  bars: z.array(
    z.object({
      time: z.union([z.string().min(1), z.number()]),
      open: z.number(),
      high: z.number(),
      low: z.number(),
      close: z.number(),
      volume: z.number().nonnegative().default(0),
    })
  ),
});

export interface FixtureProviderConfig {
  logger: Logger;
  fixturePath: string;
}

/**
 * Provider that serves bars from a JSON file instead of a gateway.
 */
export class FixtureProvider implements HistoricalBarsProvider {
  readonly name = PROVIDER;

  private readonly logger: Logger;
  private readonly fixturePath: string;
  private bars: ProviderBar[] | null = null;
  private fixtureSymbol: string | undefined;

  constructor(config: FixtureProviderConfig) {
    this.logger = createChildLogger(config.logger, { component: 'provider', provider: PROVIDER });
    this.fixturePath = config.fixturePath;
  }

  async connect(): Promise<void> {
    let text: string;
    try {
      text = await readFile(this.fixturePath, 'utf8');
    } catch (error) {
      throw new ProviderError(
        'connection',
        `Fixture file could not be read: ${this.fixturePath}`,
        { provider: PROVIDER, path: this.fixturePath },
        { cause: error }
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new ProviderError(
        'connection',
        `Fixture file is not valid JSON: ${this.fixturePath}`,
        { provider: PROVIDER, path: this.fixturePath },
        { cause: error }
      );
    }

    const result = fixtureSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
      throw new ProviderError('connection', `Fixture file is malformed: ${this.fixturePath}`, {
        provider: PROVIDER,
        path: this.fixturePath,
        issues,
      });
    }

    this.bars = result.data.bars;
    this.fixtureSymbol = result.data.symbol;
    this.logger.info('Fixture loaded', { path: this.fixturePath, count: this.bars.length });
  }

  async qualify(instrument: InstrumentSpec): Promise<QualifiedInstrument> {
    this.requireBars();
    if (this.fixtureSymbol && this.fixtureSymbol.toUpperCase() !== instrument.symbol.toUpperCase()) {
      throw new ProviderError(
        'qualification',
        `No contract found for ${instrument.symbol} (${instrument.securityType})`,
        { provider: PROVIDER, symbol: instrument.symbol, fixtureSymbol: this.fixtureSymbol }
      );
    }
    return {
      symbol: instrument.symbol,
      securityType: instrument.securityType,
      localSymbol: instrument.symbol.toUpperCase(),
      exchange: instrument.exchange,
    };
  }

  async fetchBars(instrument: QualifiedInstrument, envelope: RequestEnvelope): Promise<ProviderBar[]> {
    const bars = this.requireBars();
    this.logger.debug('Returning fixture bars', {
      symbol: instrument.symbol,
      timeframe: envelope.barSizeSetting,
      count: bars.length,
    });
    return [...bars];
  }

  async disconnect(): Promise<void> {
    this.bars = null;
  }

  private requireBars(): ProviderBar[] {
    if (this.bars === null) {
      throw new ProviderError('connection', 'Fixture not loaded; call connect() first', { provider: PROVIDER });
    }
    return this.bars;
  }
}
