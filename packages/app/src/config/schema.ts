/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { TIMEFRAMES, isDurationUnit } from '@ibhist/contracts';

const DURATION_SHAPE = /^\d+ ([A-Z])$/;

/**
 * Application configuration schema
 */
export const configSchema = z
  .object({
    ib: z
      .object({
        host: z.string().min(1).default('127.0.0.1'),
        port: z.coerce.number().int().min(1).max(65535).default(4001),
        clientId: z.coerce.number().int().nonnegative().default(77),
        connectTimeoutMs: z.coerce.number().int().positive().default(10000),
      })
      .default({}),

    instrument: z
      .object({
        symbol: z.string().min(1).default('SPY'),
        securityType: z.enum(['STK', 'CASH', 'FUT']).default('STK'),
        stockExchange: z.string().min(1).default('SMART'),
        stockCurrency: z.string().length(3).default('USD'),
        futureMonth: z
          .string()
          .regex(/^\d{6}(\d{2})?$/, 'Contract month must be YYYYMM or YYYYMMDD')
          .optional(),
        futureExchange: z.string().min(1).optional(),
        futureCurrency: z.string().length(3).default('USD'),
      })
      .default({}),

    request: z
      .object({
        duration: z
          .string()
          .default('1 Y')
          .refine((value) => {
            const unit = DURATION_SHAPE.exec(value.trim())?.[1];
            return unit !== undefined && isDurationUnit(unit);
          }, 'Duration must look like "30 D", "6 M" or "1 Y"'),
        timeframe: z.enum(TIMEFRAMES).default('1 day'),
        whatToShow: z.enum(['TRADES', 'MIDPOINT', 'BID', 'ASK', 'ADJUSTED_LAST']).default('TRADES'),
        timezone: z.enum(['UTC', 'market', 'local']).default('market'),
      })
      .default({}),

    logging: z
      .object({
        level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
        format: z.enum(['json', 'pretty']).default('pretty'),
        filePath: z.string().min(1).optional(),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    const { securityType, futureMonth, futureExchange } = config.instrument;
    if (securityType !== 'FUT') {
      return;
    }
    if (!futureMonth) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['instrument', 'futureMonth'],
        message: 'Futures require a contract month (IBHIST_FUTURE_MONTH)',
      });
    }
    if (!futureExchange) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['instrument', 'futureExchange'],
        message: 'Futures require an exchange (IBHIST_FUTURE_EXCHANGE)',
      });
    }
  });

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Readonly<Record<string, string>> = {
  IB_HOST: 'ib.host',
  IB_PORT: 'ib.port',
  IB_CLIENT_ID: 'ib.clientId',
  IB_CONNECT_TIMEOUT_MS: 'ib.connectTimeoutMs',
  IBHIST_SYMBOL: 'instrument.symbol',
  IBHIST_SECURITY_TYPE: 'instrument.securityType',
  IBHIST_STOCK_EXCHANGE: 'instrument.stockExchange',
  IBHIST_STOCK_CURRENCY: 'instrument.stockCurrency',
  IBHIST_FUTURE_MONTH: 'instrument.futureMonth',
  IBHIST_FUTURE_EXCHANGE: 'instrument.futureExchange',
  IBHIST_FUTURE_CURRENCY: 'instrument.futureCurrency',
  IBHIST_DURATION: 'request.duration',
  IBHIST_TIMEFRAME: 'request.timeframe',
  IBHIST_WHAT_TO_SHOW: 'request.whatToShow',
  IBHIST_TIMEZONE: 'request.timezone',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
};
