import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import logger from '../utils/logger.js';
import { MarketDataUnavailableError } from '../errors.js';
import type { MarketDataProvider, PriceBar } from './types.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

// Yahoo liefert stündliche Bars nur für die letzten ~730 Tage
const HOURLY_LIMIT_MS = 700 * DAY_MS;

const INTERVAL_MS = {
  '1h': HOUR_MS,
  '1d': DAY_MS,
} as const;

export type ChartInterval = keyof typeof INTERVAL_MS;

const priceSeries = z.array(z.number().nullable()).optional();

export const chartResponseSchema = z.object({
  chart: z.object({
    result: z.array(z.object({
      timestamp: z.array(z.number()).optional(),
      indicators: z.object({
        quote: z.array(z.object({
          open: priceSeries,
          close: priceSeries,
        })),
      }),
    })).nullable(),
    error: z.object({
      code: z.string(),
      description: z.string(),
    }).nullable().optional(),
  }),
});

export interface YahooChartOptions {
  baseUrl: string;
  timeoutMs: number;
}

export function chooseInterval(from: Date, now: Date): ChartInterval {
  return now.getTime() - from.getTime() < HOURLY_LIMIT_MS ? '1h' : '1d';
}

/**
 * Chart-Timestamps markieren den Beginn einer Kerze.
 * Open gilt ab Kerzenbeginn, Close erst ab Kerzenende; trifft ein Close auf
 * das Open der Folgekerze, gewinnt der Close.
 *
 * @throws MarketDataUnavailableError bei unerwarteter Antwort oder API-Fehler
 */
export function parseChartBars(symbol: string, payload: unknown, interval: ChartInterval): PriceBar[] {
  const parsed = chartResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new MarketDataUnavailableError(symbol, null, `Unerwartete Antwort der Chart API für ${symbol}`);
  }

  const { result, error } = parsed.data.chart;
  if (error) {
    throw new MarketDataUnavailableError(symbol, null, `Chart API Fehler für ${symbol}: ${error.description}`);
  }

  const intervalMs = INTERVAL_MS[interval];
  const series = result?.[0];
  const timestamps = series?.timestamp ?? [];
  const quote = series?.indicators.quote[0];
  const opens = quote?.open ?? [];
  const closes = quote?.close ?? [];

  const byTime = new Map<number, PriceBar>();
  const valid = (v: number | null | undefined): v is number => typeof v === 'number' && v > 0;

  timestamps.forEach((ts, i) => {
    const startMs = ts * 1000;
    const open = opens[i];
    const close = closes[i];

    // Lücken (null) und Nullkurse überspringen
    if (valid(open) && !byTime.has(startMs)) {
      byTime.set(startMs, { timestamp: new Date(startMs), price: open, intervalMs });
    }
    if (valid(close)) {
      const endMs = startMs + intervalMs;
      byTime.set(endMs, { timestamp: new Date(endMs), price: close, intervalMs });
    }
  });

  return [...byTime.values()].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

/**
 * Marktdaten über die Yahoo Chart API (/v8/finance/chart/{symbol})
 */
export class YahooChartProvider implements MarketDataProvider {
  readonly name = 'yahoo';
  private client: AxiosInstance;

  constructor(options: YahooChartOptions) {
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: {
        'Accept': 'application/json',
        'User-Agent': 'Mozilla/5.0 (compatible; forecast-ledger/1.0)',
      },
    });
  }

  async getPrices(symbol: string, from: Date, to: Date, signal?: AbortSignal): Promise<PriceBar[]> {
    const interval = chooseInterval(from, new Date());
    const intervalMs = INTERVAL_MS[interval];

    logger.debug(`[MARKET] ${symbol}: ${from.toISOString()} → ${to.toISOString()} (${interval})`);

    // Eine Kerze früher anfragen: deren Close kann der Kurs bei `from` sein
    const response = await this.client.get(`/v8/finance/chart/${encodeURIComponent(symbol)}`, {
      params: {
        period1: Math.floor((from.getTime() - intervalMs) / 1000),
        period2: Math.ceil(to.getTime() / 1000),
        interval,
        includePrePost: false,
      },
      signal,
    });

    return parseChartBars(symbol, response.data, interval);
  }
}
