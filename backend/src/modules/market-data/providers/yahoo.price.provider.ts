/**
 * YAHOO PRICE PROVIDER
 * ====================
 *
 * Daily bars from the Yahoo Finance chart API.
 *
 * - OHLC are dividend/split adjusted when adjclose is present
 * - Rows with a missing OHLC value are dropped
 * - Dates are exchange-local calendar dates (timestamp + gmtoffset)
 */

import type { AxiosInstance } from 'axios';
import { NoDataError, RemoteServiceError } from '../../../common/errors.js';
import { httpStatusOf, toRemoteServiceError } from '../../../common/http.js';
import { createPriceSeries } from '../price-series.js';
import type { DateRange, IPriceDataProvider, PriceBar, PriceSeries } from '../market-data.types.js';
import { YahooChartResponseSchema, type YahooChartResponse } from './yahoo.chart.schema.js';

const DAY_SECONDS = 24 * 60 * 60;

function toEpochSeconds(date: string): number {
  return Math.floor(Date.parse(`${date}T00:00:00Z`) / 1000);
}

function round(value: number, digits = 6): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

export function barsFromChart(payload: YahooChartResponse): PriceBar[] {
  const result = payload.chart.result?.[0];
  if (!result?.timestamp?.length) return [];

  const quote = result.indicators.quote[0];
  if (!quote) return [];

  const adjclose = result.indicators.adjclose?.[0]?.adjclose;
  const offset = result.meta.gmtoffset ?? 0;
  const byDate = new Map<string, PriceBar>();

  result.timestamp.forEach((ts, i) => {
    const open = quote.open?.[i];
    const high = quote.high?.[i];
    const low = quote.low?.[i];
    const close = quote.close?.[i];
    if (open == null || high == null || low == null || close == null) return;
    if (open <= 0 || high <= 0 || low <= 0 || close <= 0) return;

    const adj = adjclose?.[i];
    const factor = adj != null && adj > 0 ? adj / close : 1;
    const date = new Date((ts + offset) * 1000).toISOString().slice(0, 10);

    // later rows for the same date win (intraday "live" row duplicates)
    byDate.set(date, {
      date,
      open: round(open * factor),
      high: round(high * factor),
      low: round(low * factor),
      close: round(close * factor),
      volume: Math.max(0, Math.round(quote.volume?.[i] ?? 0)),
    });
  });

  return [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

export class YahooPriceProvider implements IPriceDataProvider {
  readonly id = 'yahoo';

  constructor(private readonly http: AxiosInstance) {}

  async fetchSeries(symbol: string, range: DateRange): Promise<PriceSeries> {
    let data: unknown;
    try {
      const response = await this.http.get(`/v8/finance/chart/${encodeURIComponent(symbol)}`, {
        params: {
          interval: '1d',
          period1: toEpochSeconds(range.start),
          // end date is inclusive
          period2: toEpochSeconds(range.end) + DAY_SECONDS,
          events: 'div,split',
        },
      });
      data = response.data;
    } catch (error) {
      if (httpStatusOf(error) === 404) {
        throw new NoDataError(symbol);
      }
      throw toRemoteServiceError('Yahoo chart', error);
    }

    const parsed = YahooChartResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new RemoteServiceError('Yahoo chart', `malformed response for ${symbol}`);
    }

    const bars = barsFromChart(parsed.data).filter((bar) => bar.date >= range.start && bar.date <= range.end);
    if (bars.length === 0) {
      throw new NoDataError(symbol);
    }

    return createPriceSeries(symbol, range, bars);
  }
}
