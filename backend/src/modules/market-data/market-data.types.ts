/**
 * MARKET DATA TYPES
 * =================
 *
 * Daily price observations for one symbol over a requested date range.
 */

// ═══════════════════════════════════════════════════════════════
// PRICE BARS
// ═══════════════════════════════════════════════════════════════

export interface PriceBar {
  date: string;          // YYYY-MM-DD, unique within a series
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;        // non-negative integer
  deliverableQuantity?: number;
}

export interface DateRange {
  start: string;         // YYYY-MM-DD inclusive
  end: string;           // YYYY-MM-DD inclusive
}

/**
 * Immutable once constructed; a new fetch produces a new series.
 */
export interface PriceSeries {
  readonly symbol: string;
  readonly range: Readonly<DateRange>;
  readonly bars: readonly Readonly<PriceBar>[];
}

// ═══════════════════════════════════════════════════════════════
// MARKETS
// ═══════════════════════════════════════════════════════════════

export type Market = 'IN' | 'US';

export const MARKET_SUFFIX: Record<Market, string> = {
  IN: '.NS',
  US: '',
};

// ═══════════════════════════════════════════════════════════════
// NEWS
// ═══════════════════════════════════════════════════════════════

export interface NewsItem {
  title: string;
  link: string;
  publisher: string;
  publishedAt?: string;  // ISO timestamp
}

// ═══════════════════════════════════════════════════════════════
// PROVIDER CONTRACTS
// ═══════════════════════════════════════════════════════════════

export interface IPriceDataProvider {
  readonly id: string;
  /**
   * Resolves to a non-empty series or rejects with NoDataError.
   * Transport failures reject with RemoteServiceError.
   */
  fetchSeries(symbol: string, range: DateRange): Promise<PriceSeries>;
}

export interface INewsProvider {
  readonly id: string;
  fetchNews(symbol: string, limit?: number): Promise<NewsItem[]>;
}
