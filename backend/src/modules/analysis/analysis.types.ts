/**
 * ANALYSIS TYPES
 * ==============
 *
 * One run = one ordered batch of symbols processed sequentially.
 * A failing symbol is reported and skipped; the rest of the batch continues.
 */

import type { DateRange, Market, NewsItem, PriceSeries } from '../market-data/market-data.types.js';
import type { IndicatorComputation, IndicatorId } from '../indicators/indicator.types.js';
import type { BacktestResult, ReturnsSummary } from '../returns/returns.types.js';
import type { ForecastConfig, ForecastResult } from '../forecast/forecast.types.js';
import type { ChartSpec } from '../chart/chart.types.js';

export interface AnalysisRequest {
  symbols: string[];             // already resolved against market
  market: Market;
  range: DateRange;
  indicators: readonly IndicatorId[];
  forecast: Partial<ForecastConfig>;
  includeNews: boolean;
}

export type AnalysisStage = 'fetch' | 'indicators' | 'returns' | 'forecast' | 'news' | 'pipeline';

export interface SymbolIssue {
  stage: AnalysisStage;
  code: string;
  message: string;
}

export type SymbolAnalysis =
  | {
      status: 'ok';
      symbol: string;
      series: PriceSeries;
      indicators: IndicatorComputation[];
      returns: ReturnsSummary | null;
      backtest: BacktestResult | null;
      forecast: ForecastResult | null;
      chart: ChartSpec;
      news: NewsItem[];
      warnings: SymbolIssue[];
    }
  | {
      status: 'skipped';
      symbol: string;
      error: SymbolIssue;
    };

// ═══════════════════════════════════════════════════════════════
// REPORTS (API payloads)
// ═══════════════════════════════════════════════════════════════

export type SymbolReport =
  | {
      status: 'ok';
      symbol: string;
      bars: number;
      firstDate: string;
      lastDate: string;
      lastClose: number;
      latest: Record<string, number | null>;
      cumulativeReturn: number | null;
      volatility: number | null;
      forecast: ForecastResult | null;
      news: NewsItem[];
      warnings: SymbolIssue[];
    }
  | {
      status: 'skipped';
      symbol: string;
      error: SymbolIssue;
    };

export interface ForecastSummaryRow {
  symbol: string;
  pointForecast: number;
  volatility: number | null;
}

export interface BatchReport {
  sessionId: string;
  createdAt: string;
  updatedAt: string;
  range: DateRange;
  results: SymbolReport[];
  backtest: BacktestResult[];
  forecasts: ForecastSummaryRow[];
}
