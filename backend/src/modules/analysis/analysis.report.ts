import type { BacktestResult } from '../returns/index.js';
import { indicatorLines } from '../indicators/index.js';
import type { AnalysisSession } from './analysis.session.js';
import type { BatchReport, ForecastSummaryRow, SymbolAnalysis, SymbolReport } from './analysis.types.js';

export function toSymbolReport(analysis: SymbolAnalysis): SymbolReport {
  if (analysis.status === 'skipped') return analysis;

  const { series } = analysis;
  const bars = series.bars;
  const latest: Record<string, number | null> = {};
  for (const computation of analysis.indicators) {
    for (const line of indicatorLines(computation)) {
      latest[line.key] = line.values[line.values.length - 1] ?? null;
    }
  }

  return {
    status: 'ok',
    symbol: analysis.symbol,
    bars: bars.length,
    firstDate: bars[0].date,
    lastDate: bars[bars.length - 1].date,
    lastClose: bars[bars.length - 1].close,
    latest,
    cumulativeReturn: analysis.returns?.cumulativeReturn ?? null,
    volatility: analysis.returns?.volatility ?? null,
    forecast: analysis.forecast,
    news: analysis.news,
    warnings: analysis.warnings,
  };
}

export function toBatchReport(session: AnalysisSession): BatchReport {
  const results = session.results;
  const forecasts: ForecastSummaryRow[] = [];
  const backtest: BacktestResult[] = [];

  for (const r of results) {
    if (r.status !== 'ok') continue;
    if (r.backtest) backtest.push(r.backtest);
    if (r.forecast) {
      forecasts.push({
        symbol: r.symbol,
        pointForecast: r.forecast.pointForecast,
        volatility: r.returns?.volatility ?? null,
      });
    }
  }

  return {
    sessionId: session.id,
    createdAt: session.createdAt.toISOString(),
    updatedAt: session.updatedAt.toISOString(),
    range: session.request.range,
    results: results.map(toSymbolReport),
    backtest,
    forecasts,
  };
}
