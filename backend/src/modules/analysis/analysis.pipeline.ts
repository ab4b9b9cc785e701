/**
 * ANALYSIS PIPELINE
 * =================
 *
 * fetch → indicators → returns/backtest → forecast → chart → news, one symbol
 * at a time. Stage failures:
 *
 * - fetch (NoDataError, RemoteServiceError): symbol skipped
 * - returns / forecast (InsufficientHistory, FitError): stage omitted, warning kept
 * - news: warning kept, empty headline list
 * - anything unexpected: logged, symbol skipped
 */

import { AppError, FitError, InsufficientHistoryError, NoDataError, describeCause } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import type { INewsProvider, IPriceDataProvider, NewsItem, PriceSeries } from '../market-data/index.js';
import { computeCatalogIndicators } from '../indicators/index.js';
import { backtest, computeReturns, type BacktestResult, type ReturnsSummary } from '../returns/index.js';
import type { ForecastResult, ForecastService } from '../forecast/index.js';
import { composeChart } from '../chart/index.js';
import { AnalysisSession, type SessionStore } from './analysis.session.js';
import type { AnalysisRequest, AnalysisStage, SymbolAnalysis, SymbolIssue } from './analysis.types.js';

export interface AnalysisPipelineDeps {
  prices: IPriceDataProvider;
  news?: INewsProvider;
  forecasts: ForecastService;
  sessions: SessionStore;
  logger: Logger;
}

function issue(stage: AnalysisStage, error: unknown): SymbolIssue {
  if (error instanceof AppError) {
    return { stage, code: error.code, message: error.message };
  }
  return { stage, code: 'INTERNAL_ERROR', message: describeCause(error) };
}

function isRecoverable(error: unknown): error is InsufficientHistoryError | FitError {
  return error instanceof InsufficientHistoryError || error instanceof FitError;
}

export class AnalysisPipeline {
  constructor(private readonly deps: AnalysisPipelineDeps) {}

  /**
   * Runs the batch and stores it. With a sessionId the stored session's
   * previous results are replaced; an id the store does not hold is rejected
   * with NotFoundError before anything is fetched. Without one a new session
   * is created under a fresh id.
   */
  async run(request: AnalysisRequest, sessionId?: string): Promise<AnalysisSession> {
    const { sessions } = this.deps;
    const existing = sessionId === undefined ? undefined : sessions.get(sessionId);
    const results: SymbolAnalysis[] = [];

    for (const symbol of request.symbols) {
      results.push(await this.analyzeSymbol(symbol, request));
    }

    let session: AnalysisSession;
    if (existing) {
      session = existing;
      session.replace(request, results);
    } else {
      session = new AnalysisSession(request, results);
    }
    sessions.save(session);

    const skipped = results.filter((r) => r.status === 'skipped').length;
    this.deps.logger.info(
      { sessionId: session.id, symbols: request.symbols.length, skipped },
      'analysis run complete',
    );
    return session;
  }

  async analyzeSymbol(symbol: string, request: AnalysisRequest): Promise<SymbolAnalysis> {
    let series: PriceSeries;
    try {
      series = await this.deps.prices.fetchSeries(symbol, request.range);
      if (series.bars.length === 0) throw new NoDataError(symbol);
    } catch (error) {
      const err = issue('fetch', error);
      this.deps.logger.warn({ symbol, code: err.code }, `Skipping ${symbol}: ${err.message}`);
      return { status: 'skipped', symbol, error: err };
    }

    try {
      return await this.analyzeSeries(series, request);
    } catch (error) {
      const err = issue('pipeline', error);
      this.deps.logger.error({ symbol, err: error }, `Analysis of ${symbol} failed`);
      return { status: 'skipped', symbol, error: err };
    }
  }

  private async analyzeSeries(series: PriceSeries, request: AnalysisRequest): Promise<SymbolAnalysis> {
    const { symbol } = series;
    const warnings: SymbolIssue[] = [];
    const warn = (stage: AnalysisStage, error: unknown) => {
      const w = issue(stage, error);
      warnings.push(w);
      this.deps.logger.warn({ symbol, stage, code: w.code }, w.message);
    };

    const indicators = computeCatalogIndicators(series, request.indicators);

    let returns: ReturnsSummary | null = null;
    let backtestResult: BacktestResult | null = null;
    try {
      returns = computeReturns(series);
      backtestResult = backtest(series);
    } catch (error) {
      if (!isRecoverable(error)) throw error;
      warn('returns', error);
    }

    let forecast: ForecastResult | null = null;
    try {
      forecast = this.deps.forecasts.forecast(series, request.forecast);
    } catch (error) {
      if (!isRecoverable(error)) throw error;
      warn('forecast', error);
    }

    const chart = composeChart({ series, indicators, forecast: forecast ?? undefined });

    let news: NewsItem[] = [];
    if (request.includeNews && this.deps.news) {
      try {
        news = await this.deps.news.fetchNews(symbol);
      } catch (error) {
        if (!(error instanceof AppError)) throw error;
        warn('news', error);
      }
    }

    return {
      status: 'ok',
      symbol,
      series,
      indicators,
      returns,
      backtest: backtestResult,
      forecast,
      chart,
      news,
      warnings,
    };
  }
}
