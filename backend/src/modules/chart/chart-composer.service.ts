/**
 * CHART COMPOSER
 * ==============
 *
 * Overlays indicator lines and an optional forecast onto the close series.
 */

import type { PriceSeries } from '../market-data/market-data.types.js';
import type { IndicatorComputation } from '../indicators/indicator.types.js';
import { indicatorLines } from '../indicators/indicator-engine.service.js';
import type { ForecastResult } from '../forecast/forecast.types.js';
import type { ChartSpec, ChartTrace, ChartTraceStyle } from './chart.types.js';

const PALETTE = ['#1f77b4', '#ff7f0e', '#2ca02c', '#9467bd', '#8c564b', '#e377c2', '#17becf'];

const PRICE_STYLE: ChartTraceStyle = { color: '#000000', dash: 'solid', width: 2 };
const FORECAST_STYLE: ChartTraceStyle = { color: '#d62728', dash: 'dashed', width: 2 };

export interface ComposeChartInput {
  series: PriceSeries;
  indicators?: IndicatorComputation[];
  forecast?: ForecastResult;
}

export function composeChart({ series, indicators = [], forecast }: ComposeChartInput): ChartSpec {
  const xs = series.bars.map((bar) => bar.date);

  const traces: ChartTrace[] = [
    {
      key: 'close',
      name: `${series.symbol} Historical`,
      kind: 'price',
      style: PRICE_STYLE,
      points: series.bars.map((bar) => ({ x: bar.date, y: bar.close })),
    },
  ];

  indicators.forEach((computation, i) => {
    const color = PALETTE[i % PALETTE.length];
    for (const line of indicatorLines(computation)) {
      traces.push({
        key: line.key,
        name: line.label,
        kind: computation.shape === 'band' ? 'band' : 'indicator',
        style: { color, dash: computation.shape === 'band' ? 'dotted' : 'solid', width: 1 },
        points: line.values.map((y, t) => ({ x: xs[t], y })),
      });
    }
  });

  if (forecast) {
    traces.push({
      key: 'forecast',
      name: `${series.symbol} Forecasted (${forecast.model})`,
      kind: 'forecast',
      style: FORECAST_STYLE,
      points: forecast.steps.map((step) => ({ x: step.date, y: step.value })),
    });
  }

  return {
    symbol: series.symbol,
    title: forecast
      ? `Historical and Forecasted Prices for ${series.symbol}`
      : `Historical Prices for ${series.symbol}`,
    xLabel: 'Date',
    yLabel: 'Close Price',
    traces,
  };
}
