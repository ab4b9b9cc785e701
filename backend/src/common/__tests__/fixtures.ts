/**
 * Shared test helpers: synthetic price series and an in-process axios stub.
 */

import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { createPriceSeries } from '../../modules/market-data/price-series.js';
import type { PriceBar, PriceSeries } from '../../modules/market-data/market-data.types.js';
import { nextWeekdays } from '../../modules/forecast/trading-calendar.js';

export const SCENARIO_CLOSES = [100, 102, 101, 105, 103, 108, 110, 107, 109, 112];

export interface SeriesOptions {
  symbol?: string;
  start?: string;          // first bar date, a weekday
  volumes?: number[];
}

/**
 * Bars on consecutive weekdays starting at `start` (default Mon 2024-01-01).
 */
export function makeSeries(prices: number[], options: SeriesOptions = {}): PriceSeries {
  const symbol = options.symbol ?? 'TEST';
  const start = options.start ?? '2024-01-01';
  const dates = prices.length > 0 ? [start, ...nextWeekdays(start, prices.length - 1)] : [];

  const bars: PriceBar[] = prices.map((close, i) => ({
    date: dates[i],
    open: close,
    high: close,
    low: close,
    close,
    volume: options.volumes?.[i] ?? 1000,
  }));

  const end = dates[dates.length - 1] ?? start;
  return createPriceSeries(symbol, { start, end }, bars);
}

export type StubHandler = (config: InternalAxiosRequestConfig) => unknown;

/**
 * axios instance whose adapter answers in process. Throwing/rejecting from the
 * handler rejects the request.
 */
export function stubHttp(handler: StubHandler): AxiosInstance {
  return axios.create({
    adapter: async (config) => ({
      data: await handler(config),
      status: 200,
      statusText: 'OK',
      headers: {},
      config,
    }),
  });
}

export function httpError(config: InternalAxiosRequestConfig, status: number): AxiosError {
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, {
    data: {},
    status,
    statusText: String(status),
    headers: {},
    config,
  });
}

export function timeoutError(config: InternalAxiosRequestConfig, ms: number): AxiosError {
  return new AxiosError(`timeout of ${ms}ms exceeded`, 'ECONNABORTED', config);
}

export function jsonBody(config: InternalAxiosRequestConfig): unknown {
  return typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
}
