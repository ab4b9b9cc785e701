/**
 * Rolling statistics over plain number arrays. Output arrays always have the
 * input's length; null fills positions without enough history.
 */

import { SMA } from 'technicalindicators';

function align(values: number[], length: number): (number | null)[] {
  const pad = length - values.length;
  const out: (number | null)[] = new Array(length).fill(null);
  for (let i = 0; i < values.length; i++) out[pad + i] = values[i];
  return out;
}

export function rollingMean(values: number[], window: number): (number | null)[] {
  if (values.length < window) return new Array(values.length).fill(null);
  return align(SMA.calculate({ period: window, values }), values.length);
}

/**
 * Trailing sample standard deviation (n - 1 denominator). Needs window >= 2.
 */
export function rollingSampleStd(values: number[], window: number): (number | null)[] {
  const out: (number | null)[] = new Array(values.length).fill(null);
  if (window < 2) return out;

  for (let t = window - 1; t < values.length; t++) {
    let sum = 0;
    for (let i = t - window + 1; i <= t; i++) sum += values[i];
    const mean = sum / window;
    let sq = 0;
    for (let i = t - window + 1; i <= t; i++) sq += (values[i] - mean) ** 2;
    out[t] = Math.sqrt(sq / (window - 1));
  }
  return out;
}

/**
 * Recursive EMA seeded with the first observation: alpha = 2 / (span + 1).
 */
export function exponentialMean(values: number[], span: number): number[] {
  const alpha = 2 / (span + 1);
  const out: number[] = [];
  for (let t = 0; t < values.length; t++) {
    out.push(t === 0 ? values[0] : alpha * values[t] + (1 - alpha) * out[t - 1]);
  }
  return out;
}

/**
 * Running VWAP from the first bar. Null while cumulative volume is still zero.
 */
export function cumulativeVwap(prices: number[], volumes: number[]): (number | null)[] {
  const out: (number | null)[] = [];
  let pv = 0;
  let vol = 0;
  for (let t = 0; t < prices.length; t++) {
    pv += prices[t] * volumes[t];
    vol += volumes[t];
    out.push(vol > 0 ? pv / vol : null);
  }
  return out;
}

export function mean(values: number[]): number {
  return values.reduce((s, v) => s + v, 0) / values.length;
}

export function sampleStd(values: number[]): number | null {
  if (values.length < 2) return null;
  const m = mean(values);
  const sq = values.reduce((s, v) => s + (v - m) ** 2, 0);
  return Math.sqrt(sq / (values.length - 1));
}
