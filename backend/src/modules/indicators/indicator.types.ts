/**
 * INDICATOR TYPES & CATALOG
 * =========================
 *
 * Every window is trailing and includes the current bar. Values are aligned
 * one-to-one with the series bars; null marks the warm-up prefix.
 */

// ═══════════════════════════════════════════════════════════════
// SELECTORS
// ═══════════════════════════════════════════════════════════════

export type IndicatorSelector =
  | { kind: 'SMA'; window: number }
  | { kind: 'EMA'; span: number }
  | { kind: 'BOLLINGER'; window: number; k: number }
  | { kind: 'VWAP' };

// ═══════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════

export interface IndicatorResult {
  key: string;                  // 'sma_20', 'bb_upper_20_2', ...
  label: string;                // 'SMA 20'
  values: (number | null)[];
}

export type IndicatorComputation =
  | { shape: 'line'; selector: IndicatorSelector; result: IndicatorResult }
  | {
      shape: 'band';
      selector: IndicatorSelector;
      upper: IndicatorResult;
      middle: IndicatorResult;
      lower: IndicatorResult;
    };

// ═══════════════════════════════════════════════════════════════
// CATALOG
// ═══════════════════════════════════════════════════════════════

export const INDICATOR_IDS = ['SMA_20', 'EMA_20', 'BOLLINGER_20_2', 'VWAP', 'SMA_50', 'SMA_200'] as const;

export type IndicatorId = (typeof INDICATOR_IDS)[number];

export const INDICATOR_CATALOG: Readonly<Record<IndicatorId, IndicatorSelector>> = {
  SMA_20: { kind: 'SMA', window: 20 },
  EMA_20: { kind: 'EMA', span: 20 },
  BOLLINGER_20_2: { kind: 'BOLLINGER', window: 20, k: 2 },
  VWAP: { kind: 'VWAP' },
  SMA_50: { kind: 'SMA', window: 50 },
  SMA_200: { kind: 'SMA', window: 200 },
};

export const DEFAULT_INDICATORS: readonly IndicatorId[] = ['SMA_20', 'EMA_20', 'BOLLINGER_20_2', 'VWAP'];
