export interface ReturnsSummary {
  /** r_t = close_t / close_{t-1} - 1, null at the first bar */
  returns: (number | null)[];
  /** Π(1 + r_t) - 1 over the full series */
  cumulativeReturn: number;
  /** sample std of the defined returns; null with a single return */
  volatility: number | null;
}

export interface BacktestResult {
  symbol: string;
  totalReturn: number;
}
