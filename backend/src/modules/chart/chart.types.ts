/**
 * CHART TYPES
 * ===========
 *
 * Renderer-agnostic description of a price chart. The dashboard draws it and,
 * when asked for a narrative, rasterises it and posts the image back.
 */

export type ChartTraceKind = 'price' | 'indicator' | 'band' | 'forecast';

export interface ChartPoint {
  x: string;           // YYYY-MM-DD
  y: number | null;    // null = gap
}

export interface ChartTraceStyle {
  color: string;
  dash: 'solid' | 'dashed' | 'dotted';
  width: number;
}

export interface ChartTrace {
  key: string;
  name: string;
  kind: ChartTraceKind;
  style: ChartTraceStyle;
  points: ChartPoint[];
}

export interface ChartSpec {
  symbol: string;
  title: string;
  xLabel: string;
  yLabel: string;
  traces: ChartTrace[];
}
