import type { Domain, SamplingOptions } from './content-engine/sampler/src/index.js';

export interface AxisRange {
  min: number;
  max: number;
  label?: string;
}

export interface PlotStyle {
  stroke?: string;
  strokeWidth?: number;
  /** How single-point runs are drawn. */
  isolatedPoints?: 'dot' | 'drop';
}

interface PlotSpecBase {
  title?: string;
  x: AxisRange;
  y: AxisRange;
  params?: Record<string, number>;
  style?: PlotStyle;
  sampling?: SamplingOptions;
}

/** y = expr(x); the domain defaults to the x range. */
export interface FunctionPlotSpec extends PlotSpecBase {
  kind: 'function';
  expr: string;
  domain?: Domain;
}

/** (exprX(t), exprY(t)) over the parameter domain. */
export interface ParametricPlotSpec extends PlotSpecBase {
  kind: 'parametric';
  exprX: string;
  exprY: string;
  domain: Domain;
}

/** r = expr(theta); the domain defaults to one full turn. */
export interface PolarPlotSpec extends PlotSpecBase {
  kind: 'polar';
  expr: string;
  domain?: Domain;
}

export type PlotSpec = FunctionPlotSpec | ParametricPlotSpec | PolarPlotSpec;

export type PlotKind = PlotSpec['kind'];
