// Core types for the curve sampler

/**
 * One plotted coordinate. Parametric and polar output carries the curve
 * parameter as a third element.
 */
export type SamplePoint = readonly [x: number, y: number] | readonly [x: number, y: number, t: number];

/** Marks a discontinuity: renderers never connect across it. */
export const BREAK = null;
export type BreakMarker = typeof BREAK;

export type RawSample = SamplePoint | BreakMarker;

export type Polyline = SamplePoint[];

export interface Domain {
  min: number;
  max: number;
}

export type SamplingStrategy = 'dense' | 'warped' | 'adaptive';

export type WarpKind = 'cubic' | 'tanh';

/**
 * Caller-facing sampling options. Every field is optional; defaults depend
 * on the domain and are filled in by `resolveSamplingConfig`.
 */
export interface SamplingOptions {
  strategy?: SamplingStrategy;
  samples?: number;
  minStep?: number;
  maxStep?: number;
  tolerance?: number;
  relativeError?: boolean;
  refinementLimit?: number;
  maxPoints?: number;
  maxIterations?: number;
  growthFactor?: number;
  center?: number;
  warp?: WarpKind;
  jumpThreshold?: number;
  jumpRatio?: number;
  magnitudeCeiling?: number;
  /**
   * Inputs with |x| below this are rejected before the function is called.
   * Off (0) by default so that x = 0 is an ordinary input; 1e-10 is the usual
   * value when a function is singular at the origin. Never applied to the
   * parameter of parametric or polar curves.
   */
  zeroEpsilon?: number;
}

export type SamplingConfig = Required<SamplingOptions>;

export type Evaluable = (input: number) => unknown;

export type ParametricEvaluable = (t: number) => readonly [unknown, unknown];

export type InvalidReason =
  | 'singular-input'
  | 'threw'
  | 'non-numeric'
  | 'not-a-number'
  | 'infinite'
  | 'overflow';

export type GuardResult<V> =
  | { valid: true; value: V }
  | { valid: false; reason: InvalidReason };

export interface SamplingDiagnostics {
  strategy: SamplingStrategy;
  evaluations: number;
  invalidEvaluations: Partial<Record<InvalidReason, number>>;
  iterations: number;
  forcedAccepts: number;
  pointCeilingReached: boolean;
  iterationCeilingReached: boolean;
  lowConfidence: boolean;
}

/** What a single strategy run reports back to the dispatcher. */
export interface StrategyOutcome {
  samples: RawSample[];
  iterations: number;
  forcedAccepts: number;
  pointCeilingReached: boolean;
  iterationCeilingReached: boolean;
}

export interface SampleResult {
  samples: RawSample[];
  diagnostics: SamplingDiagnostics;
}

/**
 * A curve as seen by the strategies: a guarded probe from the walked
 * parameter to a plot point, plus the geometry used for jump and error
 * measurement. Function graphs compare y only; parametric curves use the
 * planar distance.
 */
export interface CurveProbe {
  readonly planar: boolean;
  at(parameter: number): SamplePoint | undefined;
}

export function isBreak(sample: RawSample): sample is BreakMarker {
  return sample === BREAK;
}
