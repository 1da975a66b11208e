// Sampler module exports

export {
  sample,
  sampleDetailed,
  sampleDense,
  sampleWarped,
  sampleAdaptive,
  sampleParametric,
  sampleParametricDetailed,
  samplePolar,
  samplePolarDetailed,
  polarToParametric
} from './sampler.js';
export { assemble, normalizeSequence } from './segment-assembler.js';
export { guardEvaluate, guardEvaluatePair } from './evaluator-guard.js';
export type { GuardOptions } from './evaluator-guard.js';
export { resolveSamplingConfig, DEFAULT_SAMPLE_COUNT } from './config.js';
export { SamplerContractError, isSamplerContractError } from './errors.js';
export type { SamplerErrorCode } from './errors.js';
export { BREAK, isBreak } from './types.js';
export type {
  SamplePoint,
  BreakMarker,
  RawSample,
  Polyline,
  Domain,
  SamplingStrategy,
  SamplingOptions,
  SamplingConfig,
  SamplingDiagnostics,
  SampleResult,
  Evaluable,
  ParametricEvaluable,
  GuardResult,
  InvalidReason,
  WarpKind
} from './types.js';
