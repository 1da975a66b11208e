import { resolveSamplingConfig } from './config.js';
import { EvaluationTally, createFunctionProbe, createParametricProbe } from './evaluator-guard.js';
import { sampleDenseProbe } from './dense-sampler.js';
import { sampleWarpedProbe } from './warped-sampler.js';
import { sampleAdaptiveProbe } from './adaptive-sampler.js';
import { normalizeSequence } from './segment-assembler.js';
import type {
  CurveProbe,
  Domain,
  Evaluable,
  ParametricEvaluable,
  RawSample,
  SampleResult,
  SamplingConfig,
  SamplingOptions,
  SamplingStrategy,
  StrategyOutcome
} from './types.js';

type StrategyRunner = (probe: CurveProbe, domain: Domain, config: SamplingConfig) => StrategyOutcome;

const STRATEGIES: Record<SamplingStrategy, StrategyRunner> = {
  dense: sampleDenseProbe,
  warped: sampleWarpedProbe,
  adaptive: sampleAdaptiveProbe
};

function run(probe: CurveProbe, tally: EvaluationTally, domain: Domain, config: SamplingConfig): SampleResult {
  const outcome = STRATEGIES[config.strategy](probe, domain, config);
  return {
    samples: normalizeSequence(outcome.samples),
    diagnostics: {
      strategy: config.strategy,
      evaluations: tally.evaluations,
      invalidEvaluations: { ...tally.invalid },
      iterations: outcome.iterations,
      forcedAccepts: outcome.forcedAccepts,
      pointCeilingReached: outcome.pointCeilingReached,
      iterationCeilingReached: outcome.iterationCeilingReached,
      lowConfidence: outcome.forcedAccepts > 0 || outcome.pointCeilingReached || outcome.iterationCeilingReached
    }
  };
}

/**
 * Sample `f` over `domain` and report how the run went.
 *
 * @throws SamplerContractError for a malformed domain or configuration.
 */
export function sampleDetailed(f: Evaluable, domain: Domain, options: SamplingOptions = {}): SampleResult {
  const config = resolveSamplingConfig(domain, options);
  const tally = new EvaluationTally();
  return run(createFunctionProbe(f, config, tally), tally, domain, config);
}

export function sample(f: Evaluable, domain: Domain, options: SamplingOptions = {}): RawSample[] {
  return sampleDetailed(f, domain, options).samples;
}

export function sampleDense(f: Evaluable, domain: Domain, options: SamplingOptions = {}): RawSample[] {
  return sample(f, domain, { ...options, strategy: 'dense' });
}

export function sampleWarped(f: Evaluable, domain: Domain, options: SamplingOptions = {}): RawSample[] {
  return sample(f, domain, { ...options, strategy: 'warped' });
}

export function sampleAdaptive(f: Evaluable, domain: Domain, options: SamplingOptions = {}): RawSample[] {
  return sample(f, domain, { ...options, strategy: 'adaptive' });
}

/**
 * Sample a curve `t -> [x, y]`. Points carry `t` as their third element,
 * and every strategy walks (or warps) the parameter rather than x.
 */
export function sampleParametricDetailed(f: ParametricEvaluable, domain: Domain, options: SamplingOptions = {}): SampleResult {
  const config = resolveSamplingConfig(domain, options);
  const tally = new EvaluationTally();
  return run(createParametricProbe(f, config, tally), tally, domain, config);
}

export function sampleParametric(f: ParametricEvaluable, domain: Domain, options: SamplingOptions = {}): RawSample[] {
  return sampleParametricDetailed(f, domain, options).samples;
}

/**
 * Compose `r(theta)` into the planar curve `(r cos theta, r sin theta)`.
 * A non-numeric radius is passed through so the guard rejects it.
 */
export function polarToParametric(r: Evaluable): ParametricEvaluable {
  return (theta: number) => {
    const radius = r(theta);
    if (typeof radius !== 'number') return [radius, radius];
    return [radius * Math.cos(theta), radius * Math.sin(theta)];
  };
}

export function samplePolarDetailed(r: Evaluable, domain: Domain, options: SamplingOptions = {}): SampleResult {
  return sampleParametricDetailed(polarToParametric(r), domain, options);
}

export function samplePolar(r: Evaluable, domain: Domain, options: SamplingOptions = {}): RawSample[] {
  return samplePolarDetailed(r, domain, options).samples;
}
