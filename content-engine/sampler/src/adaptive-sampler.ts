import { SequenceBuilder } from './sequence-builder.js';
import type { CurveProbe, Domain, SamplePoint, SamplingConfig, StrategyOutcome } from './types.js';

/** Smallest magnitude used to normalize relative error. */
const RELATIVE_FLOOR = 1e-3;

/** Steps whose error falls below tolerance / GROWTH_MARGIN are grown. */
const GROWTH_MARGIN = 4;

function magnitude(p: SamplePoint, planar: boolean): number {
  return planar ? Math.hypot(p[0], p[1]) : Math.abs(p[1]);
}

/**
 * Deviation of the probed midpoint from the chord joining the endpoints.
 *
 * For a function graph sampled with step h this is h/4 times the slope
 * discrepancy |slope(mid, b) - slope(a, mid)|, so the two measures agree up
 * to the step length; the chordal form keeps tolerance in output units.
 *
 * With `relative` set, the error is scaled up where the curve is small, so a
 * low-amplitude oscillation still registers as curvature.
 */
export function chordalError(a: SamplePoint, mid: SamplePoint, b: SamplePoint, planar: boolean, relative: boolean): number {
  const dy = mid[1] - (a[1] + b[1]) / 2;
  const error = planar ? Math.hypot(mid[0] - (a[0] + b[0]) / 2, dy) : Math.abs(dy);
  if (!relative) return error;

  const scale = Math.max(magnitude(a, planar), magnitude(mid, planar), magnitude(b, planar));
  return error / Math.max(Math.min(scale, 1), RELATIVE_FLOOR);
}

export function clampStep(h: number, config: Pick<SamplingConfig, 'minStep' | 'maxStep'>): number {
  return Math.min(config.maxStep, Math.max(config.minStep, h));
}

/**
 * Left-to-right walk with a variable step. Each attempt probes the
 * midpoint of the proposed step; steps whose chordal error exceeds the
 * tolerance are halved and retried until the refinement limit or the
 * minimum step is hit, after which the step is accepted as is.
 *
 * Termination rests on three ceilings: the domain end, `maxPoints` emitted
 * points and `maxIterations` attempts.
 */
export function sampleAdaptiveProbe(probe: CurveProbe, domain: Domain, config: SamplingConfig): StrategyOutcome {
  const builder = new SequenceBuilder(config, probe.planar);

  let x = domain.min;
  let current = probe.at(x);
  if (current !== undefined) builder.push(current);

  let h = clampStep((domain.max - domain.min) / config.samples, config);
  let refinements = 0;
  let iterations = 0;
  let forcedAccepts = 0;
  let pointCeilingReached = false;
  let iterationCeilingReached = false;

  while (x < domain.max) {
    if (builder.full) {
      pointCeilingReached = true;
      break;
    }
    if (iterations >= config.maxIterations) {
      iterationCeilingReached = true;
      break;
    }
    iterations++;

    h = clampStep(h, config);
    const step = Math.min(h, domain.max - x);
    const xNext = x + step >= domain.max ? domain.max : x + step;

    const next = probe.at(xNext);
    if (next === undefined) {
      // Step over the singularity; the next attempt starts from the far side.
      builder.markBreak();
      x = xNext;
      current = undefined;
      refinements = 0;
      continue;
    }

    if (current === undefined) {
      builder.push(next);
      x = xNext;
      current = next;
      refinements = 0;
      continue;
    }

    const mid = probe.at(x + step / 2);
    if (mid === undefined) {
      builder.markBreak();
      builder.push(next);
      x = xNext;
      current = next;
      refinements = 0;
      continue;
    }

    const error = chordalError(current, mid, next, probe.planar, config.relativeError);
    if (error > config.tolerance && step > config.minStep && refinements < config.refinementLimit) {
      h = step / 2;
      refinements++;
      continue;
    }

    if (error > config.tolerance) forcedAccepts++;
    builder.push(mid);
    builder.push(next);
    x = xNext;
    current = next;
    refinements = 0;
    if (error < config.tolerance / GROWTH_MARGIN) {
      h *= config.growthFactor;
    }
  }

  return {
    samples: builder.finish(),
    iterations,
    forcedAccepts,
    pointCeilingReached,
    iterationCeilingReached
  };
}
