import { SequenceBuilder } from './sequence-builder.js';
import type { CurveProbe, Domain, SamplingConfig, StrategyOutcome } from './types.js';

/**
 * Position of grid index i out of n across the domain. Computed from the
 * ratio so that symmetric domains hit 0 exactly at the midpoint.
 */
export function gridPosition(domain: Domain, i: number, n: number): number {
  if (i === n) return domain.max;
  return domain.min + (i / n) * (domain.max - domain.min);
}

/**
 * Uniform sampling at `samples + 1` grid positions. Invalid values and jumps
 * become break markers; scanning continues to the end of the domain unless
 * the point or iteration ceiling stops it first.
 */
export function sampleDenseProbe(probe: CurveProbe, domain: Domain, config: SamplingConfig): StrategyOutcome {
  const n = config.samples;
  const builder = new SequenceBuilder(config, probe.planar);
  let iterations = 0;
  let truncated = false;
  let iterationCeilingReached = false;

  for (let i = 0; i <= n; i++) {
    if (builder.full) {
      truncated = true;
      break;
    }
    if (iterations >= config.maxIterations) {
      iterationCeilingReached = true;
      break;
    }
    iterations++;
    const point = probe.at(gridPosition(domain, i, n));
    if (point === undefined) {
      builder.markBreak();
    } else {
      builder.push(point);
    }
  }

  return {
    samples: builder.finish(),
    iterations,
    forcedAccepts: 0,
    pointCeilingReached: truncated,
    iterationCeilingReached
  };
}
