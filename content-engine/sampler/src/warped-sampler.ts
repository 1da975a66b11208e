import { SequenceBuilder } from './sequence-builder.js';
import type { CurveProbe, Domain, SamplePoint, SamplingConfig, StrategyOutcome, WarpKind } from './types.js';

const TANH_SHARPNESS = 4;

/**
 * Warps map [-1, 1] onto [-1, 1], fixing the endpoints and flattening out
 * around 0 so that evenly spaced inputs crowd together near the center.
 */
export const WARPS: Record<WarpKind, (u: number) => number> = {
  cubic: u => u * u * u,
  tanh: u => {
    const k = TANH_SHARPNESS;
    return (u - Math.tanh(k * u) / k) / (1 - Math.tanh(k) / k);
  }
};

export function warpedPosition(domain: Domain, center: number, warp: WarpKind, t: number): number {
  const reach = Math.max(center - domain.min, domain.max - center);
  const position = center + WARPS[warp](2 * t - 1) * reach;
  return Math.min(domain.max, Math.max(domain.min, position));
}

interface Evaluation {
  parameter: number;
  point: SamplePoint | undefined;
}

/**
 * Sampling concentrated around `config.center`. Clamping makes the
 * evaluation order unreliable, so evaluations are sorted by parameter and
 * breaks are decided only after sorting.
 */
export function sampleWarpedProbe(probe: CurveProbe, domain: Domain, config: SamplingConfig): StrategyOutcome {
  const n = config.samples;
  const evaluations: Evaluation[] = [];
  let iterationCeilingReached = false;

  for (let i = 0; i <= n; i++) {
    if (evaluations.length >= config.maxIterations) {
      iterationCeilingReached = true;
      break;
    }
    const parameter = warpedPosition(domain, config.center, config.warp, i / n);
    evaluations.push({ parameter, point: probe.at(parameter) });
  }

  evaluations.sort((a, b) => a.parameter - b.parameter);

  const builder = new SequenceBuilder(config, probe.planar);
  let previous: number | undefined;
  let truncated = false;

  for (const evaluation of evaluations) {
    // Clamped positions repeat at the domain edges.
    if (evaluation.parameter === previous) continue;
    previous = evaluation.parameter;

    if (builder.full) {
      truncated = true;
      break;
    }
    if (evaluation.point === undefined) {
      builder.markBreak();
    } else {
      builder.push(evaluation.point);
    }
  }

  return {
    samples: builder.finish(),
    iterations: evaluations.length,
    forcedAccepts: 0,
    pointCeilingReached: truncated,
    iterationCeilingReached
  };
}
