import type {
  CurveProbe,
  Evaluable,
  GuardResult,
  InvalidReason,
  ParametricEvaluable,
  SamplePoint,
  SamplingConfig
} from './types.js';

export interface GuardOptions {
  magnitudeCeiling: number;
  zeroEpsilon: number;
}

function classify(value: unknown, magnitudeCeiling: number): GuardResult<number> {
  if (typeof value !== 'number') return { valid: false, reason: 'non-numeric' };
  if (Number.isNaN(value)) return { valid: false, reason: 'not-a-number' };
  if (!Number.isFinite(value)) return { valid: false, reason: 'infinite' };
  if (Math.abs(value) > magnitudeCeiling) return { valid: false, reason: 'overflow' };
  return { valid: true, value };
}

/**
 * Invoke a user function and classify its result. Never throws.
 */
export function guardEvaluate(f: Evaluable, input: number, options: GuardOptions): GuardResult<number> {
  if (Math.abs(input) < options.zeroEpsilon) {
    return { valid: false, reason: 'singular-input' };
  }

  let value: unknown;
  try {
    value = f(input);
  } catch {
    return { valid: false, reason: 'threw' };
  }
  return classify(value, options.magnitudeCeiling);
}

/**
 * Guard for `t -> [x, y]` curves. The near-zero input rule does not apply:
 * t = 0 is an ordinary parameter value for closed curves.
 */
export function guardEvaluatePair(
  f: ParametricEvaluable,
  t: number,
  options: Pick<GuardOptions, 'magnitudeCeiling'>
): GuardResult<readonly [number, number]> {
  let pair: readonly [unknown, unknown];
  try {
    pair = f(t);
  } catch {
    return { valid: false, reason: 'threw' };
  }
  if (!Array.isArray(pair) || pair.length < 2) {
    return { valid: false, reason: 'non-numeric' };
  }

  const x = classify(pair[0], options.magnitudeCeiling);
  if (!x.valid) return x;
  const y = classify(pair[1], options.magnitudeCeiling);
  if (!y.valid) return y;
  return { valid: true, value: [x.value, y.value] };
}

/**
 * Counts guarded evaluations for the diagnostics channel.
 */
export class EvaluationTally {
  evaluations = 0;
  readonly invalid: Partial<Record<InvalidReason, number>> = {};

  record<V>(result: GuardResult<V>): GuardResult<V> {
    this.evaluations++;
    if (!result.valid) {
      this.invalid[result.reason] = (this.invalid[result.reason] ?? 0) + 1;
    }
    return result;
  }
}

export function createFunctionProbe(f: Evaluable, config: SamplingConfig, tally: EvaluationTally): CurveProbe {
  return {
    planar: false,
    at(x: number): SamplePoint | undefined {
      const result = tally.record(guardEvaluate(f, x, config));
      return result.valid ? [x, result.value] : undefined;
    }
  };
}

export function createParametricProbe(f: ParametricEvaluable, config: SamplingConfig, tally: EvaluationTally): CurveProbe {
  return {
    planar: true,
    at(t: number): SamplePoint | undefined {
      const result = tally.record(guardEvaluatePair(f, t, config));
      return result.valid ? [result.value[0], result.value[1], t] : undefined;
    }
  };
}
