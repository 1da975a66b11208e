import { z } from 'zod';
import { SamplerContractError } from './errors.js';
import type { Domain, SamplingConfig, SamplingOptions } from './types.js';

/**
 * Default sample count, matching the document build's render sample count.
 */
export const DEFAULT_SAMPLE_COUNT = 1000;

const positiveInt = z.number().int().positive();
const positiveFinite = z.number().positive().finite();

export const SamplingOptionsSchema = z
  .object({
    strategy: z.enum(['dense', 'warped', 'adaptive']),
    samples: positiveInt,
    minStep: positiveFinite,
    maxStep: positiveFinite,
    tolerance: positiveFinite,
    relativeError: z.boolean(),
    refinementLimit: positiveInt,
    maxPoints: positiveInt,
    maxIterations: positiveInt,
    growthFactor: z.number().finite().gt(1),
    center: z.number().finite(),
    warp: z.enum(['cubic', 'tanh']),
    jumpThreshold: z.number().nonnegative().finite(),
    jumpRatio: z.number().nonnegative().finite(),
    magnitudeCeiling: positiveFinite,
    zeroEpsilon: z.number().nonnegative().finite()
  })
  .partial()
  .strict();

export function validateDomain(domain: Domain): void {
  if (!Number.isFinite(domain.min) || !Number.isFinite(domain.max)) {
    throw new SamplerContractError('E-SAMPLER-DOMAIN', 'Domain bounds must be finite numbers', {
      min: domain.min,
      max: domain.max
    });
  }
  if (domain.min >= domain.max) {
    throw new SamplerContractError('E-SAMPLER-DOMAIN', `Domain min (${domain.min}) must be less than max (${domain.max})`, {
      min: domain.min,
      max: domain.max
    });
  }
}

/**
 * Validate caller options and fill in domain-dependent defaults.
 */
export function resolveSamplingConfig(domain: Domain, options: SamplingOptions = {}): SamplingConfig {
  validateDomain(domain);

  const parsed = SamplingOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new SamplerContractError('E-SAMPLER-CONFIG', 'Invalid sampling configuration', {
      issues: parsed.error.issues.map(issue => ({
        path: issue.path.join('.') || 'root',
        message: issue.message
      }))
    });
  }

  const span = domain.max - domain.min;
  const given = parsed.data;

  const config: SamplingConfig = {
    strategy: given.strategy ?? 'adaptive',
    samples: given.samples ?? DEFAULT_SAMPLE_COUNT,
    minStep: given.minStep ?? span * 1e-6,
    maxStep: given.maxStep ?? span / 20,
    tolerance: given.tolerance ?? 0.01,
    relativeError: given.relativeError ?? true,
    refinementLimit: given.refinementLimit ?? 12,
    maxPoints: given.maxPoints ?? 10000,
    maxIterations: given.maxIterations ?? 100000,
    growthFactor: given.growthFactor ?? 1.5,
    center: Math.min(domain.max, Math.max(domain.min, given.center ?? 0)),
    warp: given.warp ?? 'cubic',
    jumpThreshold: given.jumpThreshold ?? 2.0,
    jumpRatio: given.jumpRatio ?? 0.8,
    magnitudeCeiling: given.magnitudeCeiling ?? 1e6,
    zeroEpsilon: given.zeroEpsilon ?? 0
  };

  if (config.minStep > config.maxStep) {
    throw new SamplerContractError('E-SAMPLER-CONFIG', `minStep (${config.minStep}) must not exceed maxStep (${config.maxStep})`, {
      minStep: config.minStep,
      maxStep: config.maxStep
    });
  }

  return config;
}
