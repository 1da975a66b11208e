export type SamplerErrorCode = 'E-SAMPLER-DOMAIN' | 'E-SAMPLER-CONFIG';

/**
 * Raised only for malformed calls (bad domain, bad configuration).
 * Misbehaving user functions never produce this error.
 */
export class SamplerContractError extends Error {
  readonly code: SamplerErrorCode;
  readonly data?: Record<string, unknown>;

  constructor(code: SamplerErrorCode, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'SamplerContractError';
    this.code = code;
    this.data = data;
  }
}

export function isSamplerContractError(error: unknown): error is SamplerContractError {
  return error instanceof SamplerContractError;
}
