// Core validation gate interface and implementations

export interface ValidationIssue {
  code: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface ValidationResult<T = unknown> {
  valid: boolean;
  errors?: ValidationIssue[];
  data?: T;
}

export interface ValidationGate<TInput, TData = unknown> {
  readonly name: string;
  readonly gateNumber: string; // G1, G2, etc.
  readonly description: string;

  validate(input: TInput): Promise<ValidationResult<TData>>;
}

/**
 * Base class for all validation gates
 */
export abstract class BaseValidationGate<TInput, TData = unknown> implements ValidationGate<TInput, TData> {
  abstract readonly name: string;
  abstract readonly gateNumber: string;
  abstract readonly description: string;

  abstract validate(input: TInput): Promise<ValidationResult<TData>>;

  protected createError(code: string, message: string, data?: Record<string, unknown>): ValidationResult<TData> {
    return {
      valid: false,
      errors: [{ code, message, data }]
    };
  }

  protected createSuccess(data?: TData): ValidationResult<TData> {
    return {
      valid: true,
      data
    };
  }
}
