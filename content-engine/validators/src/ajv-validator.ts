import { readFileSync } from 'node:fs';
import path from 'node:path';
import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { AnySchemaObject, ErrorObject, ValidateFunction } from 'ajv';
import { BaseValidationGate, ValidationResult } from './validation-gate.js';

export const PLOT_SPEC_SCHEMA_ID = 'plotspec.schema.json';

export interface SchemaCheckInput {
  data: unknown;
  schemaId: string;
}

export interface FormattedSchemaError {
  path: string;
  message: string;
  constraint: Record<string, unknown>;
}

/**
 * G1: AJV Schema Validation Gate
 * Validates JSON objects against their JSON Schema definitions
 */
export class AjvValidationGate extends BaseValidationGate<SchemaCheckInput, { schemaId: string }> {
  readonly name = "AJV Schema Validator";
  readonly gateNumber = "G1";
  readonly description = "Validates JSON objects against JSON Schema with strict validation rules";

  private ajv: Ajv2020;
  private schemas: Set<string> = new Set();

  constructor() {
    super();
    this.ajv = new Ajv2020({
      strict: true,
      allErrors: true,
      removeAdditional: false,
      useDefaults: false,
      coerceTypes: false
    });
    addFormats(this.ajv);
  }

  /**
   * Register a schema for validation
   */
  registerSchema(schemaId: string, schema: AnySchemaObject): void {
    if (this.schemas.has(schemaId)) return;
    this.schemas.add(schemaId);
    this.ajv.addSchema(schema, schemaId);
  }

  hasSchema(schemaId: string): boolean {
    return this.schemas.has(schemaId);
  }

  /**
   * Type guard form of `check`, for callers that go on to use the data
   */
  matches<T>(schemaId: string, data: unknown): data is T {
    const compiled = this.compile(schemaId);
    return !(compiled instanceof Error) && compiled !== undefined && compiled(data) === true;
  }

  async validate(input: SchemaCheckInput): Promise<ValidationResult<{ schemaId: string }>> {
    return this.check(input);
  }

  /**
   * Validate object against a registered schema
   */
  check(input: SchemaCheckInput): ValidationResult<{ schemaId: string }> {
    const { data, schemaId } = input;

    if (!this.schemas.has(schemaId)) {
      return this.createError(
        'E-G1-SCHEMA-NOT-FOUND',
        `Schema not found: ${schemaId}`,
        { schemaId, availableSchemas: Array.from(this.schemas) }
      );
    }

    const validate = this.compile(schemaId);
    if (validate instanceof Error) {
      return this.createError(
        'E-G1-SCHEMA-COMPILE',
        `Schema failed to compile: ${schemaId}`,
        { schemaId, error: validate.message }
      );
    }
    if (!validate) {
      return this.createError(
        'E-G1-VALIDATOR-NOT-FOUND',
        `Validator not compiled for schema: ${schemaId}`,
        { schemaId }
      );
    }

    if (!validate(data)) {
      return this.createError(
        'E-G1-SCHEMA-VALIDATION',
        'Object does not conform to schema',
        {
          schemaId,
          errors: this.formatAjvErrors(validate.errors ?? [])
        }
      );
    }

    return this.createSuccess({ schemaId });
  }

  /**
   * Compile (or fetch the cached) validator. Ajv compiles lazily and throws
   * on strict-mode violations, so the error is returned instead.
   */
  private compile(schemaId: string): ValidateFunction | Error | undefined {
    try {
      return this.ajv.getSchema(schemaId);
    } catch (error) {
      return error instanceof Error ? error : new Error(String(error));
    }
  }

  /**
   * Format AJV errors for better readability
   */
  private formatAjvErrors(errors: ErrorObject[]): FormattedSchemaError[] {
    return errors.map(error => ({
      path: error.instancePath || 'root',
      message: error.message || 'Unknown validation error',
      constraint: error.params
    }));
  }
}

function isSchemaObject(value: unknown): value is AnySchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a schema file; relative directories resolve against the working directory
 */
export function loadSchema(fileName: string, schemaDir: string = 'schema'): AnySchemaObject {
  const parsed: unknown = JSON.parse(readFileSync(path.resolve(schemaDir, fileName), 'utf8'));
  if (!isSchemaObject(parsed)) {
    throw new Error(`Schema ${fileName} is not a JSON object`);
  }
  return parsed;
}

/**
 * Gate with the PlotSpec schema already registered.
 */
export function createPlotSpecGate(schemaDir?: string): AjvValidationGate {
  const gate = new AjvValidationGate();
  gate.registerSchema(PLOT_SPEC_SCHEMA_ID, loadSchema(PLOT_SPEC_SCHEMA_ID, schemaDir));
  return gate;
}
