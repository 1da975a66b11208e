import { create, all } from 'mathjs';
import type { EvalFunction } from 'mathjs';
import type { Evaluable } from '../../../sampler/src/index.js';
import { PlotExpressionValidationGate } from '../../../validators/src/expression-validator.js';
import type { ValidationIssue } from '../../../validators/src/validation-gate.js';

const math = create(all, { matrix: 'Array' });

const expressionGate = new PlotExpressionValidationGate();

/** Names available to every plot expression beyond mathjs built-ins. */
const EXTRA_FUNCTIONS = {
  ln: (value: number) => Math.log(value)
};

export class ExpressionError extends Error {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(message);
    this.name = 'ExpressionError';
    this.issues = issues;
  }
}

/**
 * Validate `expr` and compile it into a callable of one curve variable.
 * Parameters are bound once; the returned function does not mutate them.
 *
 * @throws ExpressionError when the expression fails validation
 */
export function compileExpression(expr: string, variable: string, params: Record<string, number> = {}): Evaluable {
  const result = expressionGate.check({
    expr,
    variables: [variable],
    params: Object.keys(params)
  });
  if (!result.valid) {
    const issues = result.errors ?? [];
    throw new ExpressionError(issues[0]?.message ?? `Invalid expression: ${expr}`, issues);
  }

  const code: EvalFunction = math.compile(expr);
  const bound = { ...EXTRA_FUNCTIONS, ...params };
  return (value: number) => code.evaluate({ ...bound, [variable]: value });
}
