import { create, all } from 'mathjs';
import type { MathNode } from 'mathjs';
import { BaseValidationGate, ValidationResult } from './validation-gate.js';

const math = create(all, { matrix: 'Array' });

/** Functions a plot expression may call. `ln` is supplied by the compiler's scope. */
export const ALLOWED_FUNCTIONS: ReadonlySet<string> = new Set([
  'sin', 'cos', 'tan', 'asin', 'acos', 'atan', 'atan2',
  'sinh', 'cosh', 'tanh',
  'sqrt', 'cbrt', 'abs', 'exp', 'log', 'ln', 'log10',
  'floor', 'ceil', 'round', 'sign', 'min', 'max', 'mod'
]);

export const ALLOWED_CONSTANTS: ReadonlySet<string> = new Set(['pi', 'e']);

const ALLOWED_OPERATORS: ReadonlySet<string> = new Set([
  'add', 'subtract', 'multiply', 'divide', 'pow', 'mod',
  'unaryMinus', 'unaryPlus',
  'smaller', 'larger', 'smallerEq', 'largerEq', 'equal', 'unequal',
  'and', 'or', 'not'
]);

const ALLOWED_NODE_TYPES: ReadonlySet<string> = new Set([
  'ConstantNode', 'SymbolNode', 'OperatorNode', 'ParenthesisNode',
  'FunctionNode', 'ConditionalNode', 'RelationalNode'
]);

export interface ExpressionCheckInput {
  expr: string;
  /** Curve variables, e.g. ['x'] or ['t']. */
  variables: string[];
  params?: string[];
  maxComplexity?: number;
}

export interface ExpressionCheckData {
  expr: string;
  complexity: number;
  symbols: string[];
  functions: string[];
}

/**
 * G5: Plot Expression Validation Gate
 * Parses plot expressions with mathjs and admits only arithmetic, comparisons,
 * conditionals, whitelisted functions, constants, curve variables and parameters.
 */
export class PlotExpressionValidationGate extends BaseValidationGate<ExpressionCheckInput, ExpressionCheckData> {
  readonly name = "Plot Expression Validator";
  readonly gateNumber = "G5";
  readonly description = "Validates mathematical expressions for plot rendering safety";

  async validate(input: ExpressionCheckInput): Promise<ValidationResult<ExpressionCheckData>> {
    return this.check(input);
  }

  /**
   * Synchronous form of `validate`, for callers already inside a compile step.
   */
  check(input: ExpressionCheckInput): ValidationResult<ExpressionCheckData> {
    const { expr, variables, params = [], maxComplexity = 100 } = input;
    const cleanExpr = expr.trim();

    if (cleanExpr.length === 0) {
      return this.createError('E-EXPR-EMPTY', 'Plot expression cannot be empty', { expr });
    }

    let root: MathNode;
    try {
      root = math.parse(cleanExpr);
    } catch (error) {
      return this.createError('E-EXPR-SYNTAX', 'Invalid mathematical expression syntax', {
        expr: cleanExpr,
        error: error instanceof Error ? error.message : String(error)
      });
    }

    const known = new Set([...variables, ...params, ...ALLOWED_CONSTANTS]);
    const forbidden: string[] = [];
    const unknown = new Set<string>();
    const symbols = new Set<string>();
    const functions = new Set<string>();
    let complexity = 0;

    root.traverse((node: MathNode, path: string, parent: MathNode | null) => {
      if (!ALLOWED_NODE_TYPES.has(node.type)) {
        forbidden.push(node.type);
        return;
      }

      if (math.isFunctionNode(node)) {
        complexity += 3;
        if (!math.isSymbolNode(node.fn)) forbidden.push('computed function call');
        return;
      }

      if (math.isSymbolNode(node)) {
        if (path === 'fn' && parent !== null && math.isFunctionNode(parent)) {
          if (ALLOWED_FUNCTIONS.has(node.name)) functions.add(node.name);
          else forbidden.push(`function ${node.name}`);
          return;
        }
        complexity += 1;
        if (known.has(node.name)) symbols.add(node.name);
        else unknown.add(node.name);
        return;
      }

      if (math.isOperatorNode(node)) {
        complexity += 2;
        if (!ALLOWED_OPERATORS.has(node.fn)) forbidden.push(`operator ${node.op}`);
        return;
      }

      if (math.isConstantNode(node)) {
        complexity += 1;
        if (typeof node.value !== 'number') forbidden.push('non-numeric constant');
      }
    });

    if (forbidden.length > 0) {
      return this.createError('E-EXPR-FORBIDDEN', 'Expression contains forbidden constructs', {
        expr: cleanExpr,
        forbidden: [...new Set(forbidden)]
      });
    }

    if (unknown.size > 0) {
      return this.createError('E-EXPR-UNKNOWN-SYMBOL', 'Expression references undefined symbols', {
        expr: cleanExpr,
        unknown: [...unknown],
        allowed: [...known]
      });
    }

    if (complexity > maxComplexity) {
      return this.createError('E-EXPR-COMPLEXITY', `Expression complexity ${complexity} exceeds maximum ${maxComplexity}`, {
        complexity,
        maxComplexity
      });
    }

    return this.createSuccess({
      expr: cleanExpr,
      complexity,
      symbols: [...symbols],
      functions: [...functions]
    });
  }
}
