import { ExpressionError, compileExpression } from '../../src/expression.js';

describe('compileExpression', () => {
  test('should evaluate the expression with bound parameters', () => {
    const f = compileExpression('a * x^2', 'x', { a: 2 });
    expect(f(3)).toBe(18);
  });

  test('should provide ln as the natural logarithm', () => {
    const f = compileExpression('ln(x)', 'x');
    expect(f(Math.E)).toBeCloseTo(1, 12);
  });

  test('should return Infinity rather than throw on division by zero', () => {
    expect(compileExpression('1 / x', 'x')(0)).toBe(Infinity);
  });

  test('should return a non-number for a complex result', () => {
    expect(typeof compileExpression('sqrt(x)', 'x')(-1)).not.toBe('number');
  });

  test('should evaluate in the named curve variable', () => {
    expect(compileExpression('cos(theta)', 'theta')(0)).toBe(1);
  });

  test('should throw ExpressionError carrying the gate issues', () => {
    expect(() => compileExpression('y + 1', 'x')).toThrow(ExpressionError);

    try {
      compileExpression('y + 1', 'x');
    } catch (error) {
      expect(error instanceof ExpressionError && error.issues[0].code).toBe('E-EXPR-UNKNOWN-SYMBOL');
    }
  });

  test('should not let a parameter shadow the curve variable', () => {
    const f = compileExpression('x + 1', 'x', { x: 100 });
    expect(f(1)).toBe(2);
  });
});
