import { PlotCompiler } from '../../src/plot-compiler.js';
import { createLogger } from '../../../../utils/logger.js';
import type { LogLevel } from '../../../../utils/logger.js';

interface CapturedLine {
  level: LogLevel;
  entry: { level: string; correlationId?: string; message: string; data?: Record<string, unknown> };
}

function createCompiler(optimizeSvg = false) {
  const lines: CapturedLine[] = [];
  const logger = createLogger('plot-compiler', 'debug', (line, level) => {
    lines.push({ level, entry: JSON.parse(line) });
  });
  const compiler = new PlotCompiler({
    config: { width: 200, height: 100, sampleCount: 200, theme: 'light', optimizeSvg },
    logger
  });
  return { compiler, lines };
}

const unitAxes = { x: { min: -1, max: 1 }, y: { min: -1, max: 1 } };

describe('PlotCompiler', () => {
  describe('function plots', () => {
    test('should render a sampled parabola as one path', async () => {
      const { compiler } = createCompiler();
      const result = await compiler.compile({
        kind: 'function',
        expr: 'x^2',
        x: { min: -2, max: 2 },
        y: { min: 0, max: 4 },
        sampling: { strategy: 'dense', samples: 4 }
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.svg).toContain('<path d="M0 0 L50 75 L100 100 L150 75 L200 0"/>');
      expect(result.metadata.kind).toBe('function');
      expect(result.metadata.polylines).toBe(1);
      expect(result.metadata.points).toBe(5);
      expect(result.metadata.contentHash).toMatch(/^[0-9a-f]{16}$/);
    });

    test('should draw 1/x as two separate branches', async () => {
      const { compiler } = createCompiler();
      const result = await compiler.compile({
        kind: 'function',
        expr: '1 / x',
        x: { min: -1, max: 1 },
        y: { min: -10, max: 10 },
        sampling: { strategy: 'dense' }
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.metadata.polylines).toBe(2);
      expect(result.svg.match(/<path /g)).toHaveLength(2);
      expect(result.metadata.diagnostics.invalidEvaluations).toEqual({ infinite: 1 });
    });

    test('should leave out points where the expression turns complex', async () => {
      const { compiler } = createCompiler();
      const result = await compiler.compile({
        kind: 'function',
        expr: 'sqrt(x)',
        ...unitAxes,
        sampling: { strategy: 'dense', samples: 4 }
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.metadata.points).toBe(3);
      expect(result.metadata.diagnostics.invalidEvaluations).toEqual({ 'non-numeric': 2 });
    });

    test('should bind parameters into the expression', async () => {
      const { compiler } = createCompiler();
      const result = await compiler.compile({
        kind: 'function',
        expr: 'a * x',
        params: { a: 0.5 },
        x: { min: -2, max: 2 },
        y: { min: -1, max: 1 },
        sampling: { strategy: 'dense', samples: 2 }
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.svg).toContain('<path d="M0 100 L100 50 L200 0"/>');
    });
  });

  describe('parametric and polar plots', () => {
    test('should render a closed circle as a single path', async () => {
      const { compiler } = createCompiler();
      const result = await compiler.compile({
        kind: 'parametric',
        exprX: 'cos(t)',
        exprY: 'sin(t)',
        domain: { min: 0, max: 6.283185307179586 },
        ...unitAxes
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.metadata.kind).toBe('parametric');
      expect(result.metadata.polylines).toBe(1);
      expect(result.metadata.diagnostics.strategy).toBe('adaptive');
    });

    test('should default the polar domain to a full turn', async () => {
      const { compiler } = createCompiler();
      const result = await compiler.compile({
        kind: 'polar',
        expr: 'cos(2 * theta)',
        ...unitAxes,
        sampling: { strategy: 'dense', samples: 100 }
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.metadata.points).toBe(101);
      expect(result.metadata.diagnostics.evaluations).toBe(101);
    });
  });

  describe('failures', () => {
    test('should report schema violations with the gate issues', async () => {
      const { compiler, lines } = createCompiler();
      const result = await compiler.compile({ kind: 'function', ...unitAxes }, 'test-1');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('E-PLOT-SCHEMA');
      expect(result.error.context.correlationId).toBe('test-1');
      expect(result.error.context.issues?.[0]?.code).toBe('E-G1-SCHEMA-VALIDATION');

      const failure = lines.find(line => line.level === 'error');
      expect(failure?.entry.correlationId).toBe('test-1');
      expect(failure?.entry.data).toEqual({ code: 'E-PLOT-SCHEMA', message: 'Plot specification does not conform to schema' });
    });

    test('should reject an empty axis range', async () => {
      const { compiler } = createCompiler();
      const result = await compiler.compile({ kind: 'function', expr: 'x', x: { min: 1, max: 1 }, y: { min: 0, max: 1 } });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('E-PLOT-SCHEMA');
      expect(result.error.message).toBe('Axis x must have min < max');
    });

    test('should report expression errors', async () => {
      const { compiler } = createCompiler();
      const unknownSymbol = await compiler.compile({ kind: 'function', expr: 'y + 1', ...unitAxes });
      const forbidden = await compiler.compile({ kind: 'function', expr: 'import("fs")', ...unitAxes });

      expect(unknownSymbol.success || unknownSymbol.error.code).toBe('E-PLOT-EXPRESSION');
      expect(forbidden.success || forbidden.error.code).toBe('E-PLOT-EXPRESSION');
      if (forbidden.success) return;
      expect(forbidden.error.context.issues?.[0]?.code).toBe('E-EXPR-FORBIDDEN');
    });

    test('should report sampling contract errors', async () => {
      const { compiler } = createCompiler();
      const result = await compiler.compile({
        kind: 'function',
        expr: 'x',
        ...unitAxes,
        sampling: { minStep: 1, maxStep: 0.5 }
      });

      expect(result.success || result.error.code).toBe('E-PLOT-SAMPLING');
    });

    test('should never throw for non-object input', async () => {
      const { compiler } = createCompiler();

      await expect(compiler.compile('not a plot')).resolves.toMatchObject({ success: false });
      await expect(compiler.compile(null)).resolves.toMatchObject({ success: false });
    });
  });

  describe('logging and output', () => {
    test('should warn when sampling stops at a ceiling', async () => {
      const { compiler, lines } = createCompiler();
      const result = await compiler.compile({
        kind: 'function',
        expr: 'x',
        ...unitAxes,
        sampling: { strategy: 'dense', samples: 100, maxPoints: 10 }
      });

      expect(result.success).toBe(true);
      const warning = lines.find(line => line.level === 'warn');
      expect(warning?.entry.message).toBe('Sampling degraded before reaching full precision');
      expect(warning?.entry.data?.pointCeilingReached).toBe(true);
    });

    test('should produce the same hash for the same spec', async () => {
      const { compiler } = createCompiler();
      const spec = { kind: 'function', expr: 'sin(x)', ...unitAxes };
      const first = await compiler.compile(spec);
      const second = await compiler.compile(spec);

      expect(first.success && second.success).toBe(true);
      if (!first.success || !second.success) return;
      expect(first.metadata.contentHash).toBe(second.metadata.contentHash);
      expect(first.svg).toBe(second.svg);
    });

    test('should optimize the SVG when enabled', async () => {
      const { compiler } = createCompiler(true);
      const result = await compiler.compile({ kind: 'function', expr: 'sin(x)', ...unitAxes });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.svg.startsWith('<svg')).toBe(true);
      expect(result.svg).toContain('<path');
      expect(result.svg).not.toContain('\n');
    });
  });
});
