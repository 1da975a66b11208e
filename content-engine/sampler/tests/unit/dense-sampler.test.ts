import { sampleDense, sampleDetailed } from '../../src/sampler.js';
import { assemble } from '../../src/segment-assembler.js';
import { gridPosition } from '../../src/dense-sampler.js';

describe('gridPosition', () => {
  test('should hit both bounds and the midpoint of a symmetric domain exactly', () => {
    const domain = { min: -1, max: 1 };
    expect(gridPosition(domain, 0, 200)).toBe(-1);
    expect(gridPosition(domain, 100, 200)).toBe(0);
    expect(gridPosition(domain, 200, 200)).toBe(1);
  });
});

describe('dense sampling', () => {
  test('should sample a parabola on an even grid', () => {
    const samples = sampleDense(x => x * x, { min: -2, max: 2 }, { samples: 4 });

    expect(samples).toEqual([
      [-2, 4],
      [-1, 1],
      [0, 0],
      [1, 1],
      [2, 4]
    ]);
  });

  test('should split 1/x at the pole into exactly two polylines', () => {
    const samples = sampleDense(x => 1 / x, { min: -1, max: 1 }, { samples: 200 });
    const polylines = assemble(samples);

    expect(polylines).toHaveLength(2);
    expect(polylines[0]).toHaveLength(100);
    expect(polylines[1]).toHaveLength(100);
    expect(polylines[0].every(p => p[0] < 0)).toBe(true);
    expect(polylines[1].every(p => p[0] > 0)).toBe(true);
  });

  test('should not start the sequence with a break', () => {
    const samples = sampleDense(x => (x < 0 ? NaN : x), { min: -1, max: 1 }, { samples: 4 });

    expect(samples).toEqual([
      [0, 0],
      [0.5, 0.5],
      [1, 1]
    ]);
  });

  test('should collapse a run of invalid values into one break', () => {
    const samples = sampleDense(x => (Math.abs(x) < 0.6 ? NaN : x), { min: -1, max: 1 }, { samples: 4 });

    expect(samples).toEqual([[-1, -1], null, [1, 1]]);
  });

  test('should break before a jump discontinuity', () => {
    const samples = sampleDense(x => (x < 0 ? 0 : 5), { min: -1, max: 1 }, { samples: 4 });

    expect(samples).toEqual([[-1, 0], [-0.5, 0], null, [0, 5], [0.5, 5], [1, 5]]);
  });

  test('should stop at the point ceiling and report it', () => {
    const result = sampleDetailed(x => x, { min: 0, max: 10 }, { strategy: 'dense', samples: 10, maxPoints: 3 });

    expect(result.samples).toEqual([
      [0, 0],
      [1, 1],
      [2, 2]
    ]);
    expect(result.diagnostics.pointCeilingReached).toBe(true);
    expect(result.diagnostics.lowConfidence).toBe(true);
  });

  test('should stop at the iteration ceiling even when every value is invalid', () => {
    const result = sampleDetailed(() => NaN, { min: 0, max: 1 }, { strategy: 'dense', samples: 1000, maxIterations: 10 });

    expect(result.samples).toEqual([]);
    expect(result.diagnostics.iterations).toBe(10);
    expect(result.diagnostics.evaluations).toBe(10);
    expect(result.diagnostics.iterationCeilingReached).toBe(true);
    expect(result.diagnostics.lowConfidence).toBe(true);
  });

  test('should keep the points sampled before the iteration ceiling', () => {
    const result = sampleDetailed(x => x, { min: 0, max: 1 }, { strategy: 'dense', samples: 10, maxIterations: 3 });

    expect(result.samples).toEqual([
      [0, 0],
      [0.1, 0.1],
      [0.2, 0.2]
    ]);
    expect(result.diagnostics.iterationCeilingReached).toBe(true);
  });
});
