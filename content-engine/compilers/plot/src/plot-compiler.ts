import { createHash } from 'node:crypto';
import { optimize } from 'svgo';
import {
  assemble,
  isSamplerContractError,
  sampleDetailed,
  sampleParametricDetailed,
  samplePolarDetailed
} from '../../../sampler/src/index.js';
import type { Domain, SampleResult, SamplingDiagnostics, SamplingOptions } from '../../../sampler/src/index.js';
import { AjvValidationGate, PLOT_SPEC_SCHEMA_ID, createPlotSpecGate } from '../../../validators/src/ajv-validator.js';
import type { ValidationIssue } from '../../../validators/src/validation-gate.js';
import { Logger, createLogger, generateCorrelationId } from '../../../utils/logger.js';
import { createPlotTheme } from '../../../../shared/plot-theme.js';
import type { PlotTheme } from '../../../../shared/plot-theme.js';
import { configFromEnv } from '../../../../plot.config.js';
import type { PlotRendererConfig } from '../../../../plot.config.js';
import type { PlotSpec } from '../../../../types.js';
import { ExpressionError, compileExpression } from './expression.js';
import { renderPolylinesToSvg } from './svg-writer.js';

export const PLOT_COMPILER_VERSION = '1.0.0';

export type PlotErrorCode = 'E-PLOT-SCHEMA' | 'E-PLOT-EXPRESSION' | 'E-PLOT-SAMPLING' | 'E-PLOT-RENDER';

export interface PlotCompileMetadata {
  compiler: string;
  compilerVersion: string;
  contentHash: string;
  kind: PlotSpec['kind'];
  polylines: number;
  points: number;
  diagnostics: SamplingDiagnostics;
}

export type PlotCompilerResult =
  | { success: true; svg: string; metadata: PlotCompileMetadata }
  | {
      success: false;
      error: {
        code: PlotErrorCode;
        message: string;
        context: { correlationId: string; issues?: ValidationIssue[] };
      };
    };

export interface PlotCompilerOptions {
  config?: Partial<PlotRendererConfig>;
  theme?: PlotTheme;
  logger?: Logger;
  schemaGate?: AjvValidationGate;
}

const FULL_TURN: Domain = { min: 0, max: 2 * Math.PI };

class PlotCompileError extends Error {
  constructor(readonly code: PlotErrorCode, message: string, readonly issues?: ValidationIssue[]) {
    super(message);
    this.name = 'PlotCompileError';
  }
}

/**
 * Plot Compiler for function, parametric and polar PlotSpecs
 * Samples the curve, assembles polylines and writes SVG
 */
export class PlotCompiler {
  private readonly config: PlotRendererConfig;
  private readonly theme: PlotTheme;
  private readonly logger: Logger;
  private readonly schemaGate: AjvValidationGate;

  constructor(options: PlotCompilerOptions = {}) {
    this.config = { ...configFromEnv(), ...options.config };
    this.theme = options.theme ?? createPlotTheme(this.config.theme);
    this.logger = options.logger ?? createLogger('plot-compiler', this.config.logLevel);
    this.schemaGate = options.schemaGate ?? createPlotSpecGate(this.config.schemaDir);
  }

  /**
   * Compile plot specification to SVG. Never throws; failures come back as
   * coded errors.
   */
  async compile(spec: unknown, correlationId: string = generateCorrelationId()): Promise<PlotCompilerResult> {
    const log = this.logger.withCorrelation(correlationId);

    try {
      const plot = this.validateSpec(spec);
      const sampled = this.sampleSpec(plot);
      const polylines = assemble(sampled.samples);

      const points = polylines.reduce((sum, polyline) => sum + polyline.length, 0);
      log.debug('Sampled plot', { kind: plot.kind, polylines: polylines.length, points, ...sampled.diagnostics });
      if (sampled.diagnostics.lowConfidence) {
        log.warn('Sampling degraded before reaching full precision', {
          forcedAccepts: sampled.diagnostics.forcedAccepts,
          pointCeilingReached: sampled.diagnostics.pointCeilingReached,
          iterationCeilingReached: sampled.diagnostics.iterationCeilingReached
        });
      }

      const svg = this.render(
        renderPolylinesToSvg(polylines, {
          viewport: { width: this.config.width, height: this.config.height, x: plot.x, y: plot.y },
          theme: this.theme,
          style: plot.style,
          title: plot.title
        })
      );

      log.info('Compiled plot', { kind: plot.kind, polylines: polylines.length, bytes: svg.length });

      return {
        success: true,
        svg,
        metadata: {
          compiler: 'plot-compiler',
          compilerVersion: PLOT_COMPILER_VERSION,
          contentHash: this.generateContentHash(plot),
          kind: plot.kind,
          polylines: polylines.length,
          points,
          diagnostics: sampled.diagnostics
        }
      };
    } catch (error) {
      const failure = this.toCompileError(error);
      log.error('Plot compilation failed', { code: failure.code, message: failure.message });
      return {
        success: false,
        error: {
          code: failure.code,
          message: failure.message,
          context: { correlationId, ...(failure.issues && { issues: failure.issues }) }
        }
      };
    }
  }

  private validateSpec(spec: unknown): PlotSpec {
    const result = this.schemaGate.check({ data: spec, schemaId: PLOT_SPEC_SCHEMA_ID });
    if (!result.valid || !this.schemaGate.matches<PlotSpec>(PLOT_SPEC_SCHEMA_ID, spec)) {
      throw new PlotCompileError('E-PLOT-SCHEMA', 'Plot specification does not conform to schema', result.errors);
    }

    for (const axis of ['x', 'y'] as const) {
      if (!(spec[axis].min < spec[axis].max)) {
        throw new PlotCompileError('E-PLOT-SCHEMA', `Axis ${axis} must have min < max`);
      }
    }
    return spec;
  }

  private sampleSpec(plot: PlotSpec): SampleResult {
    const options: SamplingOptions = { samples: this.config.sampleCount, ...plot.sampling };
    const params = plot.params ?? {};

    switch (plot.kind) {
      case 'function': {
        const f = compileExpression(plot.expr, 'x', params);
        return sampleDetailed(f, plot.domain ?? { min: plot.x.min, max: plot.x.max }, options);
      }
      case 'parametric': {
        const fx = compileExpression(plot.exprX, 't', params);
        const fy = compileExpression(plot.exprY, 't', params);
        return sampleParametricDetailed(t => [fx(t), fy(t)], plot.domain, options);
      }
      case 'polar': {
        const r = compileExpression(plot.expr, 'theta', params);
        return samplePolarDetailed(r, plot.domain ?? FULL_TURN, options);
      }
    }
  }

  private render(svg: string): string {
    if (!this.config.optimizeSvg) return svg;
    try {
      return optimize(svg, { multipass: true }).data;
    } catch (error) {
      throw new PlotCompileError('E-PLOT-RENDER', `SVG optimization failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private toCompileError(error: unknown): PlotCompileError {
    if (error instanceof PlotCompileError) return error;
    if (error instanceof ExpressionError) {
      return new PlotCompileError('E-PLOT-EXPRESSION', error.message, error.issues);
    }
    if (isSamplerContractError(error)) {
      return new PlotCompileError('E-PLOT-SAMPLING', error.message);
    }
    return new PlotCompileError('E-PLOT-RENDER', error instanceof Error ? error.message : 'Unknown plot compilation error');
  }

  /**
   * Generate content hash for the compiled spec
   */
  private generateContentHash(plot: PlotSpec): string {
    return createHash('sha256').update(JSON.stringify(plot)).digest('hex').slice(0, 16);
  }
}
