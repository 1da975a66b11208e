// Plot compiler module exports

export { PlotCompiler, PLOT_COMPILER_VERSION } from './plot-compiler.js';
export type { PlotCompilerResult, PlotCompileMetadata, PlotCompilerOptions, PlotErrorCode } from './plot-compiler.js';
export { compileExpression, ExpressionError } from './expression.js';
export { renderPolylinesToSvg, polylineToPathData, project, formatCoordinate } from './svg-writer.js';
export type { Viewport, SvgRenderOptions } from './svg-writer.js';
