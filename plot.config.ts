/**
 * Plot Renderer Configuration
 * Centralized configuration for the plot compiler with environment variable support
 */

import { DEFAULT_SAMPLE_COUNT } from './content-engine/sampler/src/index.js';
import { isLogLevel } from './content-engine/utils/logger.js';
import type { LogLevel } from './content-engine/utils/logger.js';
import { DEFAULT_PLOT_THEME, isPlotThemeName } from './shared/plot-theme.js';
import type { PlotThemeName } from './shared/plot-theme.js';

export interface PlotRendererConfig {
  // Input/Output paths
  inputDir: string;
  outputDir: string;
  schemaDir: string;

  // Viewport (px)
  width: number;
  height: number;

  // Sampling
  sampleCount: number;

  // Output
  theme: PlotThemeName;
  optimizeSvg: boolean;

  // Logging
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function parseIntVar(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

/**
 * Build configuration from environment variables
 */
export function configFromEnv(env: Env = process.env): PlotRendererConfig {
  const theme = env.PLOT_THEME || DEFAULT_PLOT_THEME;
  if (!isPlotThemeName(theme)) {
    throw new Error(`PLOT_THEME must be one of light, dark, rose-pine; got "${theme}"`);
  }

  const logLevel = env.PLOT_LOG_LEVEL || 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`PLOT_LOG_LEVEL must be one of debug, info, warn, error; got "${logLevel}"`);
  }

  return {
    // Paths
    inputDir: env.PLOT_INPUT_DIR || './plots',
    outputDir: env.PLOT_OUTPUT_DIR || './assets/plots',
    schemaDir: env.PLOT_SCHEMA_DIR || './schema',

    // Viewport
    width: parseIntVar(env, 'PLOT_WIDTH', 600),
    height: parseIntVar(env, 'PLOT_HEIGHT', 400),

    // Sampling
    sampleCount: parseIntVar(env, 'PLOT_SAMPLE_COUNT', DEFAULT_SAMPLE_COUNT),

    // Output
    theme,
    optimizeSvg: env.PLOT_OPTIMIZE_SVG !== 'false',

    // Logging
    logLevel
  };
}

/**
 * Load and validate plot renderer configuration
 */
export function loadPlotConfig(env: Env = process.env): PlotRendererConfig {
  const config = configFromEnv(env);

  if (config.width < 100 || config.width > 4000) {
    throw new Error('PLOT_WIDTH must be between 100 and 4000 px');
  }

  if (config.height < 100 || config.height > 4000) {
    throw new Error('PLOT_HEIGHT must be between 100 and 4000 px');
  }

  if (config.sampleCount < 2 || config.sampleCount > 100000) {
    throw new Error('PLOT_SAMPLE_COUNT must be between 2 and 100000');
  }

  return config;
}
