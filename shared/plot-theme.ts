/**
 * Plot color schemes
 * Themes are passed explicitly to every render call; nothing reads a global theme.
 */

export interface PlotTheme {
  name: string;
  background: string;
  stroke: string;
  highlight: string;
}

export const PLOT_THEMES = {
  light: {
    name: 'light',
    background: '#ffffff',
    stroke: '#000000',
    highlight: '#444444'
  },
  dark: {
    name: 'dark',
    background: '#262323',
    stroke: '#ddbfa1',
    highlight: '#d4aa8e'
  },
  'rose-pine': {
    name: 'rose-pine',
    background: '#191724',
    stroke: '#ebbcba',
    highlight: '#eb6f92'
  }
} as const satisfies Record<string, PlotTheme>;

export type PlotThemeName = keyof typeof PLOT_THEMES;

export const DEFAULT_PLOT_THEME: PlotThemeName = 'light';

export function isPlotThemeName(value: string): value is PlotThemeName {
  return Object.prototype.hasOwnProperty.call(PLOT_THEMES, value);
}

/**
 * Create a theme from a named scheme with custom overrides
 */
export function createPlotTheme(name: PlotThemeName = DEFAULT_PLOT_THEME, overrides: Partial<PlotTheme> = {}): PlotTheme {
  return {
    ...PLOT_THEMES[name],
    ...overrides
  };
}
