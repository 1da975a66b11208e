import type { Polyline, SamplePoint } from '../../../sampler/src/index.js';
import type { AxisRange, PlotStyle } from '../../../../types.js';
import type { PlotTheme } from '../../../../shared/plot-theme.js';

export interface Viewport {
  width: number;
  height: number;
  x: AxisRange;
  y: AxisRange;
}

export interface SvgRenderOptions {
  viewport: Viewport;
  theme: PlotTheme;
  style?: PlotStyle;
  title?: string;
}

const DEFAULT_STROKE_WIDTH = 1.5;
const DOT_RADIUS = 1.5;

function escapeXml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Two decimals, without trailing zeros or negative zero.
 */
export function formatCoordinate(value: number): string {
  const rounded = Math.round(value * 100) / 100;
  return String(rounded === 0 ? 0 : rounded);
}

/**
 * Map a plot point into viewport pixels. The y axis points up.
 */
export function project(point: SamplePoint, viewport: Viewport): [number, number] {
  const { width, height, x, y } = viewport;
  const px = ((point[0] - x.min) / (x.max - x.min)) * width;
  const py = height - ((point[1] - y.min) / (y.max - y.min)) * height;
  return [px, py];
}

export function polylineToPathData(polyline: Polyline, viewport: Viewport): string {
  return polyline
    .map((point, i) => {
      const [px, py] = project(point, viewport);
      return `${i === 0 ? 'M' : 'L'}${formatCoordinate(px)} ${formatCoordinate(py)}`;
    })
    .join(' ');
}

/**
 * One `<path>` per polyline; single-point runs become dots or are dropped.
 */
export function renderPolylinesToSvg(polylines: Polyline[], options: SvgRenderOptions): string {
  const { viewport, theme, style = {}, title } = options;
  const { width, height } = viewport;
  const stroke = style.stroke ?? theme.stroke;
  const strokeWidth = style.strokeWidth ?? DEFAULT_STROKE_WIDTH;
  const isolated = style.isolatedPoints ?? 'dot';

  const paths: string[] = [];
  const dots: string[] = [];
  for (const polyline of polylines) {
    if (polyline.length > 1) {
      paths.push(`<path d="${polylineToPathData(polyline, viewport)}"/>`);
    } else if (isolated === 'dot') {
      const [px, py] = project(polyline[0], viewport);
      dots.push(`<circle cx="${formatCoordinate(px)}" cy="${formatCoordinate(py)}" r="${DOT_RADIUS}"/>`);
    }
  }

  const lines = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    ...(title ? [`<title>${escapeXml(title)}</title>`] : []),
    `<defs><clipPath id="plot-area"><rect width="${width}" height="${height}"/></clipPath></defs>`,
    `<rect width="${width}" height="${height}" fill="${theme.background}"/>`,
    `<g clip-path="url(#plot-area)" fill="none" stroke="${stroke}" stroke-width="${strokeWidth}" stroke-linejoin="round" stroke-linecap="round">`,
    ...paths,
    '</g>',
    ...(dots.length > 0 ? [`<g clip-path="url(#plot-area)" fill="${theme.highlight}">`, ...dots, '</g>'] : []),
    '</svg>'
  ];
  return lines.join('\n');
}
