import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { renderPlotFiles } from '../../../scripts/render-plot.js';
import { PlotCompiler } from '../../compilers/plot/src/index.js';
import { createLogger } from '../../utils/logger.js';

describe('render-plot', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'render-plot-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  async function writeSpec(name: string, content: string): Promise<string> {
    const file = path.join(workDir, name);
    await fs.writeFile(file, content, 'utf8');
    return file;
  }

  test('should render valid specs and report the ones that fail', async () => {
    const good = await writeSpec(
      'parabola.json',
      JSON.stringify({ kind: 'function', expr: 'x^2', x: { min: -2, max: 2 }, y: { min: 0, max: 4 } })
    );
    const unreadable = await writeSpec('truncated.json', '{"kind": "function",');
    const invalid = await writeSpec('no-expr.json', JSON.stringify({ kind: 'function', x: { min: 0, max: 1 }, y: { min: 0, max: 1 } }));

    const logger = createLogger('render-plot', 'error', () => undefined);
    const compiler = new PlotCompiler({ config: { optimizeSvg: false }, logger });
    const outputDir = path.join(workDir, 'out');

    const summary = await renderPlotFiles([good, unreadable, invalid], outputDir, compiler, logger);

    expect(summary.rendered).toEqual([path.join(outputDir, 'parabola.svg')]);
    expect(summary.failed.map(f => [path.basename(f.file), f.code])).toEqual([
      ['truncated.json', 'E-PLOT-READ'],
      ['no-expr.json', 'E-PLOT-SCHEMA']
    ]);

    const svg = await fs.readFile(path.join(outputDir, 'parabola.svg'), 'utf8');
    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="600" height="400"')).toBe(true);
    expect(await fs.readdir(outputDir)).toEqual(['parabola.svg']);
  });

  test('should create the output directory when nothing renders', async () => {
    const logger = createLogger('render-plot', 'error', () => undefined);
    const compiler = new PlotCompiler({ logger });
    const outputDir = path.join(workDir, 'nested', 'out');

    const summary = await renderPlotFiles([], outputDir, compiler, logger);

    expect(summary).toEqual({ rendered: [], failed: [] });
    expect((await fs.stat(outputDir)).isDirectory()).toBe(true);
  });
});
