#!/usr/bin/env node
import 'dotenv/config';
import fs from 'node:fs/promises';
import path from 'node:path';
import { PlotCompiler } from '../content-engine/compilers/plot/src/index.js';
import { Logger, createLogger } from '../content-engine/utils/logger.js';
import { loadPlotConfig } from '../plot.config.js';

export interface RenderSummary {
  rendered: string[];
  failed: Array<{ file: string; code: string; message: string }>;
}

async function ensureDir(p: string) {
  await fs.mkdir(p, { recursive: true });
}

async function listSpecFiles(inputDir: string): Promise<string[]> {
  const entries = await fs.readdir(inputDir);
  return entries
    .filter((name) => name.endsWith('.json'))
    .sort()
    .map((name) => path.join(inputDir, name));
}

/**
 * Compile each plot spec file and write `<name>.svg` into `outputDir`.
 * A failing plot is logged and skipped; the rest still render.
 */
export async function renderPlotFiles(
  files: string[],
  outputDir: string,
  compiler: PlotCompiler,
  logger: Logger
): Promise<RenderSummary> {
  await ensureDir(outputDir);
  const summary: RenderSummary = { rendered: [], failed: [] };

  for (const file of files) {
    let spec: unknown;
    try {
      spec = JSON.parse(await fs.readFile(file, 'utf8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Could not read plot spec', { file, message });
      summary.failed.push({ file, code: 'E-PLOT-READ', message });
      continue;
    }

    const id = path.basename(file, '.json');
    const result = await compiler.compile(spec, `render-${id}`);
    if (!result.success) {
      summary.failed.push({ file, code: result.error.code, message: result.error.message });
      continue;
    }

    const outPath = path.join(outputDir, `${id}.svg`);
    await fs.writeFile(outPath, result.svg, 'utf8');
    logger.info('Wrote plot', { file, outPath, contentHash: result.metadata.contentHash });
    summary.rendered.push(outPath);
  }

  return summary;
}

async function main() {
  const config = loadPlotConfig();
  const logger = createLogger('render-plot', config.logLevel);
  const compiler = new PlotCompiler({ config, logger });

  // Inputs: explicit spec files, or every .json in --input / PLOT_INPUT_DIR
  const argv = process.argv.slice(2);
  let inputDir = config.inputDir;
  let outputDir = config.outputDir;
  const files: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if ((arg === '--input' || arg === '-i') && argv[i + 1]) {
      inputDir = argv[++i];
    } else if ((arg === '--output' || arg === '-o') && argv[i + 1]) {
      outputDir = argv[++i];
    } else {
      files.push(path.resolve(arg));
    }
  }

  const specFiles = files.length > 0 ? files : await listSpecFiles(path.resolve(inputDir));
  const summary = await renderPlotFiles(specFiles, path.resolve(outputDir), compiler, logger);

  logger.info('Render completed', { rendered: summary.rendered.length, failed: summary.failed.length });
  if (summary.failed.length > 0) {
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
