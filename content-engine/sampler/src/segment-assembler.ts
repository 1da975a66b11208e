import { BREAK, isBreak } from './types.js';
import type { Polyline, RawSample } from './types.js';

/**
 * Collapse runs of break markers and trim breaks from both ends.
 */
export function normalizeSequence(raw: readonly RawSample[]): RawSample[] {
  const out: RawSample[] = [];
  for (const sample of raw) {
    if (isBreak(sample)) {
      if (out.length > 0 && !isBreak(out[out.length - 1])) out.push(BREAK);
    } else {
      out.push(sample);
    }
  }
  if (out.length > 0 && isBreak(out[out.length - 1])) out.pop();
  return out;
}

/**
 * Split a raw sequence into maximal runs of consecutive points. Each run is
 * drawn on its own; single-point runs are kept and left to the renderer.
 */
export function assemble(raw: readonly RawSample[]): Polyline[] {
  const polylines: Polyline[] = [];
  let run: Polyline = [];

  for (const sample of raw) {
    if (isBreak(sample)) {
      if (run.length > 0) {
        polylines.push(run);
        run = [];
      }
    } else {
      run.push(sample);
    }
  }
  if (run.length > 0) polylines.push(run);

  return polylines;
}
