import { BREAK } from './types.js';
import type { RawSample, SamplePoint, SamplingConfig } from './types.js';

export interface JumpPolicy {
  jumpThreshold: number;
  jumpRatio: number;
}

/**
 * Distance between two consecutive samples: |dy| for function graphs,
 * Euclidean distance for planar curves.
 */
export function sampleDistance(a: SamplePoint, b: SamplePoint, planar: boolean): number {
  return planar ? Math.hypot(b[0] - a[0], b[1] - a[1]) : Math.abs(b[1] - a[1]);
}

function sampleMagnitude(p: SamplePoint, planar: boolean): number {
  return planar ? Math.hypot(p[0], p[1]) : Math.abs(p[1]);
}

/**
 * A jump must be large in absolute terms and large relative to the values
 * on either side. The relative half keeps steep but continuous branches
 * such as 1/x near its pole in one piece.
 */
export function isJump(a: SamplePoint, b: SamplePoint, planar: boolean, policy: JumpPolicy): boolean {
  const distance = sampleDistance(a, b, planar);
  if (!(distance > policy.jumpThreshold)) return false;
  const scale = Math.max(sampleMagnitude(a, planar), sampleMagnitude(b, planar));
  return distance > policy.jumpRatio * scale;
}

/**
 * Accumulates a raw sample sequence. Keeps the sequence well formed while
 * it grows: no leading break, no doubled breaks, and a trailing break is
 * dropped by `finish()`.
 */
export class SequenceBuilder {
  private readonly out: RawSample[] = [];
  private last: SamplePoint | undefined;
  private points = 0;

  constructor(
    private readonly config: Pick<SamplingConfig, 'maxPoints' | 'jumpThreshold' | 'jumpRatio'>,
    private readonly planar: boolean
  ) {}

  get pointCount(): number {
    return this.points;
  }

  get full(): boolean {
    return this.points >= this.config.maxPoints;
  }

  markBreak(): void {
    if (this.last !== undefined) {
      this.out.push(BREAK);
      this.last = undefined;
    }
  }

  /**
   * Append a point, breaking first when it jumps away from the previous one.
   * Returns false once the point ceiling has been reached.
   */
  push(point: SamplePoint): boolean {
    if (this.full) return false;
    if (this.last !== undefined && isJump(this.last, point, this.planar, this.config)) {
      this.markBreak();
    }
    this.out.push(point);
    this.last = point;
    this.points++;
    return true;
  }

  finish(): RawSample[] {
    if (this.out.length > 0 && this.out[this.out.length - 1] === BREAK) {
      this.out.pop();
    }
    return this.out;
  }
}
