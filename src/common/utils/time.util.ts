// sign-clip-pipeline/src/common/utils/time.util.ts
import { MalformedTimeError } from '../errors';

/** Datasets whose frame indices start at 1 (frame 1 is at t=0). */
export const ONE_BASED_DATASETS: ReadonlySet<string> = new Set(['WLASL']);

/** Dataset tags the manifest builder is known to emit. */
export const KNOWN_DATASETS: ReadonlySet<string> = new Set(['WLASL', 'MSASL']);

/** `frame_end` value meaning "keep everything through the end of the source" */
export const OPEN_END_FRAME = -1;

export interface TimeWindow {
  startSeconds: number;
  /** Absent when the clip runs through the source's actual end */
  endSeconds?: number;
}

export interface FrameRange {
  frameStart: number;
  frameEnd: number;
  fps: number;
  datasetTag?: string;
}

export interface ResolvedWindow extends TimeWindow {
  adjustedFrameStart: number;
  /** True when the adjusted start fell before frame 0 and was clamped */
  clamped: boolean;
}

/**
 * Parse a time value to seconds.
 *
 * Accepts a number (already seconds) or a string in `H:MM:SS[.ms]`, `M:SS[.ms]`
 * or `SS[.ms]` form.
 *
 * @example
 * parseTime('1:02:03.5') // 3723.5
 * parseTime('65')        // 65
 * parseTime('a:b:c')     // throws MalformedTimeError
 */
export function parseTime(value: number | string): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new MalformedTimeError(value, 'expected a finite, non-negative number of seconds');
    }
    return value;
  }

  const trimmed = value.trim();
  if (!trimmed) {
    throw new MalformedTimeError(value, 'empty input');
  }

  const parts = trimmed.split(':');
  if (parts.length > 3) {
    throw new MalformedTimeError(value, `expected at most 3 components, got ${parts.length}`);
  }

  const numbers = parts.map((part) => {
    if (!/^(\d+\.?\d*|\.\d+)$/.test(part.trim())) {
      throw new MalformedTimeError(value, `"${part}" is not numeric`);
    }
    return parseFloat(part);
  });

  // Fold from the left: [h, m, s] -> ((h * 60) + m) * 60 + s
  return numbers.reduce((total, part) => total * 60 + part, 0);
}

export function frameToSeconds(frame: number, fps: number): number {
  return frame / fps;
}

export function usesOneBasedFrames(datasetTag?: string): boolean {
  return datasetTag !== undefined && ONE_BASED_DATASETS.has(datasetTag);
}

/**
 * Apply the dataset's frame convention to a start frame. A start that lands
 * before frame 0 is clamped to 0.
 */
export function adjustFrameStart(frameStart: number, datasetTag?: string): { frame: number; clamped: boolean } {
  const frame = usesOneBasedFrames(datasetTag) ? frameStart - 1 : frameStart;
  if (frame < 0) {
    return { frame: 0, clamped: true };
  }
  return { frame, clamped: false };
}

/**
 * Derive the trim window for a manifest row. `endSeconds` is left out for open-ended rows.
 */
export function resolveTimeWindow(range: FrameRange): ResolvedWindow {
  const { frame, clamped } = adjustFrameStart(range.frameStart, range.datasetTag);
  const window: ResolvedWindow = {
    adjustedFrameStart: frame,
    clamped,
    startSeconds: frameToSeconds(frame, range.fps),
  };

  if (range.frameEnd !== OPEN_END_FRAME) {
    window.endSeconds = frameToSeconds(range.frameEnd, range.fps);
  }

  return window;
}
