import * as path from 'path';

/** Container used for every final output */
export const CANONICAL_EXTENSION = '.mp4';

/** Suffix of the scratch template used when a row still has to be trimmed */
export const SCRATCH_SUFFIX = '_temp';

/**
 * Final location of a row's clip. Used both to detect completed work and as
 * the destination of the trim or rename step.
 */
export function outputPath(outputRoot: string, id: number): string {
  return path.join(outputRoot, `${id}${CANONICAL_EXTENSION}`);
}

/** Download template for a source that will be trimmed afterwards */
export function scratchTemplate(outputRoot: string, id: number): string {
  return path.join(outputRoot, `${id}${SCRATCH_SUFFIX}`);
}

/** Download template for a source that is kept whole (the downloader picks the extension) */
export function directTemplate(outputRoot: string, id: number): string {
  return path.join(outputRoot, `${id}`);
}
