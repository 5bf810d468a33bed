import type { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { isErrnoException } from '../common/errors';
import { removeFile } from '../common/utils/file.util';

/** Leftovers of an interrupted or in-progress download */
const INCOMPLETE_EXTENSIONS = ['.part', '.ytdl'];

/**
 * Every regular file in the template's directory named `{templateStem}.<something>`
 */
export async function listTemplateMatches(template: string): Promise<string[]> {
  const dir = path.dirname(template);
  const prefix = `${path.basename(template)}.`;

  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  return entries
    .filter((entry) => entry.isFile() && entry.name.startsWith(prefix))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dir, name));
}

function isIncomplete(filePath: string): boolean {
  return INCOMPLETE_EXTENSIONS.some((ext) => filePath.endsWith(ext));
}

/**
 * Find the file the extractor wrote for a template (the extension is its choice).
 * An .mp4 wins over other containers; ties go to the lexicographically first name.
 * The other complete matches are removed so they cannot be picked up later.
 */
export async function resolveDownloadedFile(template: string): Promise<string | null> {
  const candidates = (await listTemplateMatches(template)).filter((file) => !isIncomplete(file));
  if (candidates.length === 0) {
    return null;
  }

  const mp4s = candidates.filter((file) => file.toLowerCase().endsWith('.mp4'));
  const chosen = mp4s.length > 0 ? mp4s[0] : candidates[0];

  for (const other of candidates) {
    if (other !== chosen) {
      await removeFile(other);
    }
  }
  return chosen;
}

/**
 * Remove everything a failed download attempt may have left for this template
 */
export async function removeTemplateLeftovers(template: string): Promise<void> {
  for (const file of await listTemplateMatches(template)) {
    await removeFile(file);
  }
}
