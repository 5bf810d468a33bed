import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Stand-in media files are small JSON documents. The fake tools read and
 * write these instead of real video, so durations and cut windows can be asserted.
 */
export interface FakeMedia {
  duration?: number;
  source?: string;
  start?: number;
  end?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

export async function writeFakeMedia(filePath: string, media: FakeMedia): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(media));
}

export async function readFakeMedia(filePath: string): Promise<FakeMedia> {
  const text = await fs.readFile(filePath, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new Error(`${filePath}: Invalid data found when processing input`);
  }
  if (!isRecord(parsed)) {
    throw new Error(`${filePath}: Invalid data found when processing input`);
  }
  return {
    duration: optionalNumber(parsed.duration),
    source: typeof parsed.source === 'string' ? parsed.source : undefined,
    start: optionalNumber(parsed.start),
    end: optionalNumber(parsed.end),
  };
}
