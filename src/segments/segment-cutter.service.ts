import { Injectable, Logger } from '@nestjs/common';
import { MalformedTimeError, errorMessage } from '../common/errors';
import { removeFile } from '../common/utils/file.util';
import { CANONICAL_EXTENSION } from '../common/utils/output-path.util';
import { parseTime } from '../common/utils/time.util';
import { FetcherService } from '../downloader/fetcher.service';
import { TrimmerService, type TrimErrorKind } from '../media/trimmer.service';

/** One requested segment; bounds are seconds or H:MM:SS / M:SS / SS strings */
export type SegmentSpec = readonly [start: number | string, end: number | string];

export type SegmentOutcome =
  | { index: number; status: 'cut'; outputPath: string; start: number; end: number }
  | { index: number; status: 'skipped'; reason: string }
  | { index: number; status: 'failed'; error: TrimErrorKind; message: string };

export interface SegmentCutReport {
  /** Null when the source could not be downloaded */
  sourcePath: string | null;
  downloadError?: string;
  segments: SegmentOutcome[];
}

export interface SegmentCutOptions {
  /** Keep `{outputBase}_full.*` after cutting */
  keepSource?: boolean;
  signal?: AbortSignal;
}

export function segmentOutputPath(outputBase: string, index: number): string {
  return `${outputBase}_segment_${index}${CANONICAL_EXTENSION}`;
}

/**
 * Parse a `start-end` argument such as `0:05-0:10`
 */
export function parseSegmentArgument(text: string): SegmentSpec {
  const parts = text.split('-');
  if (parts.length !== 2 || !parts[0].trim() || !parts[1].trim()) {
    throw new MalformedTimeError(text, 'expected a segment in the form start-end');
  }
  return [parts[0].trim(), parts[1].trim()];
}

/**
 * Cuts several segments out of one source video, downloading it only once
 */
@Injectable()
export class SegmentCutterService {
  private readonly logger = new Logger(SegmentCutterService.name);

  constructor(
    private readonly fetcher: FetcherService,
    private readonly trimmer: TrimmerService,
  ) {}

  async cutSegments(
    url: string,
    segments: readonly SegmentSpec[],
    outputBase: string,
    options: SegmentCutOptions = {},
  ): Promise<SegmentCutReport> {
    this.logger.log(`Downloading full video from ${url}`);
    const fetched = await this.fetcher.fetch(url, `${outputBase}_full`, options.signal);
    if (!fetched.ok) {
      this.logger.error(fetched.message);
      return { sourcePath: null, downloadError: fetched.message, segments: [] };
    }

    const sourcePath = fetched.localPath;
    const outcomes: SegmentOutcome[] = [];

    try {
      for (const [position, [rawStart, rawEnd]] of segments.entries()) {
        const index = position + 1;

        let start: number;
        let end: number;
        try {
          start = parseTime(rawStart);
          end = parseTime(rawEnd);
        } catch (error) {
          if (!(error instanceof MalformedTimeError)) {
            throw error;
          }
          this.logger.warn(`Skipping segment ${index}: ${error.message}`);
          outcomes.push({ index, status: 'skipped', reason: error.message });
          continue;
        }

        const destination = segmentOutputPath(outputBase, index);
        this.logger.log(`Cutting segment ${index}: ${rawStart} to ${rawEnd} into ${destination}`);
        const trimmed = await this.trimmer.trim(sourcePath, destination, start, end, options.signal);

        if (trimmed.ok) {
          outcomes.push({ index, status: 'cut', outputPath: destination, start: trimmed.start, end: trimmed.end });
        } else {
          this.logger.warn(`Segment ${index} failed (${trimmed.error}): ${trimmed.message}`);
          outcomes.push({ index, status: 'failed', error: trimmed.error, message: trimmed.message });
        }
      }
    } catch (error) {
      this.logger.error(`Segment cutting stopped: ${errorMessage(error)}`);
      throw error;
    } finally {
      if (!options.keepSource) {
        await removeFile(sourcePath);
      }
    }

    return { sourcePath, segments: outcomes };
  }
}
