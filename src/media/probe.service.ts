import { Inject, Injectable, Logger } from '@nestjs/common';
import { PROBE_TOOL, type ProbeTool } from '../bridges';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { ToolNotFoundError, errorMessage } from '../common/errors';
import { Failure, failure } from '../common/result';
import { fileExists } from '../common/utils/file.util';

export type ProbeErrorKind = 'NotFound' | 'ToolMissing' | 'Unparsable';

export type ProbeResult = { ok: true; duration: number } | Failure<ProbeErrorKind>;

/**
 * Read a duration printed by ffprobe. "N/A", blanks and non-positive values count as absent.
 */
export function parseDuration(raw: string | undefined): number | null {
  const text = raw?.trim();
  if (!text || text === 'N/A') {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) && value > 0 ? value : null;
}

@Injectable()
export class ProbeService {
  private readonly logger = new Logger(ProbeService.name);

  constructor(
    @Inject(PROBE_TOOL) private readonly probeTool: ProbeTool,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  /**
   * Measure a media file's duration in seconds.
   * Tries the cheap format=duration query first, then a full probe.
   */
  async measureDuration(filePath: string, signal?: AbortSignal): Promise<ProbeResult> {
    if (!(await fileExists(filePath))) {
      return failure('NotFound', `File not found: ${filePath}`);
    }

    const options = { timeoutMs: this.config.toolTimeoutMs, signal };

    try {
      const duration = parseDuration(await this.probeTool.queryDuration(filePath, options));
      if (duration !== null) {
        return { ok: true, duration };
      }
      this.logger.debug(`No format duration for ${filePath}, running full probe`);
    } catch (error) {
      if (error instanceof ToolNotFoundError) {
        return failure('ToolMissing', error.message);
      }
      this.logger.debug(`Duration query failed for ${filePath}: ${errorMessage(error)}`);
    }

    try {
      const output = await this.probeTool.probe(filePath, options);
      const candidates = [output.format?.duration, ...output.streams.map((stream) => stream.duration)];

      for (const candidate of candidates) {
        const duration = parseDuration(candidate);
        if (duration !== null) {
          return { ok: true, duration };
        }
      }
      return failure('Unparsable', `No usable duration reported for ${filePath}`);
    } catch (error) {
      if (error instanceof ToolNotFoundError) {
        return failure('ToolMissing', error.message);
      }
      return failure('Unparsable', `Could not probe ${filePath}: ${errorMessage(error)}`);
    }
  }
}
