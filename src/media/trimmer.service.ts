import { Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import { TRANSCODER_TOOL, type ToolRunResult, type TranscoderTool } from '../bridges';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { ToolNotFoundError, errorMessage } from '../common/errors';
import { Failure, failure } from '../common/result';
import { isNonEmptyFile, removeFile } from '../common/utils/file.util';
import { ProbeService } from './probe.service';

export type TrimErrorKind =
  | 'DurationUnknown'
  | 'InvalidWindow'
  | 'StartBeyondDuration'
  | 'TranscodeError'
  | 'ToolMissing'
  | 'EmptyOutput';

export type TrimResult = { ok: true; outputPath: string; start: number; end: number } | Failure<TrimErrorKind>;

export type TrimPlan =
  | { ok: true; start: number; end: number; endClamped: boolean }
  | Failure<'InvalidWindow' | 'StartBeyondDuration'>;

const STDERR_TAIL_LENGTH = 300;

/**
 * Check a requested window against the source duration.
 * An end past the source is pulled back to the duration; a missing end means the duration.
 */
export function planTrimWindow(duration: number, start: number, end?: number): TrimPlan {
  if (!Number.isFinite(start) || start < 0) {
    return failure('InvalidWindow', `Start time must be non-negative, got ${start}`);
  }
  if (end !== undefined && !(end > start)) {
    return failure('InvalidWindow', `End time (${end}) must be greater than start time (${start})`);
  }
  if (start >= duration) {
    return failure('StartBeyondDuration', `Start time (${start}s) is beyond video duration (${duration}s)`);
  }
  if (end === undefined) {
    return { ok: true, start, end: duration, endClamped: false };
  }
  if (end > duration) {
    return { ok: true, start, end: duration, endClamped: true };
  }
  return { ok: true, start, end, endClamped: false };
}

/** Seconds as ffmpeg arguments, to microsecond precision */
export function formatSeconds(seconds: number): string {
  return Number(seconds.toFixed(6)).toString();
}

/**
 * Re-encoding cut. Seeking after the input with copied timestamps keeps
 * the boundaries frame-accurate.
 */
export function buildTrimArgs(
  source: string,
  destination: string,
  start: number,
  end: number,
  codecArgs: string[],
): string[] {
  return [
    '-y',
    '-i', source,
    '-ss', formatSeconds(start),
    '-to', formatSeconds(end),
    '-copyts',
    '-avoid_negative_ts', 'make_zero',
    ...codecArgs,
    destination,
  ];
}

function stderrTail(result: ToolRunResult): string {
  const tail = result.stderr.trim().slice(-STDERR_TAIL_LENGTH);
  return tail ? `${result.error}: ${tail}` : result.error ?? 'FFmpeg failed';
}

@Injectable()
export class TrimmerService {
  private readonly logger = new Logger(TrimmerService.name);

  constructor(
    private readonly probe: ProbeService,
    @Inject(TRANSCODER_TOOL) private readonly transcoder: TranscoderTool,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  /**
   * Cut [start, end) out of `source` into `destination`.
   * A partially written destination is removed on every failure after ffmpeg starts.
   */
  async trim(source: string, destination: string, start: number, end?: number, signal?: AbortSignal): Promise<TrimResult> {
    const probe = await this.probe.measureDuration(source, signal);
    if (!probe.ok) {
      if (probe.error === 'ToolMissing') {
        return failure('ToolMissing', probe.message);
      }
      return failure('DurationUnknown', `Could not determine duration of ${source}: ${probe.message}`);
    }

    const plan = planTrimWindow(probe.duration, start, end);
    if (!plan.ok) {
      return plan;
    }
    if (plan.endClamped) {
      this.logger.warn(`End time (${end}s) exceeds video duration (${probe.duration}s), clamping to duration`);
    }

    this.logger.log(`Cutting ${path.basename(source)}: ${formatSeconds(plan.start)}s - ${formatSeconds(plan.end)}s`);
    await fs.mkdir(path.dirname(destination), { recursive: true });

    const args = buildTrimArgs(source, destination, plan.start, plan.end, this.config.cutArgs);

    let result: ToolRunResult;
    try {
      result = await this.transcoder.run(args, { timeoutMs: this.config.toolTimeoutMs, signal });
    } catch (error) {
      await removeFile(destination);
      if (error instanceof ToolNotFoundError) {
        return failure('ToolMissing', error.message);
      }
      return failure('TranscodeError', `FFmpeg could not be run: ${errorMessage(error)}`);
    }

    if (!result.success) {
      await removeFile(destination);
      return failure('TranscodeError', stderrTail(result));
    }

    if (!(await isNonEmptyFile(destination))) {
      await removeFile(destination);
      return failure('EmptyOutput', `Output file missing or empty after cut: ${destination}`);
    }

    return { ok: true, outputPath: destination, start: plan.start, end: plan.end };
  }
}
