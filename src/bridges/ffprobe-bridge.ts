/**
 * FFprobe Bridge - Process wrapper for FFprobe binary
 * Probes media files for duration and stream information
 */

import { Logger } from '@nestjs/common';
import { BinaryBridge } from './binary-bridge';
import { ProbeFormat, ProbeOutput, ProbeStream, ProbeTool, ToolRunOptions } from './tool.interfaces';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

/**
 * Read the JSON printed by `ffprobe -print_format json -show_format -show_streams`
 */
export function parseProbeOutput(text: string): ProbeOutput {
  const parsed: unknown = JSON.parse(text);
  if (!isRecord(parsed)) {
    throw new Error('ffprobe output is not a JSON object');
  }

  const rawStreams = parsed.streams;
  const rawFormat = parsed.format;

  const streams: ProbeStream[] = Array.isArray(rawStreams)
    ? rawStreams.filter(isRecord).map((stream, position) => ({
        index: typeof stream.index === 'number' ? stream.index : position,
        codec_type: optionalString(stream.codec_type),
        duration: optionalString(stream.duration),
      }))
    : [];

  let format: ProbeFormat | undefined;
  if (isRecord(rawFormat)) {
    format = {
      filename: optionalString(rawFormat.filename),
      format_name: optionalString(rawFormat.format_name),
      duration: optionalString(rawFormat.duration),
      size: optionalString(rawFormat.size),
    };
  }

  return { streams, format };
}

export class FfprobeBridge extends BinaryBridge implements ProbeTool {
  protected readonly logger = new Logger(FfprobeBridge.name);

  constructor(ffprobePath: string) {
    super('ffprobe', ffprobePath);
    this.logger.log(`Initialized with binary: ${ffprobePath}`);
  }

  /**
   * Ask only for the container duration; returns the raw printed value
   */
  async queryDuration(filePath: string, options: ToolRunOptions = {}): Promise<string> {
    const result = await this.execute(
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', filePath],
      options,
    );

    if (!result.success) {
      throw new Error(`${result.error}: ${result.stderr.trim()}`);
    }
    return result.stdout.trim();
  }

  /**
   * Probe a media file and return the parsed JSON result
   */
  async probe(filePath: string, options: ToolRunOptions = {}): Promise<ProbeOutput> {
    this.logger.debug(`Probing: ${filePath}`);

    const result = await this.execute(
      ['-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', filePath],
      options,
    );

    if (!result.success) {
      throw new Error(`${result.error}: ${result.stderr.trim()}`);
    }

    try {
      const output = parseProbeOutput(result.stdout);
      this.logger.debug(`Probe complete: ${output.streams.length} streams`);
      return output;
    } catch (e) {
      this.logger.error(`Failed to parse output: ${e}`);
      throw new Error(`Failed to parse ffprobe output: ${e}`);
    }
  }
}
