import { parseArgs } from 'util';
import { PipelineConfig, ProcessingMode } from '../config/pipeline.config';
import { MalformedTimeError } from '../common/errors';
import { SegmentSpec, parseSegmentArgument } from '../segments/segment-cutter.service';

export const USAGE = `Usage:
  clip-pipeline run [--manifest path] [--output dir] [--log path] [--log-dir dir]
                    [--mode full|test] [--sample n] [--seed n] [--concurrency n]
  clip-pipeline segments --url URL --segment START-END [--segment START-END ...]
                    --output-base path [--keep-source]
  clip-pipeline summary [--log path]
`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export type CliCommand =
  | { command: 'run'; overrides: Partial<PipelineConfig> }
  | {
      command: 'segments';
      overrides: Partial<PipelineConfig>;
      url: string;
      segments: SegmentSpec[];
      outputBase: string;
      keepSource: boolean;
    }
  | { command: 'summary'; overrides: Partial<PipelineConfig> }
  | { command: 'help' };

function positiveInt(flag: string, raw: string | undefined, min = 1): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new CliUsageError(`--${flag} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function processingMode(raw: string | undefined): ProcessingMode | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (raw !== 'full' && raw !== 'test') {
    throw new CliUsageError(`--mode must be "full" or "test", got "${raw}"`);
  }
  return raw;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        manifest: { type: 'string' },
        output: { type: 'string' },
        log: { type: 'string' },
        'log-dir': { type: 'string' },
        mode: { type: 'string' },
        sample: { type: 'string' },
        seed: { type: 'string' },
        concurrency: { type: 'string' },
        url: { type: 'string' },
        segment: { type: 'string', multiple: true },
        'output-base': { type: 'string' },
        'keep-source': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Turn argv (without node and script) into a command
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = readArgs(argv);
  const command = positionals[0] ?? 'run';
  if (values.help === true || command === 'help') {
    return { command: 'help' };
  }
  if (positionals.length > 1) {
    throw new CliUsageError(`Unexpected argument: ${positionals[1]}`);
  }

  // Flags left out must not mask configured values
  const overrides: Partial<PipelineConfig> = {};
  if (values.manifest !== undefined) overrides.manifestPath = values.manifest;
  if (values.output !== undefined) overrides.outputDir = values.output;
  if (values.log !== undefined) overrides.auditLogPath = values.log;
  if (values['log-dir'] !== undefined) overrides.logDir = values['log-dir'];

  const mode = processingMode(values.mode);
  if (mode !== undefined) overrides.processingMode = mode;
  const sampleSize = positiveInt('sample', values.sample);
  if (sampleSize !== undefined) overrides.sampleSize = sampleSize;
  const sampleSeed = positiveInt('seed', values.seed, 0);
  if (sampleSeed !== undefined) overrides.sampleSeed = sampleSeed;
  const concurrency = positiveInt('concurrency', values.concurrency);
  if (concurrency !== undefined) overrides.concurrency = concurrency;

  switch (command) {
    case 'run':
      return { command: 'run', overrides };
    case 'summary':
      return { command: 'summary', overrides };
    case 'segments': {
      const url = values.url?.trim();
      const outputBase = values['output-base']?.trim();
      if (!url) {
        throw new CliUsageError('segments needs --url');
      }
      if (!outputBase) {
        throw new CliUsageError('segments needs --output-base');
      }
      const rawSegments = values.segment ?? [];
      if (rawSegments.length === 0) {
        throw new CliUsageError('segments needs at least one --segment START-END');
      }
      let segments: SegmentSpec[];
      try {
        segments = rawSegments.map(parseSegmentArgument);
      } catch (error) {
        if (error instanceof MalformedTimeError) {
          throw new CliUsageError(error.message);
        }
        throw error;
      }
      return { command: 'segments', overrides, url, segments, outputBase, keepSource: values['keep-source'] === true };
    }
    default:
      throw new CliUsageError(`Unknown command: ${command}`);
  }
}
