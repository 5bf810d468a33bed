// sign-clip-pipeline/src/config/pipeline.config.ts
import { registerAs } from '@nestjs/config';
import { SetupError } from '../common/errors';
import { defaultToolPaths, ToolPaths } from '../bridges/runtime-paths';

export const PIPELINE_CONFIG = Symbol('PIPELINE_CONFIG');

export type ProcessingMode = 'full' | 'test';

export interface PipelineConfig {
  manifestPath: string;
  outputDir: string;
  auditLogPath: string;
  logDir: string;
  logLevel: string;
  processingMode: ProcessingMode;
  /** Rows picked in test mode */
  sampleSize: number;
  sampleSeed: number;
  /** Rows processed at once; 1 keeps the run strictly sequential */
  concurrency: number;
  tools: ToolPaths;
  toolTimeoutMs: number;
  httpTimeoutMs: number;
  /** Encoder arguments placed between the window and the destination */
  cutArgs: string[];
  downloadFormat: string;
  userAgent: string;
}

export const DEFAULT_CUT_ARGS = ['-c:v', 'libx264', '-preset', 'fast', '-crf', '23', '-c:a', 'aac', '-b:a', '128k'];

export const DEFAULT_DOWNLOAD_FORMAT = 'bestvideo[ext=mp4]+bestaudio[ext=m4a]/mp4/best';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';

function readString(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new SetupError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readMode(env: NodeJS.ProcessEnv): ProcessingMode {
  const raw = readString(env, 'PROCESSING_MODE', 'test').toLowerCase();
  if (raw !== 'full' && raw !== 'test') {
    throw new SetupError(`PROCESSING_MODE must be "full" or "test", got "${raw}"`);
  }
  return raw;
}

function readArgs(env: NodeJS.ProcessEnv, key: string, fallback: string[]): string[] {
  const raw = env[key]?.trim();
  return raw ? raw.split(/\s+/) : [...fallback];
}

/**
 * Build the pipeline configuration from environment variables
 */
export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const tools = defaultToolPaths();

  return {
    manifestPath: readString(env, 'MANIFEST_PATH', 'combined_asl.csv'),
    outputDir: readString(env, 'OUTPUT_DIR', 'videos'),
    auditLogPath: readString(env, 'AUDIT_LOG_PATH', 'download_log.csv'),
    logDir: readString(env, 'LOG_DIR', 'logs'),
    logLevel: readString(env, 'LOG_LEVEL', 'info'),
    processingMode: readMode(env),
    sampleSize: readInt(env, 'SAMPLE_SIZE', 200, 1),
    sampleSeed: readInt(env, 'SAMPLE_SEED', 42, 0),
    concurrency: readInt(env, 'PIPELINE_CONCURRENCY', 1, 1),
    tools: {
      ytdlp: readString(env, 'YT_DLP_PATH', tools.ytdlp),
      ffmpeg: readString(env, 'FFMPEG_PATH', tools.ffmpeg),
      ffprobe: readString(env, 'FFPROBE_PATH', tools.ffprobe),
    },
    toolTimeoutMs: readInt(env, 'TOOL_TIMEOUT_MS', 10 * 60 * 1000, 1),
    httpTimeoutMs: readInt(env, 'HTTP_TIMEOUT_MS', 200 * 1000, 1),
    cutArgs: readArgs(env, 'FFMPEG_CUT_ARGS', DEFAULT_CUT_ARGS),
    downloadFormat: readString(env, 'YT_DLP_FORMAT', DEFAULT_DOWNLOAD_FORMAT),
    userAgent: readString(env, 'HTTP_USER_AGENT', DEFAULT_USER_AGENT),
  };
}

export default registerAs('pipeline', () => loadPipelineConfig(process.env));
