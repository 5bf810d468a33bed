/**
 * YT-DLP Bridge - Process wrapper for yt-dlp binary
 * Runs quiet, non-interactive single-video downloads
 */

import { Logger } from '@nestjs/common';
import { BinaryBridge } from './binary-bridge';
import { DownloaderTool, DownloadRequestOptions, ToolRunResult } from './tool.interfaces';

export interface YtDlpConfig {
  ffmpegPath?: string;  // Path to FFmpeg for merging separate video/audio streams
  format?: string;      // Default format selector
}

/**
 * Argument list for one download. The URL always goes last.
 */
export function buildDownloadArgs(
  url: string,
  outputTemplate: string,
  options: { format?: string; ffmpegPath?: string } = {},
): string[] {
  const args: string[] = [];

  // Output template
  args.push('-o', outputTemplate);

  // Format selection
  if (options.format) {
    args.push('-f', options.format);
  }

  // Quiet, no progress lines, one video only
  args.push('--quiet', '--no-warnings', '--no-progress', '--no-playlist');

  // FFmpeg path for post-processing
  if (options.ffmpegPath) {
    args.push('--ffmpeg-location', options.ffmpegPath);
  }

  // Force overwrite of leftovers from an interrupted run
  args.push('--force-overwrites');

  args.push(url);
  return args;
}

export class YtDlpBridge extends BinaryBridge implements DownloaderTool {
  protected readonly logger = new Logger(YtDlpBridge.name);

  constructor(ytdlpPath: string, private readonly config: YtDlpConfig = {}) {
    super('yt-dlp', ytdlpPath);
    this.logger.log(`Initialized with binary: ${ytdlpPath}`);
  }

  /**
   * Download a video
   */
  download(url: string, outputTemplate: string, options: DownloadRequestOptions = {}): Promise<ToolRunResult> {
    const args = buildDownloadArgs(url, outputTemplate, {
      format: options.format ?? this.config.format,
      ffmpegPath: this.config.ffmpegPath,
    });

    this.logger.log(`Starting download: ${url}`);
    return this.execute(args, options);
  }
}
