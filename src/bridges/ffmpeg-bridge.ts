/**
 * FFmpeg Bridge - Process wrapper for FFmpeg binary
 */

import { Logger } from '@nestjs/common';
import { BinaryBridge } from './binary-bridge';
import { ToolRunOptions, ToolRunResult, TranscoderTool } from './tool.interfaces';

export class FfmpegBridge extends BinaryBridge implements TranscoderTool {
  protected readonly logger = new Logger(FfmpegBridge.name);

  constructor(ffmpegPath: string) {
    super('FFmpeg', ffmpegPath);
    this.logger.log(`Initialized with binary: ${ffmpegPath}`);
  }

  /**
   * Run FFmpeg with the given arguments
   */
  run(args: string[], options: ToolRunOptions = {}): Promise<ToolRunResult> {
    return this.execute(['-hide_banner', '-nostdin', ...args], options);
  }
}
