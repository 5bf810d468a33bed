// sign-clip-pipeline/src/bridges/bridges.module.ts
import { Global, Module } from '@nestjs/common';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { FfmpegBridge } from './ffmpeg-bridge';
import { FfprobeBridge } from './ffprobe-bridge';
import { YtDlpBridge } from './ytdlp-bridge';
import { DOWNLOADER_TOOL, PROBE_TOOL, TRANSCODER_TOOL } from './tool.tokens';

/**
 * Bridges Module - Provides the external tool wrappers globally
 * Services depend on the capability tokens, so tests can bind fakes instead.
 */
@Global()
@Module({
  providers: [
    {
      provide: YtDlpBridge,
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig) =>
        new YtDlpBridge(config.tools.ytdlp, {
          ffmpegPath: config.tools.ffmpeg,
          format: config.downloadFormat,
        }),
    },
    {
      provide: FfprobeBridge,
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig) => new FfprobeBridge(config.tools.ffprobe),
    },
    {
      provide: FfmpegBridge,
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig) => new FfmpegBridge(config.tools.ffmpeg),
    },
    { provide: DOWNLOADER_TOOL, useExisting: YtDlpBridge },
    { provide: PROBE_TOOL, useExisting: FfprobeBridge },
    { provide: TRANSCODER_TOOL, useExisting: FfmpegBridge },
  ],
  exports: [DOWNLOADER_TOOL, PROBE_TOOL, TRANSCODER_TOOL],
})
export class BridgesModule {}
