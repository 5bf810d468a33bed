// sign-clip-pipeline/src/downloader/downloader.module.ts
import { Module } from '@nestjs/common';
import axios from 'axios';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { DirectStreamFetcher, HTTP_CLIENT } from './direct-stream.fetcher';
import { FetcherService } from './fetcher.service';

@Module({
  providers: [
    {
      provide: HTTP_CLIENT,
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig) =>
        axios.create({
          timeout: config.httpTimeoutMs,
          maxRedirects: 5,
          headers: { 'User-Agent': config.userAgent },
        }),
    },
    DirectStreamFetcher,
    FetcherService,
  ],
  exports: [FetcherService],
})
export class DownloaderModule {}
