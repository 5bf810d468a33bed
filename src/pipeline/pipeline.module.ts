// sign-clip-pipeline/src/pipeline/pipeline.module.ts
import { Module } from '@nestjs/common';
import { DownloaderModule } from '../downloader/downloader.module';
import { ManifestModule } from '../manifest/manifest.module';
import { MediaModule } from '../media/media.module';
import { AuditLogService } from './audit-log.service';
import { ProgressReporterService } from './progress-reporter.service';
import { RowProcessorService } from './row-processor.service';
import { RunControllerService } from './run-controller.service';

@Module({
  imports: [DownloaderModule, MediaModule, ManifestModule],
  providers: [RowProcessorService, AuditLogService, RunControllerService, ProgressReporterService],
  exports: [RowProcessorService, AuditLogService, RunControllerService],
})
export class PipelineModule {}
