import { Module } from '@nestjs/common';
import { DownloaderModule } from '../downloader/downloader.module';
import { MediaModule } from '../media/media.module';
import { SegmentCutterService } from './segment-cutter.service';

@Module({
  imports: [DownloaderModule, MediaModule],
  providers: [SegmentCutterService],
  exports: [SegmentCutterService],
})
export class SegmentsModule {}
