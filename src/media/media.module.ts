// sign-clip-pipeline/src/media/media.module.ts
import { Module } from '@nestjs/common';
import { ProbeService } from './probe.service';
import { TrimmerService } from './trimmer.service';

@Module({
  providers: [ProbeService, TrimmerService],
  exports: [ProbeService, TrimmerService],
})
export class MediaModule {}
