import { Module } from '@nestjs/common';
import { ManifestReaderService } from './manifest-reader.service';

@Module({
  providers: [ManifestReaderService],
  exports: [ManifestReaderService],
})
export class ManifestModule {}
