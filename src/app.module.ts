// sign-clip-pipeline/src/app.module.ts
import { DynamicModule, Module } from '@nestjs/common';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { BridgesModule } from './bridges/bridges.module';
import { LoggerModule } from './common/logger.module';
import { PipelineConfig } from './config/pipeline.config';
import { PipelineConfigModule } from './config/pipeline-config.module';
import { PipelineModule } from './pipeline/pipeline.module';
import { SegmentsModule } from './segments/segments.module';

@Module({})
export class AppModule {
  static forRoot(overrides: Partial<PipelineConfig> = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        PipelineConfigModule.forRoot(overrides),
        EventEmitterModule.forRoot({
          global: true,
        }),
        LoggerModule,
        BridgesModule,
        PipelineModule,
        SegmentsModule,
      ],
    };
  }
}
