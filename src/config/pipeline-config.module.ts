// sign-clip-pipeline/src/config/pipeline-config.module.ts
import { DynamicModule, Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import pipelineConfig, { PIPELINE_CONFIG, PipelineConfig } from './pipeline.config';

/**
 * Provides the resolved PipelineConfig everywhere.
 * Values come from the environment (and .env), CLI flags arrive as overrides.
 */
@Global()
@Module({})
export class PipelineConfigModule {
  static forRoot(overrides: Partial<PipelineConfig> = {}): DynamicModule {
    return {
      module: PipelineConfigModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          load: [pipelineConfig],
        }),
      ],
      providers: [
        {
          provide: PIPELINE_CONFIG,
          inject: [ConfigService],
          useFactory: (config: ConfigService): PipelineConfig => ({
            ...config.getOrThrow<PipelineConfig>('pipeline'),
            ...overrides,
          }),
        },
      ],
      exports: [PIPELINE_CONFIG],
    };
  }
}
