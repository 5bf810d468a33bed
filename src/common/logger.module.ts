import { Global, Module } from '@nestjs/common';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { WinstonLoggerService, createWinstonLogger } from './logger';

@Global()
@Module({
  providers: [
    {
      provide: WinstonLoggerService,
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig) =>
        new WinstonLoggerService(createWinstonLogger({ logDir: config.logDir, level: config.logLevel })),
    },
  ],
  exports: [WinstonLoggerService],
})
export class LoggerModule {}
