import * as fs from 'fs/promises';
import * as path from 'path';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';
import { PipelineConfig } from '../../src/config/pipeline.config';
import { HTTP_CLIENT } from '../../src/downloader/direct-stream.fetcher';
import { PipelineModule } from '../../src/pipeline/pipeline.module';
import { FakeHttp, FakeRoute, createFakeHttp } from './fake-http';
import { FakeEnvironmentModule, FakeTools, createFakeTools, makeTempDir, removeTempDir, testConfig } from './testing-module';

export interface PipelineHarness {
  root: string;
  config: PipelineConfig;
  tools: FakeTools;
  http: FakeHttp;
  moduleRef: TestingModule;
  close(): Promise<void>;
}

export async function createPipelineHarness(
  overrides: Partial<PipelineConfig> = {},
  routes: Record<string, FakeRoute> = {},
): Promise<PipelineHarness> {
  const root = await makeTempDir();
  const config = testConfig(root, overrides);
  const tools = createFakeTools();
  const http = createFakeHttp(routes);

  const moduleRef = await Test.createTestingModule({
    imports: [EventEmitterModule.forRoot(), FakeEnvironmentModule.register(config, tools), PipelineModule],
  })
    .overrideProvider(HTTP_CLIENT)
    .useValue(http.client)
    .compile();
  await moduleRef.init();

  return {
    root,
    config,
    tools,
    http,
    moduleRef,
    close: async () => {
      await moduleRef.close();
      await removeTempDir(root);
    },
  };
}

export const MANIFEST_HEADER = 'id,url,frame_start,frame_end,fps,dataset_type,filename';

export async function writeManifest(filePath: string, lines: string[]): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, [MANIFEST_HEADER, ...lines].join('\n') + '\n');
}
