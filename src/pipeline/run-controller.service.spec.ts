import * as fs from 'fs/promises';
import * as path from 'path';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { RunControllerService } from './run-controller.service';
import { AuditLogService } from './audit-log.service';
import { PIPELINE_EVENTS, RowFinishedEvent } from './pipeline.events';
import { SetupError } from '../common/errors';
import { RunSummary } from '../common/interfaces/status.interface';
import { PipelineHarness, createPipelineHarness, writeManifest } from '../../test/fakes/pipeline-harness';
import { readFakeMedia } from '../../test/fakes/fake-media';

describe('RunControllerService', () => {
  let harness: PipelineHarness;
  let controller: RunControllerService;
  let auditLog: AuditLogService;
  let rowEvents: RowFinishedEvent[];

  beforeEach(async () => {
    harness = await createPipelineHarness();
    controller = harness.moduleRef.get(RunControllerService);
    auditLog = harness.moduleRef.get(AuditLogService);
    rowEvents = [];
    harness.moduleRef.get(EventEmitter2).on(PIPELINE_EVENTS.ROW_FINISHED, (event: RowFinishedEvent) => {
      rowEvents.push(event);
    });
  });

  afterEach(async () => {
    await harness.close();
  });

  it('processes a trimmed row and an open-ended row in order', async () => {
    await writeManifest(harness.config.manifestPath, [
      '1,https://youtu.be/a,30,90,30,MSASL,a.mp4',
      '2,https://youtu.be/b,0,-1,30,MSASL,b.mp4',
    ]);

    const summary = await controller.run();

    expect(summary).toMatchObject({ processed: 2, succeeded: 2, skipped: 0, failed: 0, cancelled: false });
    const videos = harness.config.outputDir;
    expect((await fs.readdir(videos)).sort()).toEqual(['1.mp4', '2.mp4']);
    await expect(readFakeMedia(path.join(videos, '1.mp4'))).resolves.toMatchObject({ start: 1, end: 3 });
    await expect(readFakeMedia(path.join(videos, '2.mp4'))).resolves.toEqual({ duration: 10 });
    expect(harness.tools.transcoder.calls).toHaveLength(1);

    const records = await auditLog.readRecords();
    expect(records.map((record) => [record.id, record.status])).toEqual([
      ['1', 'SUCCESS'],
      ['2', 'SUCCESS'],
    ]);
    expect(rowEvents.map((event) => [event.completed, event.total, event.record.id])).toEqual([
      [1, 2, '1'],
      [2, 2, '2'],
    ]);
  });

  it('skips everything on a second run over the same output', async () => {
    await writeManifest(harness.config.manifestPath, [
      '1,https://youtu.be/a,30,90,30,MSASL,a.mp4',
      '2,https://youtu.be/b,0,-1,30,MSASL,b.mp4',
      '3,https://youtu.be/c,0,30,30,WLASL,c.mp4',
    ]);
    await controller.run();
    const downloads = harness.tools.downloader.calls.length;

    const second = await controller.run();

    expect(second).toMatchObject({ processed: 3, succeeded: 0, skipped: 3, failed: 0 });
    expect(second.byStatus.SKIPPED_EXISTING).toBe(3);
    expect(harness.tools.downloader.calls).toHaveLength(downloads);
  });

  it('counts failures by status and keeps going', async () => {
    harness.tools.downloader.on('https://youtu.be/bad', { kind: 'fail' });
    await writeManifest(harness.config.manifestPath, [
      '1,https://youtu.be/bad,0,30,30,MSASL,a.mp4',
      'x,https://youtu.be/b,0,30,30,MSASL,b.mp4',
      '3,https://youtu.be/c,0,30,30,MSASL,c.mp4',
    ]);

    const summary = await controller.run();

    expect(summary).toMatchObject({ processed: 3, succeeded: 1, failed: 2 });
    expect(summary.byStatus).toEqual({
      SKIPPED_EXISTING: 0,
      INVALID_DATA: 1,
      FAILED_DOWNLOAD: 1,
      FAILED_CUT: 0,
      FAILED_POSTPROCESS: 0,
      SUCCESS: 1,
    });
  });

  it('refuses to start when the output directory cannot be created', async () => {
    // A path below a regular file can never become a directory
    const blocked = await createPipelineHarness({ outputDir: path.join(__filename, 'videos') });
    try {
      await writeManifest(blocked.config.manifestPath, ['1,https://youtu.be/a,0,30,30,MSASL,a.mp4']);

      await expect(blocked.moduleRef.get(RunControllerService).run()).rejects.toBeInstanceOf(SetupError);
      expect(blocked.tools.downloader.calls).toHaveLength(0);
      await expect(blocked.moduleRef.get(AuditLogService).readRecords()).resolves.toEqual([]);
    } finally {
      await blocked.close();
    }
  });

  it('runs rows on several workers without losing audit lines', async () => {
    await writeManifest(
      harness.config.manifestPath,
      Array.from({ length: 6 }, (_, i) => `${i},https://youtu.be/v${i},0,30,30,MSASL,v${i}.mp4`),
    );

    const summary = await controller.run({ concurrency: 3 });

    expect(summary.succeeded).toBe(6);
    const ids = (await auditLog.readRecords()).map((record) => record.id).sort();
    expect(ids).toEqual(['0', '1', '2', '3', '4', '5']);
  });

  it('stops submitting rows once the stop signal fires', async () => {
    await writeManifest(harness.config.manifestPath, [
      '1,https://youtu.be/a,0,30,30,MSASL,a.mp4',
      '2,https://youtu.be/b,0,30,30,MSASL,b.mp4',
      '3,https://youtu.be/c,0,30,30,MSASL,c.mp4',
    ]);
    const stop = new AbortController();
    harness.moduleRef.get(EventEmitter2).on(PIPELINE_EVENTS.ROW_FINISHED, () => stop.abort());

    const summary = await controller.run({ stopSignal: stop.signal });

    expect(summary).toMatchObject({ processed: 1, cancelled: true });
    await expect(auditLog.readRecords()).resolves.toHaveLength(1);
  });

  it('samples rows in test mode', async () => {
    await writeManifest(
      harness.config.manifestPath,
      Array.from({ length: 10 }, (_, i) => `${i},https://youtu.be/v${i},0,30,30,MSASL,v${i}.mp4`),
    );

    const summary = await controller.run({ mode: 'test', sampleSize: 4 });

    expect(summary.processed).toBe(4);
  });

  it('emits the summary when the run finishes', async () => {
    await writeManifest(harness.config.manifestPath, ['1,https://youtu.be/a,0,30,30,MSASL,a.mp4']);
    const finished: RunSummary[] = [];
    harness.moduleRef.get(EventEmitter2).on(PIPELINE_EVENTS.RUN_FINISHED, (summary: RunSummary) => {
      finished.push(summary);
    });

    const summary = await controller.run();

    expect(finished).toEqual([summary]);
  });

  it('fails setup when the manifest cannot be read', async () => {
    await expect(controller.run()).rejects.toBeInstanceOf(SetupError);
    expect(harness.tools.downloader.calls).toHaveLength(0);
  });
});
