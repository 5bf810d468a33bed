import * as fs from 'fs/promises';
import * as path from 'path';
import { Test } from '@nestjs/testing';
import { SegmentCutterService, parseSegmentArgument } from './segment-cutter.service';
import { SegmentsModule } from './segments.module';
import { MalformedTimeError } from '../common/errors';
import { HTTP_CLIENT } from '../downloader/direct-stream.fetcher';
import { FakeEnvironmentModule, FakeTools, createFakeTools, makeTempDir, removeTempDir, testConfig } from '../../test/fakes/testing-module';
import { createFakeHttp } from '../../test/fakes/fake-http';
import { readFakeMedia } from '../../test/fakes/fake-media';

describe('parseSegmentArgument', () => {
  it('splits start and end', () => {
    expect(parseSegmentArgument('0:05-0:10')).toEqual(['0:05', '0:10']);
  });

  it('rejects anything else', () => {
    expect(() => parseSegmentArgument('0:05')).toThrow(MalformedTimeError);
    expect(() => parseSegmentArgument('1-2-3')).toThrow(MalformedTimeError);
  });
});

describe('SegmentCutterService', () => {
  let root: string;
  let tools: FakeTools;
  let cutter: SegmentCutterService;

  beforeEach(async () => {
    root = await makeTempDir();
    tools = createFakeTools();
    tools.downloader.setDefault({ kind: 'file', ext: 'mp4', duration: 120 });
    const moduleRef = await Test.createTestingModule({
      imports: [FakeEnvironmentModule.register(testConfig(root), tools), SegmentsModule],
    })
      .overrideProvider(HTTP_CLIENT)
      .useValue(createFakeHttp().client)
      .compile();
    cutter = moduleRef.get(SegmentCutterService);
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('cuts each segment from one download and removes the source', async () => {
    const base = path.join(root, 'lesson');

    const report = await cutter.cutSegments('https://youtu.be/lesson', [['0:05', '0:10'], ['1:00', '65.5']], base);

    expect(tools.downloader.calls).toEqual([{ url: 'https://youtu.be/lesson', outputTemplate: `${base}_full.%(ext)s` }]);
    expect(report.segments).toEqual([
      { index: 1, status: 'cut', outputPath: `${base}_segment_1.mp4`, start: 5, end: 10 },
      { index: 2, status: 'cut', outputPath: `${base}_segment_2.mp4`, start: 60, end: 65.5 },
    ]);
    await expect(readFakeMedia(`${base}_segment_2.mp4`)).resolves.toMatchObject({ duration: 5.5 });
    expect((await fs.readdir(root)).sort()).toEqual(['lesson_segment_1.mp4', 'lesson_segment_2.mp4']);
  });

  it('skips malformed segments and continues with the rest', async () => {
    const base = path.join(root, 'clip');

    const report = await cutter.cutSegments('https://youtu.be/x', [['a:b:c', '0:10'], ['0:01', '0:02']], base, {
      keepSource: true,
    });

    expect(report.segments).toEqual([
      { index: 1, status: 'skipped', reason: 'Malformed time "a:b:c": "a" is not numeric' },
      { index: 2, status: 'cut', outputPath: `${base}_segment_2.mp4`, start: 1, end: 2 },
    ]);
    expect((await fs.readdir(root)).sort()).toEqual(['clip_full.mp4', 'clip_segment_2.mp4']);
  });

  it('reports failed cuts per segment', async () => {
    const report = await cutter.cutSegments('https://youtu.be/x', [['3:00', '3:10']], path.join(root, 'late'));

    expect(report.segments).toEqual([
      { index: 1, status: 'failed', error: 'StartBeyondDuration', message: 'Start time (180s) is beyond video duration (120s)' },
    ]);
  });

  it('returns the download error when the source cannot be fetched', async () => {
    tools.downloader.setDefault({ kind: 'fail', stderr: 'ERROR: gone' });

    const report = await cutter.cutSegments('https://youtu.be/x', [['0', '1']], path.join(root, 'missing'));

    expect(report).toEqual({
      sourcePath: null,
      downloadError: 'All download methods failed for https://youtu.be/x: [extractor] exited with code 1: ERROR: gone',
      segments: [],
    });
  });
});
