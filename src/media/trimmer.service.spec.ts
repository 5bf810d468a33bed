import * as path from 'path';
import { Test } from '@nestjs/testing';
import { MediaModule } from './media.module';
import { TrimmerService, buildTrimArgs, formatSeconds, planTrimWindow } from './trimmer.service';
import { DEFAULT_CUT_ARGS } from '../config/pipeline.config';
import { fileExists } from '../common/utils/file.util';
import { FakeEnvironmentModule, FakeTools, createFakeTools, makeTempDir, removeTempDir, testConfig } from '../../test/fakes/testing-module';
import { readFakeMedia, writeFakeMedia } from '../../test/fakes/fake-media';

describe('planTrimWindow', () => {
  it('keeps a window inside the source', () => {
    expect(planTrimWindow(10, 1, 3)).toEqual({ ok: true, start: 1, end: 3, endClamped: false });
  });

  it('uses the duration as the end of an open window', () => {
    expect(planTrimWindow(10, 2)).toEqual({ ok: true, start: 2, end: 10, endClamped: false });
  });

  it('clamps an end past the duration', () => {
    expect(planTrimWindow(10, 8, 15)).toEqual({ ok: true, start: 8, end: 10, endClamped: true });
  });

  it('rejects inverted and negative windows', () => {
    expect(planTrimWindow(10, 3, 3)).toMatchObject({ ok: false, error: 'InvalidWindow' });
    expect(planTrimWindow(10, -1, 3)).toMatchObject({ ok: false, error: 'InvalidWindow' });
  });

  it('rejects a start at or after the duration', () => {
    expect(planTrimWindow(10, 10, 12)).toEqual({
      ok: false,
      error: 'StartBeyondDuration',
      message: 'Start time (10s) is beyond video duration (10s)',
    });
  });
});

describe('buildTrimArgs', () => {
  it('re-encodes with output seeking and copied timestamps', () => {
    expect(buildTrimArgs('/in.mp4', '/out.mp4', 1, 29 / 30 + 2, DEFAULT_CUT_ARGS)).toEqual([
      '-y', '-i', '/in.mp4',
      '-ss', '1', '-to', '2.966667',
      '-copyts', '-avoid_negative_ts', 'make_zero',
      '-c:v', 'libx264', '-preset', 'fast', '-crf', '23', '-c:a', 'aac', '-b:a', '128k',
      '/out.mp4',
    ]);
  });

  it('formats seconds without trailing zeros', () => {
    expect(formatSeconds(29 / 30)).toBe('0.966667');
    expect(formatSeconds(3)).toBe('3');
  });
});

describe('TrimmerService', () => {
  let root: string;
  let tools: FakeTools;
  let trimmer: TrimmerService;

  beforeEach(async () => {
    root = await makeTempDir();
    tools = createFakeTools();
    const moduleRef = await Test.createTestingModule({
      imports: [FakeEnvironmentModule.register(testConfig(root), tools), MediaModule],
    }).compile();
    trimmer = moduleRef.get(TrimmerService);
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('cuts the requested window', async () => {
    const source = path.join(root, 'src.mp4');
    const destination = path.join(root, 'out', '5.mp4');
    await writeFakeMedia(source, { duration: 10 });

    const result = await trimmer.trim(source, destination, 1, 3);

    expect(result).toEqual({ ok: true, outputPath: destination, start: 1, end: 3 });
    await expect(readFakeMedia(destination)).resolves.toEqual({ duration: 2, source, start: 1, end: 3 });
  });

  it('clamps the end to the measured duration', async () => {
    const source = path.join(root, 'src.mp4');
    const destination = path.join(root, 'out.mp4');
    await writeFakeMedia(source, { duration: 10 });

    const result = await trimmer.trim(source, destination, 8, 15);

    expect(result).toEqual({ ok: true, outputPath: destination, start: 8, end: 10 });
    expect(tools.transcoder.requests[0]).toEqual({ source, destination, start: 8, end: 10 });
  });

  it('fails with DurationUnknown when the source cannot be probed', async () => {
    const result = await trimmer.trim(path.join(root, 'missing.mp4'), path.join(root, 'out.mp4'), 0, 1);

    expect(result).toMatchObject({ ok: false, error: 'DurationUnknown' });
    expect(tools.transcoder.calls).toHaveLength(0);
  });

  it('does not run ffmpeg for a start beyond the source', async () => {
    const source = path.join(root, 'src.mp4');
    await writeFakeMedia(source, { duration: 2 });

    const result = await trimmer.trim(source, path.join(root, 'out.mp4'), 5, 6);

    expect(result).toMatchObject({ ok: false, error: 'StartBeyondDuration' });
    expect(tools.transcoder.calls).toHaveLength(0);
  });

  it('removes a partial output when ffmpeg fails', async () => {
    const source = path.join(root, 'src.mp4');
    const destination = path.join(root, 'out.mp4');
    await writeFakeMedia(source, { duration: 10 });
    tools.transcoder.behaviour = 'partial-then-fail';

    const result = await trimmer.trim(source, destination, 0, 1);

    expect(result).toEqual({ ok: false, error: 'TranscodeError', message: 'exited with code 1: Error while encoding' });
    await expect(fileExists(destination)).resolves.toBe(false);
  });

  it('reports EmptyOutput for a zero-length result', async () => {
    const source = path.join(root, 'src.mp4');
    const destination = path.join(root, 'out.mp4');
    await writeFakeMedia(source, { duration: 10 });
    tools.transcoder.behaviour = 'empty';

    const result = await trimmer.trim(source, destination, 0, 1);

    expect(result).toMatchObject({ ok: false, error: 'EmptyOutput' });
    await expect(fileExists(destination)).resolves.toBe(false);
  });

  it('maps a missing ffmpeg binary to ToolMissing', async () => {
    const source = path.join(root, 'src.mp4');
    await writeFakeMedia(source, { duration: 10 });
    tools.transcoder.behaviour = 'missing-binary';

    const result = await trimmer.trim(source, path.join(root, 'out.mp4'), 0, 1);

    expect(result).toEqual({ ok: false, error: 'ToolMissing', message: 'FFmpeg binary not found at: /fake/ffmpeg' });
  });
});
