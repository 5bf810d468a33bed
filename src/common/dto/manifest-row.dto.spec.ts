import { validateManifestRow } from './manifest-row.dto';

const valid = {
  id: '12',
  url: ' https://youtu.be/abc ',
  frame_start: '30',
  frame_end: '90',
  fps: '29.97',
  dataset_type: 'WLASL',
};

describe('validateManifestRow', () => {
  it('coerces and trims a valid row', () => {
    expect(validateManifestRow(valid)).toEqual({
      ok: true,
      row: { id: 12, url: 'https://youtu.be/abc', frameStart: 30, frameEnd: 90, fps: 29.97, datasetTag: 'WLASL' },
    });
  });

  it('treats a blank dataset type as missing', () => {
    const result = validateManifestRow({ ...valid, dataset_type: ' ' });

    expect(result.ok && result.row.datasetTag).toBeUndefined();
  });

  it('accepts -1 as an open end', () => {
    const result = validateManifestRow({ ...valid, frame_end: '-1' });

    expect(result.ok).toBe(true);
  });

  it('accepts a negative start frame and checks the end against the clamped start', () => {
    expect(validateManifestRow({ ...valid, frame_start: '-1', frame_end: '60' })).toEqual({
      ok: true,
      row: { id: 12, url: 'https://youtu.be/abc', frameStart: -1, frameEnd: 60, fps: 29.97, datasetTag: 'WLASL' },
    });
    expect(validateManifestRow({ ...valid, frame_start: '-1', frame_end: '0' })).toEqual({
      ok: false,
      error: 'InvalidManifestRow',
      message: 'Invalid data: frame_end (0) must be -1 or greater than the adjusted frame_start (0)',
    });
  });

  it.each([
    [{ id: 'abc' }, 'id must be an integer'],
    [{ id: '-4' }, 'id must not be negative'],
    [{ frame_start: '1.5' }, 'frame_start must be an integer'],
    [{ frame_end: '' }, 'frame_end must be an integer'],
    [{ fps: '-30' }, 'FPS must be positive'],
    [{ url: '' }, 'Missing URL'],
  ])('rejects %p', (overrides, message) => {
    const result = validateManifestRow({ ...valid, ...overrides });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe('InvalidManifestRow');
      expect(result.message).toContain(message);
    }
  });

  it('checks the window against the adjusted start frame', () => {
    // WLASL start 31 becomes 30, so an end of 30 is empty
    expect(validateManifestRow({ ...valid, frame_start: '31', frame_end: '30' })).toEqual({
      ok: false,
      error: 'InvalidManifestRow',
      message: 'Invalid data: frame_end (30) must be -1 or greater than the adjusted frame_start (30)',
    });
    expect(validateManifestRow({ ...valid, frame_start: '31', frame_end: '31' }).ok).toBe(true);
  });
});
