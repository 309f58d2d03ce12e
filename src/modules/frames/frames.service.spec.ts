import { FramesService, frameObjectKey } from './frames.service';
import { FrameSamplerService, SampledFrame } from '../media/frame-sampler.service';
import { FakeObjectStore, FakeProcessRunner, InMemoryRowStore, testConfig } from '../../../test/fakes';

function frames(count: number): SampledFrame[] {
  return Array.from({ length: count }, (_, i) => ({
    timestampSeconds: i,
    image: Buffer.from(`jpeg-${i}`),
  }));
}

describe('FramesService', () => {
  let sampler: FrameSamplerService;
  let objectStore: FakeObjectStore;
  let rowStore: InMemoryRowStore;
  let service: FramesService;

  beforeEach(() => {
    const config = testConfig();
    sampler = new FrameSamplerService(
      config,
      new FakeProcessRunner(async () => {
        throw new Error('not used');
      }),
    );
    objectStore = new FakeObjectStore();
    rowStore = new InMemoryRowStore();
    service = new FramesService(sampler, objectStore, rowStore, config);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('builds keys as <id>/frame_<sec>.jpg', () => {
    expect(frameObjectKey(42, 7)).toBe('42/frame_7.jpg');
    expect(frameObjectKey('a1b2', 0)).toBe('a1b2/frame_0.jpg');
  });

  it('uploads every frame and inserts rows in ascending order', async () => {
    jest.spyOn(sampler, 'sample').mockResolvedValue(frames(3));

    await expect(service.processVideoFrames(9, Buffer.from('video'))).resolves.toBe(3);

    expect(objectStore.attempts).toEqual(['9/frame_0.jpg', '9/frame_1.jpg', '9/frame_2.jpg']);
    expect(objectStore.objects.get('9/frame_2.jpg')).toEqual({
      body: Buffer.from('jpeg-2'),
      contentType: 'image/jpeg',
    });
    expect(rowStore.rows('frame').map(({ id: _id, ...row }) => row)).toEqual([
      { transcript_id: 9, frame_timestamp: 0, frame_storage_url: 'https://cdn.test/frames/9/frame_0.jpg' },
      { transcript_id: 9, frame_timestamp: 1, frame_storage_url: 'https://cdn.test/frames/9/frame_1.jpg' },
      { transcript_id: 9, frame_timestamp: 2, frame_storage_url: 'https://cdn.test/frames/9/frame_2.jpg' },
    ]);
    expect(rowStore.calls).toEqual(['insert:frame']);
  });

  it('writes null urls for every frame when storage is down', async () => {
    jest.spyOn(sampler, 'sample').mockResolvedValue(frames(4));
    objectStore.fail = () => true;

    await service.processVideoFrames(5, Buffer.from('video'));

    const rows = rowStore.rows('frame');
    expect(rows).toHaveLength(4);
    expect(rows.map((r) => r.frame_storage_url)).toEqual([null, null, null, null]);
    expect(rows.map((r) => r.frame_timestamp)).toEqual([0, 1, 2, 3]);
  });

  it('keeps successful urls beside failed ones', async () => {
    jest.spyOn(sampler, 'sample').mockResolvedValue(frames(3));
    objectStore.fail = (key) => key.endsWith('frame_1.jpg');

    await service.processVideoFrames(5, Buffer.from('video'));

    expect(rowStore.rows('frame').map((r) => r.frame_storage_url)).toEqual([
      'https://cdn.test/frames/5/frame_0.jpg',
      null,
      'https://cdn.test/frames/5/frame_2.jpg',
    ]);
  });

  it('skips the insert when no frames were sampled', async () => {
    jest.spyOn(sampler, 'sample').mockResolvedValue([]);

    await expect(service.processVideoFrames(1, Buffer.from('video'))).resolves.toBe(0);
    expect(rowStore.calls).toEqual([]);
  });

  it('stores an image as the frame at second 0 with its own content type', async () => {
    const record = await service.saveImageFrame(3, Buffer.from('png-bytes'), 'image/png');

    expect(record).toEqual({
      transcript_id: 3,
      frame_timestamp: 0,
      frame_storage_url: 'https://cdn.test/frames/3/frame_0.jpg',
    });
    expect(objectStore.objects.get('3/frame_0.jpg')?.contentType).toBe('image/png');
    expect(rowStore.rows('frame')).toHaveLength(1);
  });

  it('reports an upload failure as a result instead of throwing', async () => {
    objectStore.fail = () => true;

    const result = await service.uploadFrame(2, 4, Buffer.from('jpeg'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('bucket unavailable for 2/frame_4.jpg');
    }
  });
});
