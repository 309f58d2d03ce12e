import { TranscriptsService } from './transcripts.service';
import { FrameStatus } from '../../database/entities';
import { StoreError } from '../../common/errors/ingestion.errors';
import { InMemoryRowStore, testConfig } from '../../../test/fakes';

describe('TranscriptsService', () => {
  let rowStore: InMemoryRowStore;
  let service: TranscriptsService;

  beforeEach(() => {
    rowStore = new InMemoryRowStore();
    service = new TranscriptsService(rowStore, testConfig());
  });

  describe('allocateUploadNumber', () => {
    it('starts at 1 on an empty table', async () => {
      await expect(service.allocateUploadNumber()).resolves.toBe(1);
      expect(rowStore.calls).toEqual(['selectMax:transcript.upload_number']);
    });

    it('returns the current maximum plus one', async () => {
      rowStore.seed('transcript', [{ id: 90, upload_number: 4 }, { id: 91, upload_number: 11 }]);

      await expect(service.allocateUploadNumber()).resolves.toBe(12);
    });
  });

  describe('createTranscript', () => {
    it('returns the id assigned by the store', async () => {
      const id = await service.createTranscript({
        name: 'Ada',
        phoneNumber: '555-0100',
        transcript: '[No audio found]',
        upload_number: 1,
        frame_status: FrameStatus.PROCESSING,
      });

      expect(id).toBe(1);
      expect(rowStore.rows('transcript')[0]).toMatchObject({ name: 'Ada', upload_number: 1 });
    });

    it('surfaces store failures as StoreError', async () => {
      rowStore.failInsert = () => true;

      await expect(
        service.createTranscript({
          name: 'Ada',
          phoneNumber: '555-0100',
          transcript: 'x',
          upload_number: 1,
          frame_status: FrameStatus.PROCESSING,
        }),
      ).rejects.toThrow(StoreError);
    });
  });

  it('updates the frame status of a transcript', async () => {
    rowStore.seed('transcript', [{ id: 3, frame_status: 'processing' }]);

    await service.updateFrameStatus(3, FrameStatus.FAILED);

    expect(rowStore.rows('transcript')[0].frame_status).toBe('failed');
  });

  describe('getTranscript', () => {
    it('returns the transcript with frames ordered by timestamp', async () => {
      rowStore.seed('transcript', [
        {
          id: 7,
          name: 'Ada',
          phoneNumber: '555-0100',
          transcript: '[00:00:00,000 --> 00:00:01,000] hi',
          upload_number: 2,
          frame_status: 'completed',
          created_at: '2024-05-01T10:00:00Z',
        },
      ]);
      rowStore.seed('frame', [
        { id: 20, transcript_id: 7, frame_timestamp: 1, frame_storage_url: null },
        { id: 21, transcript_id: 7, frame_timestamp: 0, frame_storage_url: 'https://cdn.test/frames/7/frame_0.jpg' },
        { id: 22, transcript_id: 8, frame_timestamp: 0, frame_storage_url: 'https://cdn.test/frames/8/frame_0.jpg' },
      ]);

      await expect(service.getTranscript('7')).resolves.toEqual({
        transcript: {
          id: 7,
          name: 'Ada',
          phoneNumber: '555-0100',
          transcript: '[00:00:00,000 --> 00:00:01,000] hi',
          upload_number: 2,
          frame_status: FrameStatus.COMPLETED,
          created_at: '2024-05-01T10:00:00Z',
        },
        frames: [
          { transcript_id: 7, frame_timestamp: 0, frame_storage_url: 'https://cdn.test/frames/7/frame_0.jpg' },
          { transcript_id: 7, frame_timestamp: 1, frame_storage_url: null },
        ],
      });
    });

    it('returns null without querying for an id that is neither numeric nor a uuid', async () => {
      await expect(service.getTranscript('abc')).resolves.toBeNull();
      await expect(service.getTranscript('7; drop')).resolves.toBeNull();
      await expect(service.getTranscript(-1)).resolves.toBeNull();
      expect(rowStore.calls).toEqual([]);
    });

    it('looks up uuid ids', async () => {
      const id = '3f2b8c1e-9a4d-4e6f-8b2a-1c3d5e7f9a0b';
      rowStore.seed('transcript', [{ id, name: 'Ada', frame_status: 'processing' }]);

      const result = await service.getTranscript(id);

      expect(result?.transcript.id).toBe(id);
      expect(rowStore.calls).toEqual(['select:transcript', 'select:frame']);
    });

    it('returns null for an unknown id', async () => {
      await expect(service.getTranscript(404)).resolves.toBeNull();
      expect(rowStore.calls).toEqual(['select:transcript']);
    });
  });
});
