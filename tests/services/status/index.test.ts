import { JobNotFoundError } from '../../../modules/errors';
import { Ed25519Signer, SigningService, verifyEnvelope } from '../../../services/signer';
import { StatusService } from '../../../services/status';
import { MemoryRecordStore } from '../../../services/store';
import { JobStatus, JobType } from '../../../types/job';
import { createLogger } from '../../$setup/fakes';

describe('StatusService', () => {
  let store: MemoryRecordStore;

  beforeEach(async () => {
    store = new MemoryRecordStore(createLogger());
    await store.create('job-1', JobType.VERIFICATION);
  });

  it('should throw JobNotFoundError for an unknown id', async () => {
    const status = new StatusService(store, new SigningService(null, createLogger()), createLogger());
    await expect(status.get('missing')).rejects.toThrow(JobNotFoundError);
  });

  it('should return the bare record without a signer', async () => {
    const status = new StatusService(store, new SigningService(null, createLogger()), createLogger());
    expect(await status.get('job-1')).toEqual({
      job_id: 'job-1',
      type: JobType.VERIFICATION,
      status: JobStatus.PROCESSING,
      created_at: expect.any(String),
    });
  });

  it('should sign every read of the current record', async () => {
    const status = new StatusService(store, new SigningService(Ed25519Signer.generate(), createLogger()), createLogger());
    const processing = await status.get('job-1');
    expect(verifyEnvelope({ ...processing })).toBe(true);

    await store.setTerminal('job-1', {
      status: JobStatus.COMPLETED,
      result: { verdict: 'YES', word_count: 9, reading_time: 1 },
    });
    const completed = await status.get('job-1');
    expect(completed).toMatchObject({ status: JobStatus.COMPLETED });
    expect(verifyEnvelope({ ...completed })).toBe(true);
  });
});
