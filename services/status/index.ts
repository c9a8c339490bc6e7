import { JobNotFoundError } from '../../modules/errors';
import { ILogger } from '../logger';
import { SigningService } from '../signer';
import { RecordStore } from '../store';
import { StatusRecord } from '../../types/job';
import { SignedEnvelope } from '../../types/signer';

class StatusService {
  store: RecordStore;
  signing: SigningService;
  logger: ILogger;

  constructor(store: RecordStore, signing: SigningService, logger: ILogger) {
    this.store = store;
    this.signing = signing;
    this.logger = logger;
  }

  //signed fresh on every read; signatures are never cached
  async get(jobId: string): Promise<SignedEnvelope<StatusRecord>> {
    const record = await this.store.get(jobId);
    if (!record) {
      this.logger.debug(`status-miss ${jobId}`);
      throw new JobNotFoundError(jobId);
    }
    return this.signing.sign(record);
  }
}

export { StatusService };
