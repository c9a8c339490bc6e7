import { errorMessage } from '../../modules/errors';
import { ILogger } from '../logger';
import { RecordStore } from '../store';
import { JobErrorCode, JobOutcome, JobStatus, JobWork } from '../../types/job';

/**
 * Fire-and-forget executor: each scheduled unit of work runs once on a
 * later tick and its outcome is written to the store exactly once.
 * Nothing a unit throws escapes as an unhandled rejection.
 */
class TaskService {
  store: RecordStore;
  logger: ILogger;
  private inflight: Set<Promise<void>> = new Set();

  constructor(store: RecordStore, logger: ILogger) {
    this.store = store;
    this.logger = logger;
  }

  get pending(): number {
    return this.inflight.size;
  }

  schedule(jobId: string, work: JobWork): void {
    const task: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.execute(jobId, work))
      .finally(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);
  }

  //resolves once nothing is in flight (including work scheduled meanwhile)
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  private async execute(jobId: string, work: JobWork): Promise<void> {
    let outcome: JobOutcome;
    try {
      outcome = await work();
    } catch (err) {
      this.logger.error(`task-crashed ${jobId}: ${errorMessage(err)}`, {
        stack: err instanceof Error ? err.stack : undefined,
      });
      outcome = {
        status: JobStatus.FAILED,
        error: { code: JobErrorCode.INTERNAL_ERROR, message: errorMessage(err) },
      };
    }
    try {
      await this.store.setTerminal(jobId, outcome);
      this.logger.debug(`task-${outcome.status} ${jobId}`);
    } catch (err) {
      this.logger.error(`task-terminal-write-failed ${jobId}: ${errorMessage(err)}`);
    }
  }
}

export { TaskService };
