import { DuplicateJobError, JobNotFoundError, TerminalStateError } from '../../modules/errors';
import { formatISODate } from '../../modules/utils';
import { ILogger } from '../logger';
import {
  JobOutcome,
  JobStatus,
  JobType,
  ProcessingRecord,
  StatusRecord,
  TerminalRecord } from '../../types/job';
import { RecordStore } from './store';

class MemoryRecordStore extends RecordStore {
  private records: Map<string, StatusRecord> = new Map();
  private expirations: Map<string, NodeJS.Timeout> = new Map();
  private retention: number;
  private logger: ILogger;

  /**
   * @param retention - ms to keep a terminal record before eviction; -1 keeps it forever
   */
  constructor(logger: ILogger, retention = -1) {
    super();
    this.logger = logger;
    this.retention = retention;
  }

  async create(jobId: string, type: JobType): Promise<ProcessingRecord> {
    if (this.records.has(jobId)) {
      throw new DuplicateJobError(jobId);
    }
    const record: ProcessingRecord = {
      job_id: jobId,
      type,
      status: JobStatus.PROCESSING,
      created_at: formatISODate(),
    };
    this.records.set(jobId, record);
    return structuredClone(record);
  }

  async get(jobId: string): Promise<StatusRecord | undefined> {
    const record = this.records.get(jobId);
    return record && structuredClone(record);
  }

  async setTerminal(jobId: string, outcome: JobOutcome): Promise<TerminalRecord> {
    const current = this.records.get(jobId);
    if (!current) {
      throw new JobNotFoundError(jobId);
    }
    if (current.status !== JobStatus.PROCESSING) {
      throw new TerminalStateError(jobId, current.status);
    }
    const base = {
      job_id: current.job_id,
      type: current.type,
      created_at: current.created_at,
      updated_at: formatISODate(),
    };
    //built in full before the single assignment below
    const record: TerminalRecord = outcome.status === JobStatus.COMPLETED
      ? { ...base, status: JobStatus.COMPLETED, result: structuredClone(outcome.result) }
      : { ...base, status: JobStatus.FAILED, error: structuredClone(outcome.error) };
    this.records.set(jobId, record);
    this.registerJobForCleanup(jobId);
    return structuredClone(record);
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  async clear(): Promise<void> {
    for (const timer of this.expirations.values()) {
      clearTimeout(timer);
    }
    this.expirations.clear();
    this.records.clear();
  }

  private registerJobForCleanup(jobId: string): void {
    if (this.retention < 0) {
      return;
    }
    const timer = setTimeout(() => {
      this.expirations.delete(jobId);
      this.records.delete(jobId);
      this.logger.debug(`store-evicted ${jobId}`);
    }, this.retention);
    timer.unref();
    this.expirations.set(jobId, timer);
  }
}

export { MemoryRecordStore };
