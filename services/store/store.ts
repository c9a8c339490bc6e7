import { JobOutcome, JobType, ProcessingRecord, StatusRecord, TerminalRecord } from '../../types/job';

/**
 * The record store owns every StatusRecord. A record is created in the
 * `processing` state and receives exactly one terminal write; readers
 * see either the processing record or the complete terminal record.
 * Implementations may be swapped (sharded locks, a transactional table)
 * without touching the pipelines.
 */
abstract class RecordStore {
  abstract create(jobId: string, type: JobType): Promise<ProcessingRecord>;
  abstract get(jobId: string): Promise<StatusRecord | undefined>;
  abstract setTerminal(jobId: string, outcome: JobOutcome): Promise<TerminalRecord>;
  abstract count(): Promise<number>;
  abstract clear(): Promise<void>;
}

export { RecordStore };
