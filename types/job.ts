import { JobDetailsSnapshot } from './chain';

export enum JobStatus {
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

export enum JobType {
  VERIFICATION = 'verification', //free-text dispute verdict
  VALIDATION = 'validation',     //on-chain cross-validation
}

//deterministic codes for every way a background job can fail
export enum JobErrorCode {
  INFERENCE_FAILED = 'INFERENCE_FAILED',
  EVENT_NOT_FOUND = 'EVENT_NOT_FOUND',
  JOB_NOT_FOUND = 'JOB_NOT_FOUND',
  JOB_NO_DATA = 'JOB_NO_DATA',
  SCORE_FAILED = 'SCORE_FAILED',
  WRITE_BACK_FAILED = 'WRITE_BACK_FAILED',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export type VerificationResult = {
  verdict: string;
  word_count: number;
  reading_time: number; //whole minutes, never below 1
};

export type ValidationResult = {
  job_id: string;            //normalized on-chain job reference (0x + 64 hex)
  verifier_agent_id: string; //decimal; '0' when none was supplied
  ai_score: number;
  reputation_tx_id: string;
  event_found: boolean;
  job_details: JobDetailsSnapshot;
};

export type JobResult = VerificationResult | ValidationResult;

export type JobError = {
  code: JobErrorCode;
  message: string;
  job_details?: JobDetailsSnapshot; //partial context gathered before the failing step
};

type RecordBase = {
  job_id: string;
  type: JobType;
  created_at: string; //ISO; set once at submission
};

export type ProcessingRecord = RecordBase & {
  status: JobStatus.PROCESSING;
};

export type CompletedRecord = RecordBase & {
  status: JobStatus.COMPLETED;
  updated_at: string;
  result: JobResult;
};

export type FailedRecord = RecordBase & {
  status: JobStatus.FAILED;
  updated_at: string;
  error: JobError;
};

export type TerminalRecord = CompletedRecord | FailedRecord;

export type StatusRecord = ProcessingRecord | TerminalRecord;

//what a pipeline hands back to the task executor; the executor owns the write
export type JobOutcome =
  | { status: JobStatus.COMPLETED; result: JobResult }
  | { status: JobStatus.FAILED; error: JobError };

export type JobWork = () => Promise<JobOutcome>;
