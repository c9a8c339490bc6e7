import { JobDetailsSnapshot } from '../types/chain';
import { JobErrorCode } from '../types/job';

class ArbiterError extends Error {
  code: string;
  details?: unknown;

  constructor(code: string, message: string, details?: unknown) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = 'ArbiterError';
  }
}

//rejected at submission; never enters the job lifecycle
class ValidationError extends ArbiterError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

class JobNotFoundError extends ArbiterError {
  constructor(jobId: string) {
    super('JOB_NOT_FOUND', 'Job not found', { jobId });
    this.name = 'JobNotFoundError';
  }
}

class ConfigurationError extends ArbiterError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message);
    this.name = 'ConfigurationError';
  }
}

class DuplicateJobError extends ArbiterError {
  constructor(jobId: string) {
    super('DUPLICATE_JOB', `Duplicate job: ${jobId}`);
    this.name = 'DuplicateJobError';
  }
}

class TerminalStateError extends ArbiterError {
  constructor(jobId: string, status: string) {
    super('TERMINAL_STATE', `Job ${jobId} is already ${status}`);
    this.name = 'TerminalStateError';
  }
}

class ScoreRangeError extends ArbiterError {
  constructor(score: number) {
    super('SCORE_RANGE', `Score must be between 0 and 100, got ${score}`);
    this.name = 'ScoreRangeError';
  }
}

//a failed pipeline step; becomes the `error` of a failed record
class PipelineError extends ArbiterError {
  declare code: JobErrorCode;
  jobDetails?: JobDetailsSnapshot;

  constructor(code: JobErrorCode, message: string, jobDetails?: JobDetailsSnapshot) {
    super(code, message);
    this.jobDetails = jobDetails;
    this.name = 'PipelineError';
  }
}

function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

export {
  ArbiterError,
  ConfigurationError,
  DuplicateJobError,
  JobNotFoundError,
  PipelineError,
  ScoreRangeError,
  TerminalStateError,
  ValidationError,
  errorMessage,
};
