import { PipelineError, ScoreRangeError, errorMessage } from '../../modules/errors';
import { ChainService, toJobDetailsSnapshot, isEmptyJob } from '../chain';
import { InferenceService } from '../inference';
import { ILogger } from '../logger';
import { ChainJobDetails, JobDetailsSnapshot } from '../../types/chain';
import { JobErrorCode, JobOutcome, JobStatus } from '../../types/job';
import { buildValidationContext } from './context';

const DEFAULT_VERIFIER_AGENT_ID = 0n;

type CrossValidationInput = {
  jobRef: string;           //normalized 0x + 64 hex
  txHash?: string;          //when present the request event must be found first
  verifierAgentId?: bigint;
};

/**
 * Cross-validation of an on-chain job. Steps run strictly in order and
 * the first failure ends the run:
 *   1. confirm the CrossValidationRequested event (only with a tx hash)
 *   2. read the job from the jobs module
 *   3. render the scoring context
 *   4. score it with the inference backend
 *   5. record the score on the registry module
 */
class ValidatorService {
  chain: ChainService;
  inference: InferenceService;
  logger: ILogger;

  constructor(chain: ChainService, inference: InferenceService, logger: ILogger) {
    this.chain = chain;
    this.inference = inference;
    this.logger = logger;
  }

  async run(trackingId: string, input: CrossValidationInput): Promise<JobOutcome> {
    try {
      const eventFound = await this.confirmEvent(input);
      const job = await this.retrieveJob(input.jobRef);
      const details = toJobDetailsSnapshot(job);
      const context = buildValidationContext(input.jobRef, job);
      const score = await this.scoreJob(context, details);
      const verifierAgentId = input.verifierAgentId ?? DEFAULT_VERIFIER_AGENT_ID;
      const txHash = await this.writeBack(job.agentId, verifierAgentId, score, details);
      this.logger.info(`validator-completed ${trackingId} score=${score} tx=${txHash}`);
      return {
        status: JobStatus.COMPLETED,
        result: {
          job_id: input.jobRef,
          verifier_agent_id: verifierAgentId.toString(),
          ai_score: score,
          reputation_tx_id: txHash,
          event_found: eventFound,
          job_details: details,
        },
      };
    } catch (err) {
      if (!(err instanceof PipelineError)) {
        throw err;
      }
      this.logger.warn(`validator-failed ${trackingId} [${err.code}] ${err.message}`);
      return {
        status: JobStatus.FAILED,
        error: {
          code: err.code,
          message: err.message,
          ...(err.jobDetails ? { job_details: err.jobDetails } : {}),
        },
      };
    }
  }

  async confirmEvent(input: CrossValidationInput): Promise<boolean> {
    if (!input.txHash) {
      this.logger.debug(`validator-event skipped for ${input.jobRef}`);
      return false;
    }
    let found = false;
    try {
      found = await this.chain.findCrossValidationEvent({
        txHash: input.txHash,
        jobRef: input.jobRef,
        verifierAgentId: input.verifierAgentId,
      });
    } catch (err) {
      this.logger.error(`validator-event lookup failed for ${input.txHash}: ${errorMessage(err)}`);
    }
    if (!found) {
      throw new PipelineError(JobErrorCode.EVENT_NOT_FOUND, 'Event not found');
    }
    return true;
  }

  async retrieveJob(jobRef: string): Promise<ChainJobDetails> {
    let job: ChainJobDetails | null = null;
    try {
      job = await this.chain.readJob(jobRef);
    } catch (err) {
      this.logger.error(`validator-job read failed for ${jobRef}: ${errorMessage(err)}`);
    }
    if (!job) {
      throw new PipelineError(JobErrorCode.JOB_NOT_FOUND, 'Job not found');
    }
    if (isEmptyJob(job)) {
      throw new PipelineError(
        JobErrorCode.JOB_NO_DATA,
        'Job exists but has no valid data',
        toJobDetailsSnapshot(job),
      );
    }
    return job;
  }

  async scoreJob(context: string, details: JobDetailsSnapshot): Promise<number> {
    let score: number | null = null;
    try {
      score = await this.inference.score(context);
    } catch (err) {
      this.logger.error(`validator-score inference failed: ${errorMessage(err)}`);
    }
    if (score === null) {
      throw new PipelineError(JobErrorCode.SCORE_FAILED, 'Failed to get AI validation score', details);
    }
    return score;
  }

  async writeBack(
    agentId: bigint,
    verifierAgentId: bigint,
    score: number,
    details: JobDetailsSnapshot,
  ): Promise<string> {
    try {
      return await this.chain.writeScore(agentId, verifierAgentId, score);
    } catch (err) {
      if (err instanceof ScoreRangeError) {
        throw err;
      }
      throw new PipelineError(
        JobErrorCode.WRITE_BACK_FAILED,
        `Failed to record reputation score: ${errorMessage(err)}`,
        details,
      );
    }
  }
}

export { CrossValidationInput, ValidatorService };
