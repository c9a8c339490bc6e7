import { ChainService, decodeJob } from '../../../services/chain';
import { InferenceService } from '../../../services/inference';
import { SCORING_SYSTEM_PROMPT } from '../../../services/inference/prompts';
import { ValidatorService } from '../../../services/validator';
import { buildValidationContext } from '../../../services/validator/context';
import { JobErrorCode, JobStatus } from '../../../types/job';
import {
  CREATOR,
  FakeChainClient,
  FakeInferenceClient,
  JOBS_MODULE,
  JOB_REF,
  MULTIHOP_ID,
  REGISTRY_MODULE,
  REQUEST_TX,
  WRITE_TX,
  ZERO_ADDRESS,
  createLogger,
  crossValidationLog,
  jobTuple } from '../../$setup/fakes';

const details = {
  creator: CREATOR,
  agent_id: '7',
  budget: '1000',
  description: 'Translate the whitepaper into Spanish',
  state: 3,
  created_at: 1700000000,
  accept_deadline: 1700003600,
  complete_deadline: 1700086400,
  multihop_id: MULTIHOP_ID,
  step: 1,
};

describe('ValidatorService', () => {
  let client: FakeChainClient;
  let inference: FakeInferenceClient;
  let validator: ValidatorService;

  beforeEach(() => {
    const logger = createLogger();
    client = new FakeChainClient();
    inference = new FakeInferenceClient('85');
    const chain = new ChainService(client, { jobsModuleAddress: JOBS_MODULE, registryModuleAddress: REGISTRY_MODULE }, logger);
    validator = new ValidatorService(chain, new InferenceService(inference, logger), logger);
    client.jobs.set(JOB_REF, jobTuple());
  });

  it('should score the job and record it without an event check', async () => {
    const outcome = await validator.run('val-1', { jobRef: JOB_REF });
    expect(outcome).toEqual({
      status: JobStatus.COMPLETED,
      result: {
        job_id: JOB_REF,
        verifier_agent_id: '0',
        ai_score: 85,
        reputation_tx_id: WRITE_TX,
        event_found: false,
        job_details: details,
      },
    });
    expect(client.submissions[0].args).toEqual([7n, 0n, 85]);
  });

  it('should confirm the request event before reading the job', async () => {
    client.logs.set(REQUEST_TX, [crossValidationLog(JOB_REF, 5n)]);
    const outcome = await validator.run('val-1', { jobRef: JOB_REF, txHash: REQUEST_TX, verifierAgentId: 5n });
    expect(outcome.status).toBe(JobStatus.COMPLETED);
    expect(outcome.status === JobStatus.COMPLETED && outcome.result).toMatchObject({
      verifier_agent_id: '5',
      event_found: true,
    });
    expect(client.submissions[0].args).toEqual([7n, 5n, 85]);
  });

  it('should render the fixed context for scoring', async () => {
    await validator.run('val-1', { jobRef: JOB_REF });
    const job = decodeJob(jobTuple());
    if (!job) {
      throw new Error('tuple did not decode');
    }
    const context = buildValidationContext(JOB_REF, job);
    expect(inference.calls).toEqual([{ system: SCORING_SYSTEM_PROMPT, user: context }]);
    expect(context).toContain(`Job ID: ${JOB_REF}\nCreator: ${CREATOR}\nAgent ID: 7\nBudget: 1000 (in smallest unit)\n`);
    expect(context).toContain('Created At: 1700000000 (timestamp)\n');
    expect(context).toContain(`Multihop ID: ${MULTIHOP_ID}\nStep: 1\n`);
  });

  describe('failures', () => {
    it('should fail with EVENT_NOT_FOUND when the transaction has no matching event', async () => {
      client.logs.set(REQUEST_TX, []);
      const outcome = await validator.run('val-1', { jobRef: JOB_REF, txHash: REQUEST_TX });
      expect(outcome).toEqual({
        status: JobStatus.FAILED,
        error: { code: JobErrorCode.EVENT_NOT_FOUND, message: 'Event not found' },
      });
      expect(client.calls).toHaveLength(0);
    });

    it('should fail with EVENT_NOT_FOUND when the receipt lookup errors', async () => {
      const outcome = await validator.run('val-1', { jobRef: JOB_REF, txHash: REQUEST_TX });
      expect(outcome.status === JobStatus.FAILED && outcome.error.code).toBe(JobErrorCode.EVENT_NOT_FOUND);
    });

    it('should fail with EVENT_NOT_FOUND when the event names another verifier', async () => {
      client.logs.set(REQUEST_TX, [crossValidationLog(JOB_REF, 5n)]);
      const outcome = await validator.run('val-1', { jobRef: JOB_REF, txHash: REQUEST_TX, verifierAgentId: 9n });
      expect(outcome.status === JobStatus.FAILED && outcome.error.code).toBe(JobErrorCode.EVENT_NOT_FOUND);
    });

    it('should fail with JOB_NOT_FOUND when the read reverts', async () => {
      client.jobs.clear();
      const outcome = await validator.run('val-1', { jobRef: JOB_REF });
      expect(outcome).toEqual({
        status: JobStatus.FAILED,
        error: { code: JobErrorCode.JOB_NOT_FOUND, message: 'Job not found' },
      });
    });

    it('should fail with JOB_NO_DATA for an empty job slot and keep its details', async () => {
      client.jobs.set(JOB_REF, jobTuple({ agentId: 0n, creator: ZERO_ADDRESS }));
      const outcome = await validator.run('val-1', { jobRef: JOB_REF });
      expect(outcome).toEqual({
        status: JobStatus.FAILED,
        error: {
          code: JobErrorCode.JOB_NO_DATA,
          message: 'Job exists but has no valid data',
          job_details: { ...details, agent_id: '0', creator: ZERO_ADDRESS },
        },
      });
      expect(inference.calls).toHaveLength(0);
    });

    it('should score a job with a zero agent but a real creator', async () => {
      client.jobs.set(JOB_REF, jobTuple({ agentId: 0n }));
      const outcome = await validator.run('val-1', { jobRef: JOB_REF });
      expect(outcome.status).toBe(JobStatus.COMPLETED);
      expect(client.submissions[0].args).toEqual([0n, 0n, 85]);
    });

    it('should fail with SCORE_FAILED when the reply holds no score', async () => {
      inference.reply = 'This job looks fine.';
      const outcome = await validator.run('val-1', { jobRef: JOB_REF });
      expect(outcome).toEqual({
        status: JobStatus.FAILED,
        error: { code: JobErrorCode.SCORE_FAILED, message: 'Failed to get AI validation score', job_details: details },
      });
      expect(client.submissions).toHaveLength(0);
    });

    it('should fail with SCORE_FAILED when inference errors', async () => {
      inference.reply = new Error('timeout');
      const outcome = await validator.run('val-1', { jobRef: JOB_REF });
      expect(outcome.status === JobStatus.FAILED && outcome.error.code).toBe(JobErrorCode.SCORE_FAILED);
    });

    it('should fail with WRITE_BACK_FAILED when the transaction fails', async () => {
      client.submitError = new Error('nonce too low');
      const outcome = await validator.run('val-1', { jobRef: JOB_REF });
      expect(outcome).toEqual({
        status: JobStatus.FAILED,
        error: {
          code: JobErrorCode.WRITE_BACK_FAILED,
          message: 'Failed to record reputation score: nonce too low',
          job_details: details,
        },
      });
    });
  });
});
