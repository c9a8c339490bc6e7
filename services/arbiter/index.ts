import { ConfigurationError, ValidationError } from '../../modules/errors';
import { countCharacters, formatISODate, getJobId, toBytes32Hex, toTxHash } from '../../modules/utils';
import { ChainService, EthersChainClient } from '../chain';
import { InferenceService, OllamaInferenceClient } from '../inference';
import { LoggerService, ILogger } from '../logger';
import { Ed25519Signer, SigningService } from '../signer';
import { StatusService } from '../status';
import { MemoryRecordStore, RecordStore } from '../store';
import { TaskService } from '../task';
import { CrossValidationInput, ValidatorService } from '../validator';
import { VerifierService } from '../verifier';
import {
  ArbiterConfig,
  ArbiterOverrides,
  ServiceInfo,
  SignerConfig,
  SubmissionReceipt,
  ValidationReceipt,
  ValidationRequest } from '../../types/arbiter';
import { ChainClient } from '../../types/chain';
import { JobStatus, JobType, StatusRecord } from '../../types/job';
import { SignedEnvelope, Signer } from '../../types/signer';

const MIN_JOB_DATA_LENGTH = 50;
const MAX_JOB_DATA_LENGTH = 400_000; //~100K tokens at ~4 chars per token
const MAX_UINT256 = 2n ** 256n - 1n;

function createSigner(config?: SignerConfig): Signer | null {
  if (config?.privateKey) {
    return Ed25519Signer.fromBase64(config.privateKey);
  }
  if (config?.ephemeral) {
    return Ed25519Signer.generate();
  }
  return null;
}

function parseVerifierAgentId(value: number | string | undefined): bigint | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    const id = BigInt(value);
    if (id <= MAX_UINT256) {
      return id;
    }
  }
  throw new ValidationError('verifier_agent_id must be a non-negative integer', { verifier_agent_id: value });
}

class ArbiterService {
  name: string;
  logger: ILogger;
  store: RecordStore;
  signing: SigningService;
  inference: InferenceService;
  chain: ChainService | null = null;
  verifier: VerifierService;
  validator: ValidatorService | null = null;
  task: TaskService;
  status: StatusService;
  private chainClient: ChainClient | null = null;

  constructor(config: ArbiterConfig, overrides: ArbiterOverrides = {}) {
    this.name = config.name;
    this.logger = new LoggerService(overrides.logger, config.logLevel);
    this.store = new MemoryRecordStore(this.logger, config.retention);

    const signer = overrides.signer !== undefined ? overrides.signer : createSigner(config.signer);
    this.signing = new SigningService(signer, this.logger);

    const inferenceClient = overrides.inference ?? new OllamaInferenceClient(config.inference);
    this.inference = new InferenceService(inferenceClient, this.logger);
    this.verifier = new VerifierService(this.inference, this.logger);

    if (config.chain) {
      this.chainClient = overrides.chain ?? new EthersChainClient(config.chain);
      this.chain = new ChainService(this.chainClient, config.chain, this.logger);
      this.validator = new ValidatorService(this.chain, this.inference, this.logger);
    } else {
      this.logger.warn('chain-missing cross-validation is disabled');
    }

    this.task = new TaskService(this.store, this.logger);
    this.status = new StatusService(this.store, this.signing, this.logger);
  }

  static async init(config: ArbiterConfig, overrides: ArbiterOverrides = {}): Promise<ArbiterService> {
    const instance = new ArbiterService(config, overrides);
    instance.logger.info(`arbiter-ready ${instance.name} cross-validation=${instance.validator !== null}`);
    return instance;
  }

  // ************* SUBMISSION METHODS *************
  async verify(jobData: string): Promise<SubmissionReceipt> {
    if (typeof jobData !== 'string') {
      throw new ValidationError('job_data must be a string');
    }
    const length = countCharacters(jobData);
    if (length < MIN_JOB_DATA_LENGTH) {
      throw new ValidationError(
        `Job data too short. Minimum length is ${MIN_JOB_DATA_LENGTH} characters.`,
      );
    }
    if (length > MAX_JOB_DATA_LENGTH) {
      throw new ValidationError(
        `Job data too long. Maximum length is ${MAX_JOB_DATA_LENGTH} characters (~100K tokens).`,
      );
    }
    const jobId = getJobId();
    const record = await this.store.create(jobId, JobType.VERIFICATION);
    this.task.schedule(jobId, () => this.verifier.run(jobId, jobData));
    this.logger.info(`arbiter-verify accepted ${jobId} (${length} chars)`);
    return {
      job_id: jobId,
      status: JobStatus.PROCESSING,
      status_url: `/verify/${jobId}`,
      provider: this.inference.provider,
      timestamp: record.created_at,
    };
  }

  async validate(request: ValidationRequest): Promise<ValidationReceipt> {
    const validator = this.validator;
    if (!validator) {
      throw new ConfigurationError('cross-validation is not configured');
    }
    const jobRef = typeof request.job_id === 'string' ? toBytes32Hex(request.job_id) : null;
    if (!jobRef) {
      throw new ValidationError('job_id must be a hex string of at most 32 bytes', { job_id: request.job_id });
    }
    let txHash: string | undefined;
    if (request.transaction_id !== undefined && request.transaction_id !== '') {
      const parsed = toTxHash(request.transaction_id);
      if (!parsed) {
        throw new ValidationError('transaction_id must be a 32-byte hex transaction hash', {
          transaction_id: request.transaction_id,
        });
      }
      txHash = parsed;
    }
    const input: CrossValidationInput = {
      jobRef,
      txHash,
      verifierAgentId: parseVerifierAgentId(request.verifier_agent_id),
    };
    const validationId = getJobId();
    const record = await this.store.create(validationId, JobType.VALIDATION);
    this.task.schedule(validationId, () => validator.run(validationId, input));
    this.logger.info(`arbiter-validate accepted ${validationId} for ${jobRef}`);
    return {
      validation_id: validationId,
      status: JobStatus.PROCESSING,
      status_url: `/verify/${validationId}`,
      timestamp: record.created_at,
    };
  }

  // ************* QUERY METHODS *************
  async getStatus(jobId: string): Promise<SignedEnvelope<StatusRecord>> {
    return await this.status.get(jobId);
  }

  info(): ServiceInfo {
    const signer = this.signing.signer;
    return {
      service: this.name,
      endpoints: ['POST /verify', 'GET /verify/:job_id', ...(this.validator ? ['POST /validate'] : [])],
      ai_provider: this.inference.provider,
      cross_validation: this.validator !== null,
      ...(signer ? { signing: { algorithm: signer.algorithm, public_key: signer.publicKey } } : {}),
    };
  }

  async shutdown(): Promise<void> {
    await this.task.drain();
    await this.store.clear();
    if (this.chainClient instanceof EthersChainClient) {
      this.chainClient.destroy();
    }
    this.logger.info(`arbiter-stopped ${this.name}`);
  }
}

export { ArbiterService, MAX_JOB_DATA_LENGTH, MIN_JOB_DATA_LENGTH };
