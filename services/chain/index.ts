import { ZeroAddress } from 'ethers';
import { ScoreRangeError } from '../../modules/errors';
import { ILogger } from '../logger';
import {
  ChainClient,
  ChainJobDetails,
  ContractFunction,
  CrossValidationEventQuery,
  JobDetailsSnapshot } from '../../types/chain';
import {
  CROSS_VALIDATION_TOPIC,
  WRITE_GAS_LIMIT,
  getJobFunction,
  recordScoreFunction } from './contracts';
import { EthersChainClient } from './ethers';

type ChainAddresses = {
  jobsModuleAddress: string;
  registryModuleAddress: string;
};

function asBigInt(value: unknown): bigint | null {
  if (typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  if (typeof value === 'string' && /^(0x[0-9a-fA-F]+|\d+)$/.test(value)) {
    return BigInt(value);
  }
  return null;
}

/**
 * decodes the positional `getJob` tuple:
 * (creator, agentId, budget, description, state, createdAt,
 *  acceptDeadline, completeDeadline, multihopId, step)
 */
export function decodeJob(value: unknown): ChainJobDetails | null {
  if (!Array.isArray(value) || value.length < 10) {
    return null;
  }
  const [creator, agentId, budget, description, state, createdAt, acceptDeadline, completeDeadline, multihopId, step]: unknown[] = value;
  const ints = [agentId, budget, state, createdAt, acceptDeadline, completeDeadline, step].map(asBigInt);
  const [agent, budgetValue, stateValue, created, accept, complete, stepValue] = ints;
  if (
    typeof creator !== 'string' ||
    typeof description !== 'string' ||
    typeof multihopId !== 'string' ||
    agent === null ||
    budgetValue === null ||
    stateValue === null ||
    created === null ||
    accept === null ||
    complete === null ||
    stepValue === null
  ) {
    return null;
  }
  return {
    creator,
    agentId: agent,
    budget: budgetValue,
    description,
    state: stateValue,
    createdAt: created,
    acceptDeadline: accept,
    completeDeadline: complete,
    multihopId: multihopId.toLowerCase(),
    step: stepValue,
  };
}

//a job slot the contract never wrote: zero agent AND zero creator
export function isEmptyJob(job: ChainJobDetails): boolean {
  const creator = job.creator.toLowerCase();
  return job.agentId === 0n && (creator === '' || creator === ZeroAddress);
}

export function toJobDetailsSnapshot(job: ChainJobDetails): JobDetailsSnapshot {
  return {
    creator: job.creator,
    agent_id: job.agentId.toString(),
    budget: job.budget.toString(),
    description: job.description,
    state: Number(job.state),
    created_at: Number(job.createdAt),
    accept_deadline: Number(job.acceptDeadline),
    complete_deadline: Number(job.completeDeadline),
    multihop_id: job.multihopId,
    step: Number(job.step),
  };
}

//first 32-byte word of a log's data, as 64 lowercase hex chars
function firstWord(data: string): string | null {
  const hex = (data.startsWith('0x') ? data.slice(2) : data).toLowerCase();
  return hex.length >= 64 ? hex.slice(0, 64) : null;
}

class ChainService {
  client: ChainClient;
  logger: ILogger;
  getJob: ContractFunction;
  recordScore: ContractFunction;

  constructor(client: ChainClient, addresses: ChainAddresses, logger: ILogger) {
    this.client = client;
    this.logger = logger;
    this.getJob = getJobFunction(addresses.jobsModuleAddress);
    this.recordScore = recordScoreFunction(addresses.registryModuleAddress);
    this.logger.info(`chain-ready jobs=${addresses.jobsModuleAddress} registry=${addresses.registryModuleAddress}`);
  }

  /**
   * true when the transaction emitted CrossValidationRequested for
   * `jobRef` (and, if given, for `verifierAgentId` in topic 1)
   */
  async findCrossValidationEvent(query: CrossValidationEventQuery): Promise<boolean> {
    const logs = await this.client.logsForTransaction(query.txHash);
    const expected = query.jobRef.slice(2).toLowerCase();
    for (const log of logs) {
      if (log.topics[0]?.toLowerCase() !== CROSS_VALIDATION_TOPIC) {
        continue;
      }
      if (firstWord(log.data) !== expected) {
        continue;
      }
      if (query.verifierAgentId === undefined) {
        return true;
      }
      const verifierTopic = log.topics[1];
      if (verifierTopic === undefined) {
        this.logger.warn(`chain-event ${query.txHash} has no verifier topic`);
        continue;
      }
      const eventVerifier = BigInt(verifierTopic);
      if (eventVerifier === query.verifierAgentId) {
        return true;
      }
      this.logger.warn(`chain-event verifier mismatch: got ${eventVerifier}, expected ${query.verifierAgentId}`);
    }
    return false;
  }

  //null when the contract returned nothing decodable
  async readJob(jobRef: string): Promise<ChainJobDetails | null> {
    const result = await this.client.call(this.getJob, [jobRef]);
    return decodeJob(result);
  }

  async writeScore(agentId: bigint, verifierAgentId: bigint, score: number): Promise<string> {
    if (!Number.isInteger(score) || score < 0 || score > 100) {
      throw new ScoreRangeError(score);
    }
    this.logger.info(`chain-record-score agent=${agentId} verifier=${verifierAgentId} score=${score}`);
    const txHash = await this.client.submit(
      this.recordScore,
      [agentId, verifierAgentId, score],
      WRITE_GAS_LIMIT,
    );
    this.logger.info(`chain-record-score confirmed tx=${txHash}`);
    return txHash;
  }
}

export { ChainAddresses, ChainService, EthersChainClient };
