import { id } from 'ethers';
import { ContractFunction } from '../../types/chain';

export const CROSS_VALIDATION_EVENT = 'CrossValidationRequested(bytes32,uint256)';
export const CROSS_VALIDATION_TOPIC = id(CROSS_VALIDATION_EVENT);

export const WRITE_GAS_LIMIT = 500_000;

export function getJobFunction(jobsModuleAddress: string): ContractFunction {
  return {
    address: jobsModuleAddress,
    name: 'getJob',
    fragment:
      'function getJob(bytes32 jobId) view returns (tuple(' +
      'address creator, uint256 agentId, uint256 budget, string description, uint8 state, ' +
      'uint64 createdAt, uint64 acceptDeadline, uint64 completeDeadline, bytes32 multihopId, uint64 step))',
  };
}

export function recordScoreFunction(registryModuleAddress: string): ContractFunction {
  return {
    address: registryModuleAddress,
    name: 'recordCrossValidationReputationScore',
    fragment:
      'function recordCrossValidationReputationScore(uint256 agentId, uint256 verifierAgentId, uint256 score)',
  };
}
