//a typed contract call: the address it lives at plus its human-readable ABI fragment
export type ContractFunction = {
  address: string;
  name: string;
  fragment: string; //e.g. 'function getJob(bytes32 jobId) view returns (...)'
};

export type ChainLog = {
  address?: string;
  topics: readonly string[];
  data: string;
};

export interface ChainClient {
  //read-only call; rejects when the call reverts
  call(fn: ContractFunction, args: unknown[]): Promise<unknown>;
  //signed state-changing call; resolves with the tx hash once confirmed
  submit(fn: ContractFunction, args: unknown[], gasLimit: number): Promise<string>;
  logsForTransaction(txHash: string): Promise<ChainLog[]>;
}

export type ChainJobDetails = {
  creator: string;
  agentId: bigint;
  budget: bigint;
  description: string;
  state: bigint;
  createdAt: bigint;
  acceptDeadline: bigint;
  completeDeadline: bigint;
  multihopId: string; //bytes32 hex
  step: bigint;
};

//json-safe rendering of ChainJobDetails (uint256 as decimal strings)
export type JobDetailsSnapshot = {
  creator: string;
  agent_id: string;
  budget: string;
  description: string;
  state: number;
  created_at: number;
  accept_deadline: number;
  complete_deadline: number;
  multihop_id: string;
  step: number;
};

export type CrossValidationEventQuery = {
  txHash: string;
  jobRef: string;          //normalized 0x + 64 hex
  verifierAgentId?: bigint;
};
