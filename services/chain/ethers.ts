import { Contract, FetchRequest, JsonRpcProvider, Wallet } from 'ethers';
import { ChainConfig } from '../../types/arbiter';
import { ChainClient, ChainLog, ContractFunction } from '../../types/chain';

class EthersChainClient implements ChainClient {
  provider: JsonRpcProvider;
  wallet: Wallet;
  timeout: number;

  constructor(config: ChainConfig) {
    const request = new FetchRequest(config.rpcUrl);
    request.timeout = config.timeout;
    this.timeout = config.timeout;
    this.provider = new JsonRpcProvider(request);
    const privateKey = config.privateKey.startsWith('0x') ? config.privateKey : `0x${config.privateKey}`;
    this.wallet = new Wallet(privateKey, this.provider);
  }

  get address(): string {
    return this.wallet.address;
  }

  async call(fn: ContractFunction, args: unknown[]): Promise<unknown> {
    const contract = new Contract(fn.address, [fn.fragment], this.provider);
    return await contract.getFunction(fn.name).staticCall(...args);
  }

  async submit(fn: ContractFunction, args: unknown[], gasLimit: number): Promise<string> {
    const contract = new Contract(fn.address, [fn.fragment], this.wallet);
    const tx = await contract.getFunction(fn.name).send(...args, { gasLimit });
    const receipt = await tx.wait(1, this.timeout);
    if (!receipt) {
      throw new Error(`transaction ${tx.hash} was not confirmed`);
    }
    if (receipt.status !== 1) {
      throw new Error(`transaction ${tx.hash} reverted`);
    }
    return receipt.hash;
  }

  async logsForTransaction(txHash: string): Promise<ChainLog[]> {
    const receipt = await this.provider.getTransactionReceipt(txHash);
    if (!receipt) {
      throw new Error(`transaction ${txHash} has no receipt`);
    }
    return receipt.logs.map((log) => ({
      address: log.address,
      topics: log.topics,
      data: log.data,
    }));
  }

  destroy(): void {
    this.provider.destroy();
  }
}

export { EthersChainClient };
