import { ChainClient } from './chain';
import { InferenceClient } from './inference';
import { ILogger, LogLevel } from './logger';
import { JobStatus } from './job';
import { Signer } from './signer';

type InferenceConfig = {
  host: string;
  model: string;
  timeout: number; //milliseconds
};

type ChainConfig = {
  rpcUrl: string;
  privateKey: string;
  jobsModuleAddress: string;
  registryModuleAddress: string;
  timeout: number; //milliseconds
};

type SignerConfig = {
  privateKey?: string; //base64 pkcs8 der (ed25519)
  ephemeral?: boolean; //generate a throwaway key when no private key is given
};

type ServerConfig = {
  host: string;
  port: number;
};

type ArbiterConfig = {
  name: string;
  logLevel: LogLevel;
  retention: number; //ms a terminal record is kept; -1 keeps forever
  server: ServerConfig;
  inference: InferenceConfig;
  chain?: ChainConfig; //cross-validation is disabled without it
  signer?: SignerConfig;
};

//capabilities that replace the ones built from config (tests, embedding)
type ArbiterOverrides = {
  logger?: ILogger;
  inference?: InferenceClient;
  chain?: ChainClient;
  signer?: Signer | null;
};

type SubmissionReceipt = {
  job_id: string;
  status: JobStatus.PROCESSING;
  status_url: string;
  provider: string;
  timestamp: string;
};

type ValidationRequest = {
  job_id: string;
  transaction_id?: string;
  verifier_agent_id?: number | string;
};

type ValidationReceipt = {
  validation_id: string;
  status: JobStatus.PROCESSING;
  status_url: string;
  timestamp: string;
};

type ServiceInfo = {
  service: string;
  endpoints: string[];
  ai_provider: string;
  cross_validation: boolean;
  signing?: {
    algorithm: string;
    public_key: string;
  };
};

export {
  ArbiterConfig,
  ArbiterOverrides,
  ChainConfig,
  InferenceConfig,
  ServerConfig,
  ServiceInfo,
  SignerConfig,
  SubmissionReceipt,
  ValidationReceipt,
  ValidationRequest,
};
