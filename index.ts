import { loadConfig } from './config';
import { ArbiterService } from './services/arbiter';
import { ChainService, EthersChainClient } from './services/chain';
import { InferenceService, OllamaInferenceClient } from './services/inference';
import { LoggerService } from './services/logger';
import { Ed25519Signer, SigningService, verifyEnvelope } from './services/signer';
import { MemoryRecordStore, RecordStore } from './services/store';
import { buildServer } from './web/app';
import { ArbiterConfig, ArbiterOverrides } from './types/arbiter';

export * from './modules/errors';
export * from './types/chain';
export * from './types/inference';
export * from './types/job';
export * from './types/logger';
export * from './types/signer';
export {
  ArbiterConfig,
  ArbiterOverrides,
  ArbiterService,
  ChainService,
  Ed25519Signer,
  EthersChainClient,
  InferenceService,
  LoggerService,
  MemoryRecordStore,
  OllamaInferenceClient,
  RecordStore,
  SigningService,
  buildServer,
  loadConfig,
  verifyEnvelope,
};
