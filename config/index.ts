// config/index.ts
import ms from 'ms';
import { ConfigurationError } from '../modules/errors';
import { ArbiterConfig, ChainConfig, SignerConfig } from '../types/arbiter';
import { LogLevel } from '../types/logger';

type Env = Record<string, string | undefined>;

const REGISTRY_MODULE_ADDRESS = '0xa041ec83d30ef5f7ffc4bc7a62bf1aaeee5544b6';
const MAX_TIMER_DELAY = 2_147_483_647; //setTimeout fires at once beyond this
const LOG_LEVELS: LogLevel[] = ['silly', 'debug', 'info', 'warn', 'error'];

const baseConfig = {
  NAME: 'Verifier Agent',
  HOST: '0.0.0.0',
  PORT: '4021',
  LOG_LEVEL: 'info',
  OLLAMA_HOST: 'http://localhost:11434',
  OLLAMA_MODEL: 'qwen2:0.5b',
  INFERENCE_TIMEOUT: '2m',
  CHAIN_TIMEOUT: '2m',
  JOB_RETENTION: '24h',
  REGISTRY_MODULE_ADDRESS,
};

//per-environment defaults; anything set in the environment wins
const envConfig: Record<string, Partial<typeof baseConfig>> = {
  development: { LOG_LEVEL: 'debug' },
  test: { LOG_LEVEL: 'error', JOB_RETENTION: '-1' },
  staging: {},
  production: {},
};

function toDuration(key: string, value: string): number {
  if (value === '-1') {
    return -1;
  }
  const parsed = /^\d+$/.test(value) ? Number(value) : ms(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigurationError(`${key} [${value}] is not a valid duration`);
  }
  if (parsed > MAX_TIMER_DELAY) {
    throw new ConfigurationError(`${key} [${value}] exceeds the maximum of ${MAX_TIMER_DELAY}ms (~24.8 days)`);
  }
  return parsed;
}

function toPort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`PORT [${value}] is invalid`);
  }
  return port;
}

function toLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new ConfigurationError(`LOG_LEVEL [${value}] is invalid`);
  }
  return level;
}

function resolveChain(env: Env, timeout: number, registry: string): ChainConfig | undefined {
  const { CHAIN_RPC_URL, CHAIN_PRIVATE_KEY, JOBS_MODULE_ADDRESS } = env;
  if (!CHAIN_RPC_URL || !CHAIN_PRIVATE_KEY || !JOBS_MODULE_ADDRESS) {
    return undefined;
  }
  return {
    rpcUrl: CHAIN_RPC_URL,
    privateKey: CHAIN_PRIVATE_KEY,
    jobsModuleAddress: JOBS_MODULE_ADDRESS,
    registryModuleAddress: registry,
    timeout,
  };
}

function resolveSigner(env: Env): SignerConfig | undefined {
  const ephemeral = env.SIGNER_EPHEMERAL === 'true';
  if (!env.SIGNER_PRIVATE_KEY && !ephemeral) {
    return undefined;
  }
  return { privateKey: env.SIGNER_PRIVATE_KEY, ephemeral };
}

/**
 * builds the explicit configuration struct handed to `ArbiterService.init`
 */
export function loadConfig(env: Env = process.env): ArbiterConfig {
  const profile = envConfig[env.NODE_ENV || 'development'] ?? {};
  const setting = (key: keyof typeof baseConfig): string =>
    env[key] || profile[key] || baseConfig[key];

  return {
    name: setting('NAME'),
    logLevel: toLogLevel(setting('LOG_LEVEL')),
    retention: toDuration('JOB_RETENTION', setting('JOB_RETENTION')),
    server: {
      host: setting('HOST'),
      port: toPort(setting('PORT')),
    },
    inference: {
      host: setting('OLLAMA_HOST'),
      model: setting('OLLAMA_MODEL'),
      timeout: toDuration('INFERENCE_TIMEOUT', setting('INFERENCE_TIMEOUT')),
    },
    chain: resolveChain(
      env,
      toDuration('CHAIN_TIMEOUT', setting('CHAIN_TIMEOUT')),
      setting('REGISTRY_MODULE_ADDRESS'),
    ),
    signer: resolveSigner(env),
  };
}

export default loadConfig;
