import { ILogger } from '../logger';
import { InferenceClient } from '../../types/inference';
import {
  DISPUTE_SYSTEM_PROMPT,
  SCORING_SYSTEM_PROMPT,
  disputeUserPrompt } from './prompts';
import { OllamaInferenceClient } from './ollama';

const MIN_SCORE = 0;
const MAX_SCORE = 100;

/**
 * first run of decimal digits anywhere in the reply, clamped to
 * [0, 100]; a sign is not part of the run ('-5' reads as 5)
 */
export function extractScore(reply: string): number | null {
  const match = reply.match(/\d+/);
  if (!match) {
    return null;
  }
  const value = Number(match[0]);
  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, value));
}

class InferenceService {
  client: InferenceClient;
  logger: ILogger;

  constructor(client: InferenceClient, logger: ILogger) {
    this.client = client;
    this.logger = logger;
  }

  get provider(): string {
    return this.client.provider;
  }

  //free-text verdict for a dispute transcript
  async summarize(jobData: string): Promise<string> {
    this.logger.debug(`inference-summarize ${jobData.length} chars`);
    return await this.client.chat(DISPUTE_SYSTEM_PROMPT, disputeUserPrompt(jobData));
  }

  //returns null when the reply holds no score
  async score(context: string): Promise<number | null> {
    const reply = await this.client.chat(SCORING_SYSTEM_PROMPT, context);
    const score = extractScore(reply);
    this.logger.debug(`inference-score reply=${JSON.stringify(reply.slice(0, 80))} score=${score}`);
    return score;
  }
}

export { InferenceService, OllamaInferenceClient };
