import { Ollama } from 'ollama';
import { InferenceConfig } from '../../types/arbiter';
import { InferenceClient } from '../../types/inference';

//the caller's abort signal (if any) still works alongside the timeout
export function boundedSignal(timeout: number, signal?: AbortSignal | null): AbortSignal {
  const deadline = AbortSignal.timeout(timeout);
  return signal ? AbortSignal.any([signal, deadline]) : deadline;
}

class OllamaInferenceClient implements InferenceClient {
  readonly provider = 'ollama';
  private client: Ollama;
  private model: string;

  constructor(config: InferenceConfig) {
    this.model = config.model;
    this.client = new Ollama({
      host: config.host,
      //every request is bounded; a hung model surfaces as an abort error
      fetch: (input, init) => fetch(input, { ...init, signal: boundedSignal(config.timeout, init?.signal) }),
    });
  }

  async chat(systemInstruction: string, userContent: string): Promise<string> {
    const response = await this.client.chat({
      model: this.model,
      messages: [
        { role: 'system', content: systemInstruction },
        { role: 'user', content: userContent },
      ],
    });
    const content = response?.message?.content;
    if (typeof content !== 'string') {
      throw new Error('inference response has no message content');
    }
    return content;
  }
}

export { OllamaInferenceClient };
