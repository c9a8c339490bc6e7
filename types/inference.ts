export interface InferenceClient {
  readonly provider: string; //e.g. 'ollama'
  chat(systemInstruction: string, userContent: string): Promise<string>;
}
