export interface GenerationRequest {
  prompt: string;
  systemPrompt?: string;
  temperature: number;
  maxTokens: number;
}

/** Blocking text generation. Rejects with a ServiceError on provider failure; never retries. */
export interface TextGenerator {
  readonly provider: string;
  generate(request: GenerationRequest): Promise<string>;
}

/** One vector per input text, in input order. */
export interface EmbeddingProvider {
  embed(texts: string[]): Promise<number[][]>;
}
