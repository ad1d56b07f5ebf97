/**
 * Query embeddings via the OpenAI embeddings API
 */

import OpenAI from "openai";
import { RetrievalError } from "../core/errors.js";

export interface IEmbedder {
  embed(text: string, options?: { signal?: AbortSignal }): Promise<number[]>;
}

export interface OpenAIEmbedderOptions {
  apiKey: string;
  model: string;
  /** Pre-built client, replaceable in tests */
  client?: OpenAI;
}

export class OpenAIEmbedder implements IEmbedder {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAIEmbedderOptions) {
    // Retries are owned by the retrieval engine
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async embed(text: string, options: { signal?: AbortSignal } = {}): Promise<number[]> {
    const response = await this.client.embeddings.create(
      { model: this.options.model, input: text },
      { signal: options.signal }
    );

    const first = response.data[0];
    if (!first) {
      throw new RetrievalError("Embeddings API returned no vectors");
    }
    return first.embedding;
  }
}
