import { z } from 'zod';
import { requestJson, HttpError, type FetchLike } from '../http.js';

export interface Embedder {
  /** One vector per input text, in input order. */
  embed(texts: string[]): Promise<number[][]>;
}

export class EmbeddingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmbeddingError';
  }
}

export interface HuggingFaceEmbedderOptions {
  /** Inference API token */
  token: string;
  /** Feature-extraction model id, e.g. sentence-transformers/all-mpnet-base-v2 */
  model: string;
  baseUrl?: string;
  rps?: number;
  fetcher?: FetchLike;
}

const VectorsSchema = z.array(z.array(z.number()));

/**
 * Embeddings from the Hugging Face inference API (feature-extraction
 * pipeline). Sentence-transformers models return one pooled vector per input.
 */
export class HuggingFaceEmbedder implements Embedder {
  private fetcher: FetchLike;

  constructor(private opts: HuggingFaceEmbedderOptions) {
    this.fetcher = opts.fetcher ?? fetch;
  }

  endpoint() {
    const base = this.opts.baseUrl ?? 'https://api-inference.huggingface.co/models';
    return `${base}/${this.opts.model}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    let raw: unknown;
    try {
      raw = await requestJson(
        this.endpoint(),
        {
          method: 'POST',
          headers: { authorization: `Bearer ${this.opts.token}` },
          body: { inputs: texts },
          rps: this.opts.rps,
        },
        this.fetcher,
      );
    } catch (e) {
      if (e instanceof HttpError && e.status === 400 && e.responseText?.includes('SentenceSimilarityPipeline')) {
        throw new EmbeddingError(
          `Model ${this.opts.model} uses the sentence-similarity pipeline; pick a feature-extraction model instead.`,
        );
      }
      throw e;
    }

    const parsed = VectorsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EmbeddingError(`Unexpected embedding response from ${this.opts.model}`);
    }
    if (parsed.data.length !== texts.length) {
      throw new EmbeddingError(`Expected ${texts.length} embedding(s), got ${parsed.data.length}`);
    }
    return parsed.data;
  }
}
