import { z } from 'zod';
import { requestJson, type FetchLike } from '../http.js';

export interface PineconeIndexOptions {
  apiKey: string;
  /** Data-plane host of the index, e.g. https://tasks-abc123.svc.us-east-1.pinecone.io */
  indexHost: string;
  /** Defaults to 2024-07 */
  apiVersion?: string;
  rps?: number;
  fetcher?: FetchLike;
}

export type VectorMetadata = Record<string, string | number | boolean | string[]>;

export interface VectorRecord {
  id: string;
  values: number[];
  metadata?: VectorMetadata;
}

export interface QueryMatch {
  id: string;
  score: number;
  metadata?: VectorMetadata;
}

const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]));

const QueryResponseSchema = z.object({
  matches: z
    .array(
      z.object({
        id: z.string(),
        score: z.number().default(0),
        metadata: MetadataSchema.optional(),
      }),
    )
    .default([]),
});

/** Minimal REST client for a Pinecone index. Namespaces partition vectors per user. */
export class PineconeIndex {
  private fetcher: FetchLike;

  constructor(private opts: PineconeIndexOptions) {
    this.fetcher = opts.fetcher ?? fetch;
  }

  private async api(path: string, body: unknown): Promise<unknown> {
    const host = this.opts.indexHost.replace(/\/+$/, '');
    return requestJson(
      `${host}${path}`,
      {
        method: 'POST',
        headers: {
          'Api-Key': this.opts.apiKey,
          'X-Pinecone-API-Version': this.opts.apiVersion ?? '2024-07',
        },
        body,
        rps: this.opts.rps,
      },
      this.fetcher,
    );
  }

  async upsert(namespace: string, vectors: VectorRecord[]): Promise<void> {
    if (vectors.length === 0) return;
    await this.api('/vectors/upsert', { vectors, namespace });
  }

  async query(namespace: string, vector: number[], topK: number): Promise<QueryMatch[]> {
    const raw = await this.api('/query', { vector, topK, includeMetadata: true, includeValues: false, namespace });
    return QueryResponseSchema.parse(raw).matches;
  }

  async deleteIds(namespace: string, ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    await this.api('/vectors/delete', { ids, namespace });
  }

  async deleteAll(namespace: string): Promise<void> {
    await this.api('/vectors/delete', { deleteAll: true, namespace });
  }
}
