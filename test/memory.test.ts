import { describe, expect, it } from 'vitest';
import { HuggingFaceEmbedder, EmbeddingError } from '../src/memory/embeddings.js';
import { PineconeIndex } from '../src/memory/pinecone.js';
import { KeywordTaskMemory, VectorTaskMemory, taskText } from '../src/memory/taskMemory.js';
import type { Task } from '../src/model.js';

function jsonResponse(obj: unknown, status = 200) {
  return new Response(JSON.stringify(obj), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

interface Call {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: unknown;
}

function recorder(reply: (call: Call) => Response) {
  const calls: Call[] = [];
  const fetcher: typeof fetch = async (url, init) => {
    const call: Call = {
      url: String(url),
      method: init?.method ?? 'GET',
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    };
    calls.push(call);
    return reply(call);
  };
  return { calls, fetcher };
}

function task(id: string, title: string, extra: Partial<Task> = {}): Task {
  return {
    id,
    ownerId: 'u1',
    title,
    description: '',
    priority: 'medium',
    status: 'pending',
    completed: false,
    tags: [],
    createdAt: '2026-03-01T00:00:00.000Z',
    updatedAt: '2026-03-01T00:00:00.000Z',
    ...extra,
  };
}

describe('HuggingFaceEmbedder', () => {
  it('posts inputs to the model endpoint with the token', async () => {
    const { calls, fetcher } = recorder(() => jsonResponse([[0.1, 0.2], [0.3, 0.4]]));
    const embedder = new HuggingFaceEmbedder({ token: 'test-token', model: 'org/model', fetcher });

    expect(await embedder.embed(['a', 'b'])).toEqual([[0.1, 0.2], [0.3, 0.4]]);
    expect(calls).toHaveLength(1);
    expect(calls[0]).toMatchObject({
      url: 'https://api-inference.huggingface.co/models/org/model',
      method: 'POST',
      body: { inputs: ['a', 'b'] },
    });
    expect(calls[0]?.headers.authorization).toBe('Bearer test-token');
  });

  it('skips the call for no input', async () => {
    const { calls, fetcher } = recorder(() => jsonResponse([]));
    const embedder = new HuggingFaceEmbedder({ token: 't', model: 'm', fetcher });
    expect(await embedder.embed([])).toEqual([]);
    expect(calls).toHaveLength(0);
  });

  it('rejects a response of the wrong shape or size', async () => {
    const nested = new HuggingFaceEmbedder({ token: 't', model: 'm', fetcher: recorder(() => jsonResponse([[[0.1]]])).fetcher });
    await expect(nested.embed(['a'])).rejects.toBeInstanceOf(EmbeddingError);

    const short = new HuggingFaceEmbedder({ token: 't', model: 'm', fetcher: recorder(() => jsonResponse([[0.1]])).fetcher });
    await expect(short.embed(['a', 'b'])).rejects.toThrow('Expected 2 embedding(s), got 1');
  });

  it('explains a sentence-similarity model', async () => {
    const { fetcher } = recorder(
      () => new Response('{"error":"SentenceSimilarityPipeline.__call__() missing argument"}', { status: 400 }),
    );
    const embedder = new HuggingFaceEmbedder({ token: 't', model: 'org/similarity', fetcher });
    await expect(embedder.embed(['a'])).rejects.toThrow(
      'Model org/similarity uses the sentence-similarity pipeline; pick a feature-extraction model instead.',
    );
  });
});

describe('PineconeIndex', () => {
  it('sends namespaced requests with the api key and version headers', async () => {
    const { calls, fetcher } = recorder((call) =>
      call.url.endsWith('/query')
        ? jsonResponse({ matches: [{ id: 't1', score: 0.9, metadata: { title: 'A' } }] })
        : jsonResponse({}),
    );
    const index = new PineconeIndex({ apiKey: 'test-key', indexHost: 'https://idx.example.io/', fetcher });

    await index.upsert('u1', [{ id: 't1', values: [1, 0] }]);
    const matches = await index.query('u1', [1, 0], 3);
    await index.deleteIds('u1', ['t1']);
    await index.deleteAll('u1');
    await index.upsert('u1', []);
    await index.deleteIds('u1', []);

    expect(matches).toEqual([{ id: 't1', score: 0.9, metadata: { title: 'A' } }]);
    expect(calls.map((c) => [c.url, c.body])).toEqual([
      ['https://idx.example.io/vectors/upsert', { vectors: [{ id: 't1', values: [1, 0] }], namespace: 'u1' }],
      [
        'https://idx.example.io/query',
        { vector: [1, 0], topK: 3, includeMetadata: true, includeValues: false, namespace: 'u1' },
      ],
      ['https://idx.example.io/vectors/delete', { ids: ['t1'], namespace: 'u1' }],
      ['https://idx.example.io/vectors/delete', { deleteAll: true, namespace: 'u1' }],
    ]);
    expect(calls[0]?.headers['api-key']).toBe('test-key');
    expect(calls[0]?.headers['x-pinecone-api-version']).toBe('2024-07');
  });

  it('does not retry a client error', async () => {
    const { calls, fetcher } = recorder(() => new Response('bad request', { status: 400 }));
    const index = new PineconeIndex({ apiKey: 'k', indexHost: 'https://idx.example.io', fetcher });
    await expect(index.query('u1', [1], 1)).rejects.toMatchObject({ status: 400 });
    expect(calls).toHaveLength(1);
  });
});

describe('VectorTaskMemory', () => {
  const embedded: string[][] = [];
  const embedder = {
    async embed(texts: string[]) {
      embedded.push(texts);
      return texts.map(() => [0.5, 0.5]);
    },
  };

  it('indexes task text with its metadata', async () => {
    const { calls, fetcher } = recorder(() => jsonResponse({}));
    const memory = new VectorTaskMemory({
      embedder,
      index: new PineconeIndex({ apiKey: 'k', indexHost: 'https://idx.example.io', fetcher }),
    });

    await memory.index(task('t1', 'Buy milk', { description: 'two litres', tags: ['shop'], dueDate: '2026-03-05' }));

    expect(embedded.at(-1)).toEqual(['Buy milk two litres shop']);
    expect(calls[0]?.body).toEqual({
      namespace: 'u1',
      vectors: [
        {
          id: 't1',
          values: [0.5, 0.5],
          metadata: {
            task_id: 't1',
            title: 'Buy milk',
            description: 'two litres',
            priority: 'medium',
            status: 'pending',
            completed: false,
            tags: ['shop'],
            created_at: '2026-03-01T00:00:00.000Z',
            updated_at: '2026-03-01T00:00:00.000Z',
            due_date: '2026-03-05',
          },
        },
      ],
    });
  });

  it('maps matches back to known tasks only', async () => {
    const { calls, fetcher } = recorder(() =>
      jsonResponse({
        matches: [
          { id: 'gone', score: 0.95 },
          { id: 't2', score: 0.8 },
          { id: 't1', score: 0.4 },
        ],
      }),
    );
    const memory = new VectorTaskMemory({
      embedder,
      index: new PineconeIndex({ apiKey: 'k', indexHost: 'https://idx.example.io', fetcher }),
    });
    const tasks = [task('t1', 'One'), task('t2', 'Two')];

    const results = await memory.search('u1', 'two', 10, tasks);
    expect(results.map((r) => [r.task.id, r.score])).toEqual([
      ['t2', 0.8],
      ['t1', 0.4],
    ]);
    expect(calls[0]?.body).toMatchObject({ topK: 2 });
  });
});

describe('KeywordTaskMemory', () => {
  it('matches words in title, description and tags', async () => {
    const memory = new KeywordTaskMemory();
    const tasks = [
      task('t1', 'Dentist', { tags: ['health'] }),
      task('t2', 'Gym session', { description: 'leg day for health' }),
      task('t3', 'Taxes'),
    ];

    const results = await memory.search('u1', 'Health, gym!', 5, tasks);
    expect(results.map((r) => [r.task.id, r.score])).toEqual([
      ['t2', 1],
      ['t1', 0.5],
    ]);
    expect(await memory.search('u1', '!!!', 5, tasks)).toEqual([]);
  });

  it('does not match a word inside a longer one', async () => {
    const memory = new KeywordTaskMemory();
    const tasks = [task('t1', 'Buy a scarf'), task('t2', 'Wash the car')];
    expect((await memory.search('u1', 'car', 10, tasks)).map((r) => [r.task.id, r.score])).toEqual([['t2', 1]]);
  });

  it('joins non-empty text parts', () => {
    expect(taskText({ title: 'A', description: '', tags: ['x', 'y'] })).toBe('A x y');
  });
});
