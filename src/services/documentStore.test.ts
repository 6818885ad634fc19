import { describe, expect, it, vi } from 'vitest';
import { FakeEmbedder, captureLogger, silentLogger } from '../testing/fakes.js';
import { ChapterEmbeddingStore, embedAndStoreChunks, type Queryable } from './documentStore.js';

function fakeDb() {
  const query = vi.fn(async (_text: string, _values?: unknown[]) => ({ rowCount: 1 }));
  const db: Queryable = { query };
  return { db, query };
}

describe('ChapterEmbeddingStore', () => {
  it('inserts one row with the vector as a ::vector literal', async () => {
    const { db, query } = fakeDb();
    const store = new ChapterEmbeddingStore(db);

    const id = await store.insert({ chapter: 'Understanding Media', chunkIndex: 1, text: 'Media is', embedding: [0.1, 0.2] });

    expect(query).toHaveBeenCalledWith(
      'INSERT INTO chapter_embeddings (id, chapter, chunk_index, content, embedding) VALUES ($1, $2, $3, $4, $5::vector)',
      [id, 'Understanding Media', 1, 'Media is', '[0.1,0.2]'],
    );
    expect(id).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('embedAndStoreChunks', () => {
  it('stores embedded chunks with 1-based indexes and skips the rest', async () => {
    const { db, query } = fakeDb();
    const embedder = new FakeEmbedder({ one: [1, 0], three: [0, 1] });
    const { logger, entries } = captureLogger();

    const result = await embedAndStoreChunks('Chapter', ['one', 'two', 'three'], {
      embedder,
      store: new ChapterEmbeddingStore(db),
      logger,
    });

    expect(result).toEqual({ chapter: 'Chapter', total: 3, stored: 2, skipped: [2], failed: [] });
    expect(query.mock.calls.map(([, values]) => values?.slice(1))).toEqual([
      ['Chapter', 1, 'one', '[1,0]'],
      ['Chapter', 3, 'three', '[0,1]'],
    ]);
    expect(entries.find((e) => e.msg === 'Skipping chunk due to missing embedding')).toMatchObject({
      level: 40,
      chunkIndex: 2,
    });
  });

  it('records a failed insert and keeps going', async () => {
    const { db, query } = fakeDb();
    query.mockRejectedValueOnce(new Error('relation "chapter_embeddings" does not exist'));

    const result = await embedAndStoreChunks('Chapter', ['a', 'b'], {
      embedder: new FakeEmbedder({ a: [1], b: [2] }),
      store: new ChapterEmbeddingStore(db),
      logger: silentLogger,
    });

    expect(result.stored).toBe(1);
    expect(result.failed).toEqual([{ chunkIndex: 1, error: 'relation "chapter_embeddings" does not exist' }]);
    expect(query).toHaveBeenCalledTimes(2);
  });

  it('does nothing for an empty chunk list', async () => {
    const { db, query } = fakeDb();

    const result = await embedAndStoreChunks('Chapter', [], {
      embedder: new FakeEmbedder(),
      store: new ChapterEmbeddingStore(db),
      logger: silentLogger,
    });

    expect(result).toEqual({ chapter: 'Chapter', total: 0, stored: 0, skipped: [], failed: [] });
    expect(query).not.toHaveBeenCalled();
  });
});
