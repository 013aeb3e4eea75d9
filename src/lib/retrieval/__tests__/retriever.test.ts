import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Retriever, filterByRelevance, formatResults } from '../retriever';
import { InMemoryVectorIndex, fixedIndex, result } from '../../../test/fakes';

describe('filterByRelevance', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('returns nothing for no candidates', () => {
    expect(filterByRelevance([], 0.3)).toEqual({ results: [], hasRelevant: false });
  });

  it('rejects everything when the best match is below the absolute floor', () => {
    expect(filterByRelevance([result(0.09), result(0.05)], 0)).toEqual({ results: [], hasRelevant: false });
  });

  it('keeps candidates above the mean-based adaptive threshold', () => {
    const { results, hasRelevant } = filterByRelevance([result(0.9), result(0.85), result(0.2)], 0.3);

    expect(hasRelevant).toBe(true);
    expect(results.map(r => r.similarity)).toEqual([0.9, 0.85]);
  });

  it('falls back to a loose threshold when the adaptive one keeps nothing', () => {
    const { results, hasRelevant } = filterByRelevance([result(0.5), result(0.4)], 0.8);

    expect(hasRelevant).toBe(true);
    expect(results.map(r => r.similarity)).toEqual([0.5, 0.4]);
  });

  it('never drops below the fallback floor', () => {
    const { results } = filterByRelevance([result(0.5), result(0.05)], 0.9);

    expect(results.map(r => r.similarity)).toEqual([0.5]);
  });

  it('keeps fewer results as the base threshold rises up to the best match', () => {
    const candidates = [result(0.9), result(0.6), result(0.4), result(0.2)];
    let previous = filterByRelevance(candidates, 0).results;

    for (let step = 1; step <= 18; step++) {
      const current = filterByRelevance(candidates, step / 20).results;
      expect(current.length).toBeLessThanOrEqual(previous.length);
      expect(current.every(r => previous.includes(r))).toBe(true);
      previous = current;
    }
    expect(previous.map(r => r.similarity)).toEqual([0.9]);
  });

  it('honours overridden constants', () => {
    const { results } = filterByRelevance([result(0.9), result(0.5)], 0, {
      absoluteFloor: 0.1,
      meanRatio: 1,
      fallbackRatio: 0.3,
      fallbackFloor: 0.1,
    });

    expect(results.map(r => r.similarity)).toEqual([0.9]);
  });
});

describe('Retriever', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('reports nothing relevant for a single weak match', async () => {
    const retriever = new Retriever(InMemoryVectorIndex.withSimilarities([0.05]), { similarityThreshold: 0.3 });

    expect(await retriever.retrieveAndFilter('天气')).toEqual({ results: [], hasRelevant: false });
  });

  it('returns the two strong matches out of three', async () => {
    const retriever = new Retriever(InMemoryVectorIndex.withSimilarities([0.9, 0.85, 0.2]), { similarityThreshold: 0.3 });

    const { results, hasRelevant } = await retriever.retrieveAndFilter('向量数据库');

    expect(hasRelevant).toBe(true);
    expect(results.map(r => r.id)).toEqual(['kb_test_chunk_0', 'kb_test_chunk_1']);
  });

  it('asks the index for top-k candidates', async () => {
    const index = InMemoryVectorIndex.withSimilarities([0.9, 0.8, 0.7]);
    const search = vi.spyOn(index, 'search');

    await new Retriever(index, { topK: 2 }).retrieveAndFilter('query');

    expect(search).toHaveBeenCalledWith('query', 2);
  });

  it('filters by collection after searching', async () => {
    const index = fixedIndex([
      result(0.9, 'work_note', { knowledge_base: 'kb_work' }),
      result(0.8, 'life_note', { knowledge_base: 'kb_life' }),
    ]);

    const bound = await new Retriever(index, { collection: 'kb_life' }).retrieveAndFilter('query');
    const explicit = await new Retriever(index).retrieveAndFilter('query', 'kb_work');

    expect(bound.results.map(r => r.id)).toEqual(['life_note']);
    expect(explicit.results.map(r => r.id)).toEqual(['work_note']);
  });

  it('returns an empty result when the search fails', async () => {
    const index = InMemoryVectorIndex.withSimilarities([0.9]);
    index.searchError = new Error('index corrupted');

    expect(await new Retriever(index).retrieveAndFilter('query')).toEqual({ results: [], hasRelevant: false });
    expect(console.error).toHaveBeenCalledWith('[Retriever] Retrieval failed: index corrupted');
  });
});

describe('formatResults', () => {
  it('explains when there is nothing to show', () => {
    expect(formatResults([])).toBe('未找到相关文档内容。');
  });

  it('lists each result with its source and similarity', () => {
    const separator = '='.repeat(50);
    const formatted = formatResults([
      result(0.9, 'rag', { title: 'RAG 笔记', knowledge_base: 'kb_work', source_path: 'ai/rag.md' }),
    ]);

    expect(formatted).toBe(
      `\n${separator}\n文档: RAG 笔记\n知识库: kb_work\n路径: ai/rag.md\n内容: content of rag\n相似度: 0.900\n\n${separator}`,
    );
  });

  it('truncates long passages', () => {
    const long = { ...result(0.5, 'long'), content: 'a'.repeat(600) };

    expect(formatResults([long])).toContain(`内容: ${'a'.repeat(500)}...\n`);
  });
});
