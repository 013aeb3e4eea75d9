import { beforeEach, describe, expect, it, vi } from 'vitest';
import { findReferentialWord, rewriteWithContext, rewriteWithHistory } from '../rag/query-rewriter';
import { ScriptedGenerator } from '../../../test/fakes';

const history = [{ query: '介绍一下《三体》', response: '《三体》是一部长篇科幻小说。' }];

describe('rewriteWithHistory', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('leaves the query alone without history', async () => {
    const generator = new ScriptedGenerator('不应被调用');

    const result = await rewriteWithHistory('它的作者是谁', [], generator);

    expect(result).toEqual({ originalQuery: '它的作者是谁', rewrittenQuery: '它的作者是谁', strategy: 'none' });
    expect(generator.prompts).toEqual([]);
  });

  it('leaves a self-contained query alone', async () => {
    const generator = new ScriptedGenerator('不应被调用');

    const result = await rewriteWithHistory('刘慈欣写过哪些小说', history, generator);

    expect(result.strategy).toBe('none');
    expect(generator.prompts).toEqual([]);
  });

  it('uses the model rewrite with quotes removed', async () => {
    const generator = new ScriptedGenerator('“《三体》的作者是谁”');

    const result = await rewriteWithHistory('它的作者是谁', history, generator);

    expect(result).toEqual({ originalQuery: '它的作者是谁', rewrittenQuery: '《三体》的作者是谁', strategy: 'llm' });
  });

  it('keeps the original when the model declines or echoes it', async () => {
    const declined = await rewriteWithHistory('它的作者是谁', history, new ScriptedGenerator('无法重写该查询'));
    const echoed = await rewriteWithHistory('它的作者是谁', history, new ScriptedGenerator('它的作者是谁'));

    expect(declined.rewrittenQuery).toBe('它的作者是谁');
    expect(declined.strategy).toBe('none');
    expect(echoed.strategy).toBe('none');
  });

  it('substitutes the pronoun by rule when the model fails', async () => {
    const result = await rewriteWithHistory('它的作者是谁', history, new ScriptedGenerator(new Error('timeout')));

    expect(result).toEqual({ originalQuery: '它的作者是谁', rewrittenQuery: '三体的作者是谁', strategy: 'rule' });
  });
});

describe('rewriteWithContext', () => {
  it('replaces an English pronoun with the subject of the previous question', () => {
    expect(rewriteWithContext('how long does it last', {
      previousQuery: 'What is the battery life of the iPhone?',
    })).toBe('how long does iPhone last');
  });

  it('returns the query unchanged without a previous question', () => {
    expect(rewriteWithContext('它多少钱', {})).toBe('它多少钱');
  });
});

describe('findReferentialWord', () => {
  it('finds pronouns without matching inside words', () => {
    expect(findReferentialWord('这个方法的缺点')).toBe('这个');
    expect(findReferentialWord('Is it fast?')).toBe('it');
    expect(findReferentialWord('itinerary planning')).toBeNull();
  });
});
