/**
 * 查询改写模块
 * 把依赖上下文的追问改写成独立查询，提升召回效果
 */
import type { Generator } from '../../llm/generator';
import { errorMessage } from '../../llm/errors';
import { LEXICON, findKeyword } from '../intent/lexicon';
import { buildRewritePrompt } from '../intent/prompts';
import { extractSlotsByRules } from '../intent/slots';
import type { HistoryEntry } from '../types';

/**
 * 改写策略
 */
export type RewriteStrategy = 'llm' | 'rule' | 'none';

/**
 * 查询改写结果
 */
export interface RewriteResult {
  originalQuery: string;
  rewrittenQuery: string;
  strategy: RewriteStrategy;
}

/**
 * 查询中的指代词（没有则返回 null）
 */
export function findReferentialWord(query: string): string | null {
  return findKeyword(query, LEXICON.referential);
}

/**
 * 简单的实体提取：引号、书名号
 */
function extractEntities(text: string): string[] {
  const entities: string[] = [];

  const quoted = text.match(/[「『“"]([^」』”"]+)[」』”"]/g);
  if (quoted) {
    entities.push(...quoted.map(q => q.slice(1, -1)));
  }

  const bookTitles = text.match(/《([^》]+)》/g);
  if (bookTitles) {
    entities.push(...bookTitles.map(t => t.slice(1, -1)));
  }

  return entities;
}

/**
 * 基于规则的指代替换（模型不可用时使用）
 */
export function rewriteWithContext(
  query: string,
  context: {
    previousQuery?: string;
    previousAnswer?: string;
  },
): string {
  const pronoun = findReferentialWord(query);
  if (!pronoun || !context.previousQuery) {
    return query;
  }

  const candidates = [
    ...extractEntities(context.previousAnswer ?? ''),
    ...extractEntities(context.previousQuery),
  ];
  const entity = candidates[0] ?? extractSlotsByRules(context.previousQuery).entity;
  if (!entity) {
    return query;
  }

  if (/^[\x20-\x7e]+$/.test(pronoun)) {
    return query.replace(new RegExp(`\\b${pronoun}\\b`, 'i'), entity);
  }
  return query.replace(pronoun, entity);
}

function cleanModelOutput(text: string): string {
  return text
    .trim()
    .replace(/^(改写|重写|rewritten)\s*[：:]\s*/i, '')
    .replace(/^["'“”「」]+|["'“”「」]+$/g, '')
    .trim();
}

/**
 * 结合对话历史改写查询
 * 没有历史、没有指代词、模型拒绝或结果与原文相同时返回原查询；模型失败时使用规则替换
 */
export async function rewriteWithHistory(
  query: string,
  history: readonly HistoryEntry[],
  generator: Generator,
): Promise<RewriteResult> {
  const unchanged: RewriteResult = { originalQuery: query, rewrittenQuery: query, strategy: 'none' };
  if (history.length === 0 || !findReferentialWord(query)) {
    return unchanged;
  }

  try {
    const response = await generator.complete(buildRewritePrompt(query, history));
    const rewritten = cleanModelOutput(response);

    if (!rewritten || findKeyword(rewritten, LEXICON.declined) || rewritten === query.trim()) {
      console.log('[QueryRewriter] Rewrite skipped');
      return unchanged;
    }

    console.log(`[QueryRewriter] "${query}" -> "${rewritten}"`);
    return { originalQuery: query, rewrittenQuery: rewritten, strategy: 'llm' };
  } catch (error) {
    console.error(`[QueryRewriter] LLM rewrite failed: ${errorMessage(error)}`);
    const last = history[history.length - 1];
    const rewritten = rewriteWithContext(query, {
      previousQuery: last.query,
      previousAnswer: last.response,
    });
    return rewritten === query
      ? unchanged
      : { originalQuery: query, rewrittenQuery: rewritten, strategy: 'rule' };
  }
}
