/**
 * 检索器
 * 对单个知识库做最近邻检索，并按本次结果的相似度分布自适应地过滤
 */
import type { VectorIndex } from '../llm/index-manager';
import { errorMessage } from '../llm/errors';
import type { RetrievalResult } from '../knowledge-base/types';

/**
 * 相关性过滤常数（经验值，可覆盖）
 */
export interface RelevanceConstants {
  absoluteFloor: number;   // 最高相似度低于此值时整组结果视为无关
  meanRatio: number;       // 自适应阈值 = max(配置阈值, 平均相似度 * meanRatio)
  fallbackRatio: number;   // 回退阈值 = max(最低相似度 * fallbackRatio, fallbackFloor)
  fallbackFloor: number;
}

export const RELEVANCE_DEFAULTS: RelevanceConstants = {
  absoluteFloor: 0.1,
  meanRatio: 0.5,
  fallbackRatio: 0.3,
  fallbackFloor: 0.1,
};

export interface RetrieverOptions {
  topK?: number;
  similarityThreshold?: number;
  /** 共享索引时，检索后只保留 knowledge_base 等于该名称的结果 */
  collection?: string;
  constants?: Partial<RelevanceConstants>;
}

export interface FilteredResults {
  results: RetrievalResult[];
  hasRelevant: boolean;
}

/**
 * 自适应相关性过滤
 */
export function filterByRelevance(
  candidates: RetrievalResult[],
  similarityThreshold: number,
  constants: RelevanceConstants = RELEVANCE_DEFAULTS,
): FilteredResults {
  if (candidates.length === 0) {
    return { results: [], hasRelevant: false };
  }

  const similarities = candidates.map(candidate => candidate.similarity);
  const maxSimilarity = Math.max(...similarities);
  const minSimilarity = Math.min(...similarities);
  const meanSimilarity = similarities.reduce((sum, value) => sum + value, 0) / similarities.length;

  if (maxSimilarity < constants.absoluteFloor) {
    console.log(`[Retriever] Max similarity ${maxSimilarity.toFixed(3)} below floor, no relevant documents`);
    return { results: [], hasRelevant: false };
  }

  const adaptiveThreshold = Math.max(similarityThreshold, meanSimilarity * constants.meanRatio);
  let results = candidates.filter(candidate => candidate.similarity >= adaptiveThreshold);

  if (results.length === 0) {
    const looseThreshold = Math.max(minSimilarity * constants.fallbackRatio, constants.fallbackFloor);
    console.log(`[Retriever] Adaptive threshold ${adaptiveThreshold.toFixed(3)} matched nothing, retrying with ${looseThreshold.toFixed(3)}`);
    results = candidates.filter(candidate => candidate.similarity >= looseThreshold);
  } else {
    console.log(`[Retriever] Adaptive threshold ${adaptiveThreshold.toFixed(3)} kept ${results.length}/${candidates.length}`);
  }

  return { results, hasRelevant: results.length > 0 };
}

/**
 * 单个知识库的检索器
 */
export class Retriever {
  readonly index: VectorIndex;
  private topK: number;
  private similarityThreshold: number;
  private collection?: string;
  private constants: RelevanceConstants;

  constructor(index: VectorIndex, options: RetrieverOptions = {}) {
    this.index = index;
    this.topK = options.topK ?? 5;
    this.similarityThreshold = options.similarityThreshold ?? 0.3;
    this.collection = options.collection;
    this.constants = { ...RELEVANCE_DEFAULTS, ...options.constants };
  }

  async retrieve(query: string): Promise<RetrievalResult[]> {
    const results = await this.index.search(query, this.topK);
    console.log(`[Retriever] Retrieved ${results.length} candidates`);
    return results;
  }

  /**
   * 检索并过滤；检索失败时返回空结果
   */
  async retrieveAndFilter(query: string, collectionFilter: string | undefined = this.collection): Promise<FilteredResults> {
    try {
      let candidates = await this.retrieve(query);
      if (collectionFilter !== undefined) {
        candidates = candidates.filter(candidate => candidate.metadata.knowledge_base === collectionFilter);
      }
      return filterByRelevance(candidates, this.similarityThreshold, this.constants);
    } catch (error) {
      console.error(`[Retriever] Retrieval failed: ${errorMessage(error)}`);
      return { results: [], hasRelevant: false };
    }
  }
}

const CONTENT_PREVIEW_LENGTH = 500;

/**
 * 格式化检索结果作为上下文
 */
export function formatResults(results: RetrievalResult[]): string {
  if (results.length === 0) {
    return '未找到相关文档内容。';
  }

  const formatted = results.map(result => {
    const content = result.content.length > CONTENT_PREVIEW_LENGTH
      ? `${result.content.substring(0, CONTENT_PREVIEW_LENGTH)}...`
      : result.content;
    return [
      `文档: ${result.metadata.title || 'Unknown'}`,
      `知识库: ${result.metadata.knowledge_base || 'Unknown'}`,
      `路径: ${result.metadata.source_path || 'Unknown'}`,
      `内容: ${content}`,
      `相似度: ${result.similarity.toFixed(3)}`,
      '',
    ].join('\n');
  });

  const separator = '='.repeat(50);
  return `\n${separator}\n${formatted.join('\n')}\n${separator}`;
}
