/**
 * RAG 查询改写模块
 */

export {
  rewriteWithHistory,
  rewriteWithContext,
  findReferentialWord,
} from './query-rewriter';
export type { RewriteResult, RewriteStrategy } from './query-rewriter';
