/**
 * 跨知识库检索
 * 对每个启用的知识库分别检索、分别过滤，按注册顺序拼接结果（不做全局重排）
 */
import type { KnowledgeBaseRegistry } from '../knowledge-base/registry';
import type { RetrievalResult } from '../knowledge-base/types';
import { Retriever, type FilteredResults, type RetrieverOptions } from './retriever';

export class CrossKnowledgeBaseOrchestrator {
  private readonly registry: KnowledgeBaseRegistry;
  private readonly options: Omit<RetrieverOptions, 'collection'>;
  private readonly retrievers = new Map<string, Retriever>();

  constructor(registry: KnowledgeBaseRegistry, options: Omit<RetrieverOptions, 'collection'> = {}) {
    this.registry = registry;
    this.options = options;
  }

  /**
   * 复用检索器；注册表换了新的索引句柄时重建
   */
  private async retrieverFor(name: string): Promise<Retriever | null> {
    const index = await this.registry.getVectorStore(name);
    if (!index) {
      this.retrievers.delete(name);
      return null;
    }
    const cached = this.retrievers.get(name);
    if (cached && cached.index === index) {
      return cached;
    }
    const retriever = new Retriever(index, { ...this.options, collection: name });
    this.retrievers.set(name, retriever);
    return retriever;
  }

  async retrieveFromAll(query: string): Promise<FilteredResults> {
    const enabled = this.registry.enabledNames();
    const merged: RetrievalResult[] = [];

    for (const cachedName of [...this.retrievers.keys()]) {
      if (!enabled.includes(cachedName)) {
        this.retrievers.delete(cachedName);
      }
    }

    for (const name of enabled) {
      const retriever = await this.retrieverFor(name);
      if (!retriever) {
        console.warn(`[Orchestrator] Skipping unavailable knowledge base ${name}`);
        continue;
      }
      const { results } = await retriever.retrieveAndFilter(query);
      console.log(`[Orchestrator] ${name}: ${results.length} relevant results`);
      merged.push(...results);
    }

    return { results: merged, hasRelevant: merged.length > 0 };
  }
}
