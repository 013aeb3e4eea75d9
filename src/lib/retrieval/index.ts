export { Retriever, filterByRelevance, formatResults, RELEVANCE_DEFAULTS } from './retriever';
export type { RelevanceConstants, RetrieverOptions, FilteredResults } from './retriever';
export { CrossKnowledgeBaseOrchestrator } from './orchestrator';
