/**
 * 多知识库 RAG Agent
 */
export * from './llm';
export * from './knowledge-base';
export * from './retrieval';
export * from './context';
export * from './agent';
