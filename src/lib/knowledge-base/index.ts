/**
 * 知识库模块导出
 */
export { KnowledgeBaseRegistry } from './registry';
export type { RegistryOptions, IndexReport } from './registry';
export {
  createRegistry,
  discoverKnowledgeBases,
  discoverFromDirectory,
  defaultKnowledgeBase,
  parseExplicitConfigs,
  loadConfigFile,
  knowledgeBaseNameForDirectory,
} from './discovery';
export { createConnector, isConnectorType, ObsidianConnector, FolderConnector } from './connectors';
export type { Connector, ConnectorOptions, NoteRef } from './connectors';
export { createSentenceChunker } from './chunker';
export type { Chunker } from './chunker';
export { extractTextFromMarkdown } from './markdown';
export { KeyedMutex } from './keyed-mutex';
export { fromRecord, toRecord, parseKnowledgeBaseRecords, parseJsonText } from './types';
export type {
  ConnectorType,
  KnowledgeBaseConfig,
  KnowledgeBaseInfo,
  KnowledgeBaseRecord,
  ChunkMetadata,
  DocumentChunk,
  RetrievalResult,
} from './types';
