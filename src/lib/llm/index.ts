/**
 * LLM 模块统一导出
 */

// 配置
export { configureLLM, getDefaultConfig, resetConfig, isLLMConfigured } from './config';
export type { AgentConfig, GenerationOptions } from './config';

// 嵌入
export { EmbeddingClient, PacedEmbedding, createOpenAIEmbeddingBackend } from './embedding';
export type { EmbeddingBackend, EmbeddingBackendFactory, EmbeddingClientOptions } from './embedding';

// 生成
export { LlamaGenerator, completeWithRetry, streamWithRetry } from './generator';
export type { Generator } from './generator';

// 向量索引
export { LlamaVectorIndex } from './index-manager';
export type { VectorIndex, IndexStats } from './index-manager';

// 重试与错误
export { withRetry, ok, err, sleep, backoffDelay, DEFAULT_RETRY_POLICY } from './retry';
export type { Result, RetryPolicy } from './retry';
export {
  BackendUnavailableError,
  EmbeddingBackendError,
  GenerationBackendError,
  ConfigurationError,
  errorMessage,
} from './errors';
