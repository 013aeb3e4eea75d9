/**
 * 配置模块
 * 负责读取环境变量，并初始化 LLM、Embedding 和文档切分器
 */
import { Settings, SentenceSplitter } from 'llamaindex';
import { OpenAI } from '@llamaindex/openai';
import { z } from 'zod';
import { EmbeddingClient, PacedEmbedding, createOpenAIEmbeddingBackend } from './embedding';

let isConfigured = false;

/**
 * 生成参数（低温度以减少幻觉）
 */
export interface GenerationOptions {
  temperature: number;
  topP: number;
  topK: number;
}

/**
 * 智能体配置参数
 */
export interface AgentConfig {
  vaultPath: string;
  knowledgeBaseRoot: string;
  obsidianApiUrl: string;
  obsidianApiKey: string;
  apiKey: string;
  baseURL: string;
  llmModel: string;
  embeddingModel: string;
  embeddingRequestDelayMs: number;
  embeddingTimeoutMs: number;
  vectorStorePath: string;
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  similarityThreshold: number;
  generation: GenerationOptions;
  knowledgeBasesConfig: string;
  knowledgeBasesFile: string;
  historyWindow: number;
  hallucinationCheck: boolean;
}

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

function numberVar(key: string, fallback: number) {
  return z
    .preprocess(blankToUndefined, z.coerce.number().default(fallback))
    .catch(({ input }) => {
      console.warn(`[Config] Invalid number for ${key}: "${String(input)}", using ${fallback}`);
      return fallback;
    });
}

function stringVar(fallback: string) {
  return z.preprocess(blankToUndefined, z.string().default(fallback));
}

const booleanVar = z.preprocess(
  value => (typeof value === 'string' ? ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase()) : value),
  z.boolean().default(false),
);

const EnvSchema = z.object({
  OBSIDIAN_VAULT_PATH: stringVar('./vault'),
  KNOWLEDGE_BASE_ROOT: z.preprocess(blankToUndefined, z.string().optional()),
  OBSIDIAN_API_URL: z.string().default(''),
  OBSIDIAN_API_KEY: z.string().default(''),
  OPENAI_API_KEY: stringVar('ollama'),
  OPENAI_API_BASE: stringVar('http://localhost:11434/v1'),
  OPENAI_MODEL: stringVar('qwen2.5:7b'),
  EMBEDDING_MODEL: stringVar('bge-m3:latest'),
  EMBEDDING_REQUEST_DELAY_MS: numberVar('EMBEDDING_REQUEST_DELAY_MS', 2000),
  EMBEDDING_TIMEOUT_MS: numberVar('EMBEDDING_TIMEOUT_MS', 180000),
  VECTOR_DB_PATH: stringVar('./vector_store'),
  CHUNK_SIZE: numberVar('CHUNK_SIZE', 1000),
  CHUNK_OVERLAP: numberVar('CHUNK_OVERLAP', 200),
  TOP_K: numberVar('TOP_K', 5),
  SIMILARITY_THRESHOLD: numberVar('SIMILARITY_THRESHOLD', 0.3),
  GENERATION_TEMPERATURE: numberVar('GENERATION_TEMPERATURE', 0.2),
  GENERATION_TOP_P: numberVar('GENERATION_TOP_P', 0.8),
  GENERATION_TOP_K: numberVar('GENERATION_TOP_K', 30),
  KNOWLEDGE_BASES_CONFIG: z.string().default(''),
  KNOWLEDGE_BASES_FILE: stringVar('./knowledge_bases.json'),
  HISTORY_WINDOW: numberVar('HISTORY_WINDOW', 10),
  HALLUCINATION_CHECK: booleanVar,
});

/**
 * 获取默认配置（从环境变量）
 */
export function getDefaultConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const vars = EnvSchema.parse(env);

  return {
    vaultPath: vars.OBSIDIAN_VAULT_PATH,
    knowledgeBaseRoot: vars.KNOWLEDGE_BASE_ROOT ?? vars.OBSIDIAN_VAULT_PATH,
    obsidianApiUrl: vars.OBSIDIAN_API_URL,
    obsidianApiKey: vars.OBSIDIAN_API_KEY,
    apiKey: vars.OPENAI_API_KEY,
    baseURL: vars.OPENAI_API_BASE,
    llmModel: vars.OPENAI_MODEL,
    embeddingModel: vars.EMBEDDING_MODEL,
    embeddingRequestDelayMs: vars.EMBEDDING_REQUEST_DELAY_MS,
    embeddingTimeoutMs: vars.EMBEDDING_TIMEOUT_MS,
    vectorStorePath: vars.VECTOR_DB_PATH,
    chunkSize: vars.CHUNK_SIZE,
    chunkOverlap: vars.CHUNK_OVERLAP,
    topK: vars.TOP_K,
    similarityThreshold: vars.SIMILARITY_THRESHOLD,
    generation: {
      temperature: vars.GENERATION_TEMPERATURE,
      topP: vars.GENERATION_TOP_P,
      topK: vars.GENERATION_TOP_K,
    },
    knowledgeBasesConfig: vars.KNOWLEDGE_BASES_CONFIG,
    knowledgeBasesFile: vars.KNOWLEDGE_BASES_FILE,
    historyWindow: vars.HISTORY_WINDOW,
    hallucinationCheck: vars.HALLUCINATION_CHECK,
  };
}

/**
 * 配置 LLM 和 Embedding（幂等操作）
 */
export function configureLLM(config?: Partial<AgentConfig>): void {
  if (isConfigured) {
    return;
  }

  const finalConfig = { ...getDefaultConfig(), ...config };

  console.log('[LLM Config] Base URL:', finalConfig.baseURL);
  console.log('[LLM Config] LLM Model:', finalConfig.llmModel);
  console.log('[LLM Config] Embedding Model:', finalConfig.embeddingModel);
  console.log('[LLM Config] API Key:', finalConfig.apiKey ? `${finalConfig.apiKey.substring(0, 4)}...` : 'NOT SET');

  // 配置 LLM（top_k 不属于 OpenAI 兼容接口参数，只保留在配置里）
  Settings.llm = new OpenAI({
    apiKey: finalConfig.apiKey,
    model: finalConfig.llmModel,
    baseURL: finalConfig.baseURL,
    temperature: finalConfig.generation.temperature,
    topP: finalConfig.generation.topP,
  });

  // 配置 Embedding：逐条请求 + 请求间隔
  const embeddingClient = new EmbeddingClient(
    createOpenAIEmbeddingBackend({
      apiKey: finalConfig.apiKey,
      baseURL: finalConfig.baseURL,
      model: finalConfig.embeddingModel,
      timeoutMs: finalConfig.embeddingTimeoutMs,
    }),
    { requestDelayMs: finalConfig.embeddingRequestDelayMs },
  );
  Settings.embedModel = new PacedEmbedding(embeddingClient);

  // 配置文档切分器
  Settings.nodeParser = new SentenceSplitter({
    chunkSize: finalConfig.chunkSize,
    chunkOverlap: finalConfig.chunkOverlap,
  });
  console.log(`[LLM Config] Node Parser: SentenceSplitter(chunkSize=${finalConfig.chunkSize}, chunkOverlap=${finalConfig.chunkOverlap})`);
  console.log(`[LLM Config] Embedding request delay: ${finalConfig.embeddingRequestDelayMs}ms`);

  isConfigured = true;
  console.log('[LLM Config] ✅ Configuration completed');
}

/**
 * 重置配置状态（用于测试）
 */
export function resetConfig(): void {
  isConfigured = false;
}

/**
 * 检查是否已配置
 */
export function isLLMConfigured(): boolean {
  return isConfigured;
}
