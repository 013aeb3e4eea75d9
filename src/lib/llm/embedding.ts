/**
 * 嵌入模块
 * 逐条请求嵌入后端，请求之间强制间隔，避免压垮本地推理服务（如 Ollama）
 */
import { BaseEmbedding } from 'llamaindex';
import { OpenAIEmbedding } from '@llamaindex/openai';
import { EmbeddingBackendError } from './errors';
import { DEFAULT_RETRY_POLICY, sleep, withRetry, type RetryPolicy } from './retry';

/**
 * 单条文本 -> 向量
 */
export type EmbeddingBackend = (text: string) => Promise<number[]>;

/**
 * 每次请求都重新创建后端句柄：本地嵌入服务在连接复用时不稳定
 */
export type EmbeddingBackendFactory = () => EmbeddingBackend;

export interface EmbeddingClientOptions {
  requestDelayMs: number;
  retryPolicy?: RetryPolicy;
}

/**
 * 创建 OpenAI 兼容的嵌入后端（Ollama / DashScope / OpenAI）
 */
export function createOpenAIEmbeddingBackend(options: {
  apiKey: string;
  baseURL: string;
  model: string;
  timeoutMs: number;
}): EmbeddingBackendFactory {
  return () => {
    const embedModel = new OpenAIEmbedding({
      apiKey: options.apiKey,
      model: options.model,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
    });
    return text => embedModel.getTextEmbedding(text);
  };
}

function assertWellFormed(vector: unknown): number[] {
  if (!Array.isArray(vector) || vector.length === 0) {
    throw new Error('Embedding backend returned an empty vector');
  }
  const values: number[] = [];
  for (const value of vector) {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new Error('Embedding backend returned a non-numeric component');
    }
    values.push(value);
  }
  return values;
}

/**
 * 嵌入客户端
 * 所有请求串行执行；上一条请求结束后至少等待 requestDelayMs 再发下一条
 */
export class EmbeddingClient {
  private readonly createBackend: EmbeddingBackendFactory;
  private readonly requestDelayMs: number;
  private readonly retryPolicy: RetryPolicy;
  private tail: Promise<unknown> = Promise.resolve();
  private lastRequestEndedAt: number | null = null;

  constructor(createBackend: EmbeddingBackendFactory, options: EmbeddingClientOptions) {
    this.createBackend = createBackend;
    this.requestDelayMs = options.requestDelayMs;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  }

  /**
   * 批量嵌入（内部仍是一条一条请求）
   */
  async embed(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];
    for (let i = 0; i < texts.length; i++) {
      embeddings.push(await this.embedOne(texts[i]));
      console.log(`[Embedding] Embedded ${i + 1}/${texts.length}`);
    }
    return embeddings;
  }

  /**
   * 嵌入单条文本；重试耗尽时抛出 EmbeddingBackendError
   */
  embedOne(text: string): Promise<number[]> {
    return this.serialize(async () => {
      await this.waitForSlot();
      try {
        const result = await withRetry(
          async () => assertWellFormed(await this.createBackend()(text)),
          'Embedding request',
          (lastError, attempts) => new EmbeddingBackendError(
            `Embedding backend unavailable after ${attempts} attempts`,
            attempts,
            lastError,
          ),
          this.retryPolicy,
        );
        if (!result.ok) {
          throw result.error;
        }
        return result.value;
      } finally {
        this.lastRequestEndedAt = Date.now();
      }
    });
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastRequestEndedAt === null) return;
    const elapsed = Date.now() - this.lastRequestEndedAt;
    await sleep(this.requestDelayMs - elapsed);
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(() => task(), () => task());
    this.tail = run.catch(() => undefined);
    return run;
  }
}

/**
 * 把 EmbeddingClient 适配为 LlamaIndex 的嵌入模型
 * 索引构建时 LlamaIndex 会逐条调用 getTextEmbedding
 */
export class PacedEmbedding extends BaseEmbedding {
  private readonly client: EmbeddingClient;

  constructor(client: EmbeddingClient) {
    super();
    this.client = client;
  }

  async getTextEmbedding(text: string): Promise<number[]> {
    return this.client.embedOne(text);
  }
}
