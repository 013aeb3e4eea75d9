/**
 * 生成模块
 * 文本 + 文本 -> 文本；所有调用方都通过 Generator 接口访问模型，便于替换和测试
 */
import { Settings } from 'llamaindex';
import type { LLM } from 'llamaindex';
import { GenerationBackendError } from './errors';
import { DEFAULT_RETRY_POLICY, withRetry, type Result, type RetryPolicy } from './retry';

export interface Generator {
  complete(prompt: string): Promise<string>;
  stream(prompt: string): AsyncIterable<string>;
}

/**
 * 基于 LlamaIndex Settings.llm 的生成器
 */
export class LlamaGenerator implements Generator {
  private readonly llm: LLM | null;

  constructor(llm?: LLM) {
    this.llm = llm ?? null;
  }

  // Settings.llm 在 configureLLM() 之后才可用，因此延迟读取
  private resolve(): LLM {
    return this.llm ?? Settings.llm;
  }

  async complete(prompt: string): Promise<string> {
    const response = await this.resolve().complete({ prompt });
    return response.text;
  }

  async *stream(prompt: string): AsyncIterable<string> {
    const chunks = await this.resolve().complete({ prompt, stream: true });
    for await (const chunk of chunks) {
      if (chunk.text) {
        yield chunk.text;
      }
    }
  }
}

/**
 * 带重试的单次生成
 */
export function completeWithRetry(
  generator: Generator,
  prompt: string,
  label: string,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): Promise<Result<string, GenerationBackendError>> {
  return withRetry(
    () => generator.complete(prompt),
    label,
    (lastError, attempts) => new GenerationBackendError(
      `Generation backend unavailable after ${attempts} attempts`,
      attempts,
      lastError,
    ),
    policy,
  );
}

/**
 * 流式生成：只有在第一个 token 到达之前的失败才会重试，
 * 已经输出的内容不会重复输出
 */
export async function* streamWithRetry(
  generator: Generator,
  prompt: string,
  label: string,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): AsyncGenerator<string, void, undefined> {
  const opened = await withRetry(
    async () => {
      const iterator = generator.stream(prompt)[Symbol.asyncIterator]();
      const first = await iterator.next();
      return { iterator, first };
    },
    label,
    (lastError, attempts) => new GenerationBackendError(
      `Generation backend unavailable after ${attempts} attempts`,
      attempts,
      lastError,
    ),
    policy,
  );

  if (!opened.ok) {
    throw opened.error;
  }

  const { iterator, first } = opened.value;
  try {
    let current = first;
    while (!current.done) {
      yield current.value;
      current = await iterator.next();
    }
  } finally {
    await iterator.return?.();
  }
}
