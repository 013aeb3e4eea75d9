/**
 * 重试模块
 * 所有调用嵌入 / 生成后端的地方都经过 withRetry，返回显式的 Result
 */

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * 重试策略
 */
export interface RetryPolicy {
  maxRetries: number;          // 首次调用之外的最大重试次数
  initialDelayMs: number;      // 第一次重试前的等待
  backoffFactor: number;       // 每次重试等待时间的倍数
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  initialDelayMs: 1000,
  backoffFactor: 3,
};

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * 第 retry 次重试（从 0 开始）前的等待时间
 */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  return policy.initialDelayMs * Math.pow(policy.backoffFactor, retry);
}

/**
 * 带指数退避的重试包装
 * @param operation 后端调用，attempt 从 1 开始
 * @param label 日志标签
 * @param toError 重试耗尽后把最后一次错误包装成调用方需要的错误类型
 */
export async function withRetry<T, E extends Error>(
  operation: (attempt: number) => Promise<T>,
  label: string,
  toError: (lastError: unknown, attempts: number) => E,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): Promise<Result<T, E>> {
  const totalAttempts = policy.maxRetries + 1;
  let lastError: unknown;

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    try {
      return ok(await operation(attempt));
    } catch (error) {
      lastError = error;
      console.error(`[Retry] ${label} failed (attempt ${attempt}/${totalAttempts}):`, error);

      if (attempt < totalAttempts) {
        const wait = backoffDelay(policy, attempt - 1);
        console.log(`[Retry] ${label}: waiting ${wait}ms before retry`);
        await sleep(wait);
      }
    }
  }

  return err(toError(lastError, totalAttempts));
}
