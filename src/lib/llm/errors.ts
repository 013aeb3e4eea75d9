/**
 * 错误类型
 * 后端不可用（嵌入 / 生成）与配置错误
 */

/**
 * 模型后端不可用（重试耗尽后抛出）
 */
export class BackendUnavailableError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super(message, { cause });
    this.name = 'BackendUnavailableError';
    this.attempts = attempts;
  }
}

export class EmbeddingBackendError extends BackendUnavailableError {
  constructor(message: string, attempts: number, cause?: unknown) {
    super(message, attempts, cause);
    this.name = 'EmbeddingBackendError';
  }
}

export class GenerationBackendError extends BackendUnavailableError {
  constructor(message: string, attempts: number, cause?: unknown) {
    super(message, attempts, cause);
    this.name = 'GenerationBackendError';
  }
}

/**
 * 配置错误：JSON 格式错误、知识库不存在、路径缺失等
 * 公共操作只记录日志并返回 false / null，不会把它抛给调用方
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * 提取错误信息（用于日志）
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
