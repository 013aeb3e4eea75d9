/**
 * 知识库类型定义
 */
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../llm/errors';

/**
 * 连接器类型
 */
export type ConnectorType = 'obsidian' | 'folder';

/**
 * 知识库配置
 */
export interface KnowledgeBaseConfig {
  name: string;
  type: string;
  sourcePath: string;
  description: string;
  enabled: boolean;
  indexPath?: string;
  metadata?: Record<string, unknown>;
}

/**
 * 知识库信息（配置 + 实时统计，不持久化）
 */
export interface KnowledgeBaseInfo extends KnowledgeBaseConfig {
  indexedDocumentCount: number;
  lastIndexed: string | null;
}

/**
 * 分块元数据（键名与持久化格式保持一致）
 */
export interface ChunkMetadata {
  title: string;
  source_path: string;
  knowledge_base: string;
  chunk_index: number;
  source_type: string;
}

export interface DocumentChunk {
  id: string;
  content: string;
  metadata: ChunkMetadata;
}

/**
 * 检索结果：similarity = 1 - distance
 */
export interface RetrievalResult extends DocumentChunk {
  distance: number;
  similarity: number;
}

export const ChunkMetadataSchema = z.object({
  chunk_id: z.string().optional(),
  title: z.string().default(''),
  source_path: z.string().default(''),
  knowledge_base: z.string().default(''),
  chunk_index: z.coerce.number().default(0),
  source_type: z.string().default(''),
});

/**
 * 配置文件中的单条记录
 */
export const KnowledgeBaseRecordSchema = z.object({
  name: z.string().min(1),
  type: z.string().default('obsidian'),
  path: z.string().min(1),
  description: z.string().nullish(),
  enabled: z.boolean().default(true),
  vector_store_path: z.string().nullish(),
  metadata: z.record(z.unknown()).nullish(),
});

export const KnowledgeBaseFileSchema = z.array(KnowledgeBaseRecordSchema);

export type KnowledgeBaseRecord = z.infer<typeof KnowledgeBaseRecordSchema>;

export function fromRecord(record: KnowledgeBaseRecord): KnowledgeBaseConfig {
  return {
    name: record.name,
    type: record.type,
    sourcePath: record.path,
    description: record.description ?? '',
    enabled: record.enabled,
    indexPath: record.vector_store_path ?? undefined,
    metadata: record.metadata ?? undefined,
  };
}

export function toRecord(config: KnowledgeBaseConfig): KnowledgeBaseRecord {
  return {
    name: config.name,
    type: config.type,
    path: config.sourcePath,
    description: config.description,
    enabled: config.enabled,
    vector_store_path: config.indexPath ?? null,
    metadata: config.metadata ?? null,
  };
}

/**
 * 校验并转换一组知识库记录；格式错误抛出 ConfigurationError
 */
export function parseKnowledgeBaseRecords(data: unknown, source: string): KnowledgeBaseConfig[] {
  const parsed = KnowledgeBaseFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid knowledge base config in ${source}: ${parsed.error.message}`);
  }
  return parsed.data.map(fromRecord);
}

/**
 * 解析 JSON 文本；格式错误抛出 ConfigurationError
 */
export function parseJsonText(raw: string, source: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`${source} is not valid JSON: ${errorMessage(error)}`);
  }
}
