/**
 * 索引管理模块
 * 每个知识库一个持久化的向量索引，外加一个记录文档数和索引时间的 manifest
 */
import { Document, MetadataMode, VectorStoreIndex, storageContextFromDefaults } from 'llamaindex';
import fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { configureLLM } from './config';
import { ChunkMetadataSchema, type DocumentChunk, type RetrievalResult } from '../knowledge-base/types';

const MANIFEST_FILE = 'manifest.json';
// storageContextFromDefaults 持久化索引结构的文件
const INDEX_STORE_FILE = 'index_store.json';

const ManifestSchema = z.object({
  documentCount: z.number().int().nonnegative(),
  lastIndexed: z.string().nullable(),
});

export type IndexStats = z.infer<typeof ManifestSchema>;

/**
 * 向量索引接口（最近邻检索原语）
 */
export interface VectorIndex {
  readonly indexPath: string;
  /** 写入分块；返回前已落盘 */
  addDocuments(chunks: DocumentChunk[]): Promise<void>;
  /** 空集合或不存在的集合返回 [] */
  search(query: string, k: number): Promise<RetrievalResult[]>;
  stats(): Promise<IndexStats>;
  clear(): Promise<void>;
  /** 用另一个（暂存）索引的内容整体替换当前内容，暂存索引随后为空 */
  replaceWith(staged: VectorIndex): Promise<void>;
}

// 只有标题参与嵌入，其余元数据仅用于溯源
const EXCLUDED_EMBED_KEYS = ['chunk_id', 'source_path', 'knowledge_base', 'chunk_index', 'source_type'];

/**
 * 基于 LlamaIndex VectorStoreIndex 的实现
 */
export class LlamaVectorIndex implements VectorIndex {
  readonly indexPath: string;
  private index: VectorStoreIndex | null = null;

  constructor(indexPath: string) {
    this.indexPath = indexPath;
  }

  private get manifestPath(): string {
    return path.join(this.indexPath, MANIFEST_FILE);
  }

  private async readManifest(): Promise<IndexStats | null> {
    if (!(await fs.pathExists(this.manifestPath))) {
      return null;
    }
    const parsed = ManifestSchema.safeParse(await fs.readJson(this.manifestPath));
    if (!parsed.success) {
      console.warn(`[Index] Ignoring malformed manifest at ${this.manifestPath}`);
      return null;
    }
    return parsed.data;
  }

  /**
   * 加载或创建索引
   */
  private async getIndex(): Promise<VectorStoreIndex> {
    if (this.index) {
      return this.index;
    }
    configureLLM();
    await fs.ensureDir(this.indexPath);

    const storageContext = await storageContextFromDefaults({
      persistDir: this.indexPath,
    });

    // 已有索引结构则加载，否则以空节点创建
    if (await fs.pathExists(path.join(this.indexPath, INDEX_STORE_FILE))) {
      this.index = await VectorStoreIndex.init({ storageContext });
      console.log(`[Index] Index loaded from ${this.indexPath}`);
    } else {
      this.index = await VectorStoreIndex.init({ storageContext, nodes: [] });
      console.log(`[Index] Index created at ${this.indexPath}`);
    }
    return this.index;
  }

  async addDocuments(chunks: DocumentChunk[]): Promise<void> {
    if (chunks.length === 0) {
      return;
    }
    const index = await this.getIndex();

    for (const chunk of chunks) {
      const doc = new Document({
        id_: chunk.id,
        text: chunk.content,
        metadata: { ...chunk.metadata, chunk_id: chunk.id },
        excludedEmbedMetadataKeys: EXCLUDED_EMBED_KEYS,
      });
      await index.insert(doc);
    }

    const previous = await this.readManifest();
    await fs.writeJson(this.manifestPath, {
      documentCount: (previous?.documentCount ?? 0) + chunks.length,
      lastIndexed: new Date().toISOString(),
    } satisfies IndexStats);
    console.log(`[Index] Added ${chunks.length} chunks to ${this.indexPath}`);
  }

  async search(query: string, k: number): Promise<RetrievalResult[]> {
    const manifest = await this.readManifest();
    if (!manifest || manifest.documentCount === 0) {
      return [];
    }

    const index = await this.getIndex();
    const retriever = index.asRetriever({ similarityTopK: k });
    const nodes = await retriever.retrieve(query);

    return nodes.map(node => {
      const metadata = ChunkMetadataSchema.parse(node.node.metadata);
      const similarity = node.score ?? 0;
      const { chunk_id: chunkId, ...chunkMetadata } = metadata;
      return {
        id: chunkId ?? node.node.id_,
        content: node.node.getContent(MetadataMode.NONE),
        metadata: chunkMetadata,
        distance: 1 - similarity,
        similarity,
      };
    });
  }

  async stats(): Promise<IndexStats> {
    return (await this.readManifest()) ?? { documentCount: 0, lastIndexed: null };
  }

  async clear(): Promise<void> {
    this.index = null;
    if (await fs.pathExists(this.indexPath)) {
      await fs.remove(this.indexPath);
      console.log(`[Index] Index deleted at ${this.indexPath}`);
    }
  }

  async replaceWith(staged: VectorIndex): Promise<void> {
    if (staged.indexPath === this.indexPath) {
      return;
    }
    await this.clear();
    if (await fs.pathExists(staged.indexPath)) {
      await fs.move(staged.indexPath, this.indexPath);
    }
    // 暂存句柄可能还持有已移走目录的内存索引
    await staged.clear();
    console.log(`[Index] Index at ${this.indexPath} replaced from ${staged.indexPath}`);
  }
}
