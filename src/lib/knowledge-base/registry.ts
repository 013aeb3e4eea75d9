/**
 * 知识库注册表
 * 管理多个独立配置、独立索引的知识库；索引和连接器句柄按名称懒加载
 */
import fs from 'fs-extra';
import * as path from 'path';
import { LlamaVectorIndex, type VectorIndex } from '../llm/index-manager';
import { BackendUnavailableError, errorMessage } from '../llm/errors';
import { createConnector, type Connector, type ConnectorOptions } from './connectors';
import type { Chunker } from './chunker';
import { KeyedMutex } from './keyed-mutex';
import {
  parseJsonText,
  parseKnowledgeBaseRecords,
  toRecord,
  type DocumentChunk,
  type KnowledgeBaseConfig,
  type KnowledgeBaseInfo,
} from './types';

export interface RegistryOptions {
  /** 未指定 indexPath 时，索引放在 <indexRoot>/<name> */
  indexRoot: string;
  chunker: Chunker;
  connectorOptions?: ConnectorOptions;
  createIndex?: (indexPath: string) => VectorIndex;
  createConnector?: (config: KnowledgeBaseConfig, options: ConnectorOptions) => Connector | null;
}

/**
 * 单次索引的结果
 */
export interface IndexReport {
  name: string;
  success: boolean;
  noteCount: number;
  chunkCount: number;
  failedNotes: string[];
}

/**
 * 暂存索引与正式索引并列放置
 */
export function stagingPath(indexPath: string): string {
  return `${path.resolve(indexPath)}.staging`;
}

function copyConfig(config: KnowledgeBaseConfig): KnowledgeBaseConfig {
  return {
    ...config,
    ...(config.metadata ? { metadata: { ...config.metadata } } : {}),
  };
}

export class KnowledgeBaseRegistry {
  private readonly configs = new Map<string, KnowledgeBaseConfig>();
  private readonly indexes = new Map<string, VectorIndex>();
  private readonly connectors = new Map<string, Connector>();
  private readonly locks = new KeyedMutex();
  private readonly options: RegistryOptions;

  constructor(options: RegistryOptions, initial: KnowledgeBaseConfig[] = []) {
    this.options = options;
    for (const config of initial) {
      this.configs.set(config.name, copyConfig(config));
    }
  }

  /**
   * 添加知识库；源路径不存在时返回 false，同名覆盖时记录警告
   */
  add(config: KnowledgeBaseConfig): Promise<boolean> {
    return this.locks.runExclusive(config.name, async () => {
      try {
        if (!(await fs.pathExists(config.sourcePath))) {
          console.error(`[KnowledgeBase] Source path does not exist: ${config.sourcePath}`);
          return false;
        }
        if (this.configs.has(config.name)) {
          console.warn(`[KnowledgeBase] ${config.name} already exists and will be overwritten`);
          this.evict(config.name);
        }
        this.configs.set(config.name, copyConfig(config));
        console.log(`[KnowledgeBase] Added ${config.name} (${config.type}) at ${config.sourcePath}`);
        return true;
      } catch (error) {
        console.error(`[KnowledgeBase] Failed to add ${config.name}:`, error);
        return false;
      }
    });
  }

  /**
   * 移除知识库，同时释放索引和连接器句柄
   */
  remove(name: string): Promise<boolean> {
    return this.locks.runExclusive(name, async () => {
      if (!this.configs.has(name)) {
        console.warn(`[KnowledgeBase] ${name} does not exist`);
        return false;
      }
      this.evict(name);
      this.configs.delete(name);
      console.log(`[KnowledgeBase] Removed ${name}`);
      return true;
    });
  }

  get(name: string): KnowledgeBaseConfig | null {
    const config = this.configs.get(name);
    return config ? copyConfig(config) : null;
  }

  has(name: string): boolean {
    return this.configs.has(name);
  }

  setEnabled(name: string, enabled: boolean): Promise<boolean> {
    return this.locks.runExclusive(name, async () => {
      const config = this.configs.get(name);
      if (!config) {
        console.warn(`[KnowledgeBase] ${name} does not exist`);
        return false;
      }
      config.enabled = enabled;
      console.log(`[KnowledgeBase] ${name} ${enabled ? 'enabled' : 'disabled'}`);
      return true;
    });
  }

  /** 插入顺序 */
  names(): string[] {
    return [...this.configs.keys()];
  }

  enabledNames(): string[] {
    return [...this.configs.values()].filter(config => config.enabled).map(config => config.name);
  }

  /**
   * 知识库列表（带文档计数和最后索引时间）
   */
  async list(): Promise<KnowledgeBaseInfo[]> {
    const infos: KnowledgeBaseInfo[] = [];
    for (const config of this.configs.values()) {
      let indexedDocumentCount = 0;
      let lastIndexed: string | null = null;
      try {
        const index = this.indexes.get(config.name) ?? this.buildIndex(config);
        const stats = await index.stats();
        indexedDocumentCount = stats.documentCount;
        lastIndexed = stats.lastIndexed;
      } catch (error) {
        console.warn(`[KnowledgeBase] Could not read stats for ${config.name}: ${errorMessage(error)}`);
      }
      infos.push({ ...copyConfig(config), indexedDocumentCount, lastIndexed });
    }
    return infos;
  }

  resolveIndexPath(config: KnowledgeBaseConfig): string {
    return config.indexPath ?? path.join(this.options.indexRoot, config.name);
  }

  /**
   * 获取向量索引（懒加载）；未知或禁用的知识库返回 null
   */
  getVectorStore(name: string): Promise<VectorIndex | null> {
    return this.locks.runExclusive(name, async () => {
      const config = this.usableConfig(name);
      if (!config) return null;
      try {
        return this.ensureIndex(config);
      } catch (error) {
        console.error(`[KnowledgeBase] Failed to open index for ${name}:`, error);
        return null;
      }
    });
  }

  /**
   * 获取连接器（懒加载）；未知、禁用或类型不支持时返回 null
   */
  getConnector(name: string): Promise<Connector | null> {
    return this.locks.runExclusive(name, async () => {
      const config = this.usableConfig(name);
      return config ? this.ensureConnector(config) : null;
    });
  }

  async index(name: string): Promise<boolean> {
    return (await this.indexWithReport(name)).success;
  }

  /**
   * 重建知识库索引
   * 先写入暂存索引，整次运行完成后才替换现有索引；列表失败、模型后端不可用
   * 或全部笔记失败时保留原索引并返回失败。单篇笔记失败只记录，不中断索引过程
   */
  indexWithReport(name: string): Promise<IndexReport> {
    return this.locks.runExclusive(name, async () => {
      const report: IndexReport = { name, success: false, noteCount: 0, chunkCount: 0, failedNotes: [] };
      const config = this.usableConfig(name);
      if (!config) return report;

      const connector = this.ensureConnector(config);
      if (!connector) {
        console.error(`[KnowledgeBase] No connector available for ${name}`);
        return report;
      }

      let staging: VectorIndex | null = null;
      try {
        console.log(`[KnowledgeBase] Indexing ${name}...`);
        const notes = await connector.listDocuments();
        report.noteCount = notes.length;
        console.log(`[KnowledgeBase] ${name}: found ${notes.length} notes`);

        const vectorIndex = this.ensureIndex(config);
        staging = this.buildIndexAt(stagingPath(vectorIndex.indexPath));
        // 上次中断留下的暂存内容
        await staging.clear();

        for (const note of notes) {
          try {
            const content = await connector.getContent(note);
            if (!content.trim()) continue;

            const chunks: DocumentChunk[] = this.options.chunker(content).map((text, i) => ({
              id: `${name}_${note.id}_chunk_${i}`,
              content: text,
              metadata: {
                title: note.title,
                source_path: note.id,
                knowledge_base: name,
                chunk_index: i,
                source_type: config.type,
              },
            }));
            await staging.addDocuments(chunks);
            report.chunkCount += chunks.length;
          } catch (error) {
            if (error instanceof BackendUnavailableError) throw error;
            report.failedNotes.push(note.id);
            console.error(`[KnowledgeBase] ${name}: failed to index ${note.id}: ${errorMessage(error)}`);
          }
        }

        if (notes.length > 0 && report.failedNotes.length === notes.length) {
          throw new Error(`all ${notes.length} notes failed`);
        }

        await vectorIndex.replaceWith(staging);
        report.success = true;
        if (report.failedNotes.length > 0) {
          console.warn(`[KnowledgeBase] ${name}: ${report.failedNotes.length} notes failed: ${report.failedNotes.join(', ')}`);
        }
        if (report.chunkCount === 0) {
          console.warn(`[KnowledgeBase] ${name}: no indexable content found`);
        }
        console.log(`[KnowledgeBase] ✅ ${name}: indexed ${report.chunkCount} chunks from ${report.noteCount - report.failedNotes.length} notes`);
      } catch (error) {
        console.error(`[KnowledgeBase] ❌ Failed to index ${name}, keeping the previous index: ${errorMessage(error)}`);
        if (staging) {
          await this.discardStaging(staging);
        }
      }
      return report;
    });
  }

  /**
   * 索引所有启用的知识库；禁用的知识库视为成功且不做处理
   */
  async indexAll(): Promise<Record<string, boolean>> {
    const results: Record<string, boolean> = {};
    for (const name of this.names()) {
      const config = this.configs.get(name);
      if (!config) continue;
      if (config.enabled) {
        results[name] = await this.index(name);
      } else {
        console.log(`[KnowledgeBase] Skipping disabled ${name}`);
        results[name] = true;
      }
    }
    return results;
  }

  async saveConfigs(filePath: string): Promise<boolean> {
    try {
      const records = [...this.configs.values()].map(toRecord);
      await fs.ensureDir(path.dirname(filePath));
      await fs.writeJson(filePath, records, { spaces: 2 });
      console.log(`[KnowledgeBase] Saved ${records.length} configs to ${filePath}`);
      return true;
    } catch (error) {
      console.error(`[KnowledgeBase] Failed to save configs:`, error);
      return false;
    }
  }

  /**
   * 从文件加载配置，替换当前全部配置；文件无效时保持原状态
   * 替换时持有新旧所有名称的锁，进行中的索引完成后才会换出句柄
   */
  async loadConfigs(filePath: string): Promise<boolean> {
    let loaded: KnowledgeBaseConfig[];
    try {
      loaded = parseKnowledgeBaseRecords(parseJsonText(await fs.readFile(filePath, 'utf-8'), filePath), filePath);
    } catch (error) {
      console.error(`[KnowledgeBase] Failed to load configs: ${errorMessage(error)}`);
      return false;
    }

    const affected = [...this.names(), ...loaded.map(config => config.name)];
    return this.locks.runExclusiveAll(affected, async () => {
      for (const name of this.names()) {
        this.evict(name);
      }
      this.configs.clear();
      for (const config of loaded) {
        this.configs.set(config.name, config);
      }
      console.log(`[KnowledgeBase] Loaded ${loaded.length} configs from ${filePath}`);
      return true;
    });
  }

  private usableConfig(name: string): KnowledgeBaseConfig | null {
    const config = this.configs.get(name);
    if (!config) {
      console.error(`[KnowledgeBase] ${name} does not exist`);
      return null;
    }
    if (!config.enabled) {
      console.warn(`[KnowledgeBase] ${name} is disabled`);
      return null;
    }
    return config;
  }

  private buildIndex(config: KnowledgeBaseConfig): VectorIndex {
    return this.buildIndexAt(this.resolveIndexPath(config));
  }

  private buildIndexAt(indexPath: string): VectorIndex {
    const create = this.options.createIndex ?? (p => new LlamaVectorIndex(p));
    return create(indexPath);
  }

  private async discardStaging(staging: VectorIndex): Promise<void> {
    try {
      await staging.clear();
    } catch (error) {
      console.warn(`[KnowledgeBase] Could not remove staging index ${staging.indexPath}: ${errorMessage(error)}`);
    }
  }

  private ensureIndex(config: KnowledgeBaseConfig): VectorIndex {
    const cached = this.indexes.get(config.name);
    if (cached) return cached;
    const index = this.buildIndex(config);
    this.indexes.set(config.name, index);
    return index;
  }

  private ensureConnector(config: KnowledgeBaseConfig): Connector | null {
    const cached = this.connectors.get(config.name);
    if (cached) return cached;
    const create = this.options.createConnector ?? createConnector;
    const connector = create(config, this.options.connectorOptions ?? {});
    if (connector) {
      this.connectors.set(config.name, connector);
    }
    return connector;
  }

  private evict(name: string): void {
    this.indexes.delete(name);
    this.connectors.delete(name);
  }
}
