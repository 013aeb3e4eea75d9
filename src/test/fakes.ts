/**
 * 测试替身：内存向量索引、脚本化生成器、内存连接器
 */
import type { Generator } from '../lib/llm/generator';
import type { IndexStats, VectorIndex } from '../lib/llm/index-manager';
import type { Connector, NoteRef } from '../lib/knowledge-base/connectors';
import type { ChunkMetadata, DocumentChunk, RetrievalResult } from '../lib/knowledge-base/types';

export type Scorer = (query: string, chunk: DocumentChunk) => number;

export function chunk(id: string, content: string, metadata: Partial<ChunkMetadata> = {}): DocumentChunk {
  return {
    id,
    content,
    metadata: {
      title: id,
      source_path: `${id}.md`,
      knowledge_base: 'kb_test',
      chunk_index: 0,
      source_type: 'obsidian',
      ...metadata,
    },
  };
}

export function result(similarity: number, id = `doc_${similarity}`, metadata: Partial<ChunkMetadata> = {}): RetrievalResult {
  return { ...chunk(id, `content of ${id}`, metadata), similarity, distance: 1 - similarity };
}

export class InMemoryVectorIndex implements VectorIndex {
  readonly indexPath: string;
  chunks: DocumentChunk[] = [];
  clearCount = 0;
  searchCount = 0;
  searchError: Error | null = null;
  addError: Error | null = null;
  private lastIndexed: string | null = null;
  private readonly scorer: Scorer;

  constructor(indexPath = 'memory://index', scorer: Scorer = () => 0) {
    this.indexPath = indexPath;
    this.scorer = scorer;
  }

  /**
   * 按给定相似度预置分块（chunk_0, chunk_1, ...）
   */
  static withSimilarities(similarities: number[], knowledgeBase = 'kb_test'): InMemoryVectorIndex {
    const byId = new Map<string, number>();
    const index = new InMemoryVectorIndex(`memory://${knowledgeBase}`, (_query, c) => byId.get(c.id) ?? 0);
    similarities.forEach((similarity, i) => {
      const id = `${knowledgeBase}_chunk_${i}`;
      byId.set(id, similarity);
      index.chunks.push(chunk(id, `${knowledgeBase} passage ${i}`, { knowledge_base: knowledgeBase, chunk_index: i }));
    });
    return index;
  }

  async addDocuments(chunks: DocumentChunk[]): Promise<void> {
    if (this.addError) throw this.addError;
    this.chunks.push(...chunks);
    this.lastIndexed = '2026-01-01T00:00:00.000Z';
  }

  async search(query: string, k: number): Promise<RetrievalResult[]> {
    this.searchCount++;
    if (this.searchError) throw this.searchError;
    return this.chunks
      .map(c => {
        const similarity = this.scorer(query, c);
        return { ...c, similarity, distance: 1 - similarity };
      })
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, k);
  }

  async stats(): Promise<IndexStats> {
    return { documentCount: this.chunks.length, lastIndexed: this.lastIndexed };
  }

  async clear(): Promise<void> {
    this.chunks = [];
    this.lastIndexed = null;
    this.clearCount++;
  }

  async replaceWith(staged: VectorIndex): Promise<void> {
    if (!(staged instanceof InMemoryVectorIndex)) {
      throw new Error('InMemoryVectorIndex can only be replaced by another InMemoryVectorIndex');
    }
    this.chunks = [...staged.chunks];
    this.lastIndexed = staged.lastIndexed;
    staged.chunks = [];
    staged.lastIndexed = null;
  }
}

export type Reply = string | Error;

/**
 * 按提示词脚本化回复的生成器，记录收到的每个提示词
 */
export class ScriptedGenerator implements Generator {
  readonly prompts: string[] = [];
  private readonly reply: (prompt: string) => Reply;

  constructor(reply: Reply | ((prompt: string) => Reply)) {
    if (typeof reply === 'function') {
      this.reply = reply;
    } else {
      const fixed: Reply = reply;
      this.reply = () => fixed;
    }
  }

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.reply(prompt);
    if (reply instanceof Error) throw reply;
    return reply;
  }

  async *stream(prompt: string): AsyncIterable<string> {
    this.prompts.push(prompt);
    const reply = this.reply(prompt);
    if (reply instanceof Error) throw reply;
    for (const piece of reply.match(/[\s\S]{1,4}/g) ?? []) {
      yield piece;
    }
  }
}

/**
 * 内存连接器：id -> 内容，Error 表示读取失败
 */
export class MemoryConnector implements Connector {
  readonly type = 'folder' as const;
  listError: Error | null = null;
  private readonly notes: Map<string, string | Error>;

  constructor(notes: Record<string, string | Error>) {
    this.notes = new Map(Object.entries(notes));
  }

  async listDocuments(): Promise<NoteRef[]> {
    if (this.listError) throw this.listError;
    return [...this.notes.keys()].map(id => ({ id, title: id.replace(/\.md$/, ''), path: id }));
  }

  async getContent(ref: NoteRef): Promise<string> {
    const content = this.notes.get(ref.id);
    if (content === undefined) throw new Error(`Note not found: ${ref.id}`);
    if (content instanceof Error) throw content;
    return content;
  }
}

/**
 * 每次检索都返回同一组结果的索引
 */
export function fixedIndex(results: RetrievalResult[], indexPath = 'memory://fixed'): VectorIndex {
  return {
    indexPath,
    addDocuments: async () => undefined,
    search: async (_query, k) => results.slice(0, k),
    stats: async () => ({ documentCount: results.length, lastIndexed: null }),
    clear: async () => undefined,
    replaceWith: async () => undefined,
  };
}
