/**
 * 文档源连接器
 * 每种知识库类型对应一个连接器实现，通过分派表创建；未知类型返回 null
 */
import fs from 'fs-extra';
import * as path from 'path';
import { glob } from 'glob';
import { z } from 'zod';
import { extractTextFromMarkdown } from './markdown';
import type { ConnectorType, KnowledgeBaseConfig } from './types';

/**
 * 笔记引用
 */
export interface NoteRef {
  id: string;            // 相对于源目录的路径
  title: string;
  path: string;
  modifiedTime?: number;
}

export interface Connector {
  readonly type: ConnectorType;
  listDocuments(): Promise<NoteRef[]>;
  /** 返回纯文本内容 */
  getContent(ref: NoteRef): Promise<string>;
}

export interface ConnectorOptions {
  apiUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
}

const ApiNoteListSchema = z.array(z.object({
  id: z.string(),
  title: z.string().optional(),
  path: z.string().optional(),
  modified_time: z.number().optional(),
}));

const ApiNoteSchema = z.object({
  content: z.string().default(''),
});

async function listFiles(root: string, pattern: string): Promise<NoteRef[]> {
  const files = await glob(pattern, { cwd: root, nodir: true, posix: true });
  files.sort();

  const notes: NoteRef[] = [];
  for (const relativePath of files) {
    const fullPath = path.join(root, relativePath);
    const stat = await fs.stat(fullPath);
    notes.push({
      id: relativePath,
      title: path.basename(relativePath, path.extname(relativePath)),
      path: fullPath,
      modifiedTime: stat.mtimeMs,
    });
  }
  return notes;
}

/**
 * Obsidian 知识库连接器
 * 优先读取本地 vault，vault 不存在时使用笔记 HTTP API
 */
export class ObsidianConnector implements Connector {
  readonly type = 'obsidian' as const;
  private vaultPath: string;
  private apiUrl: string;
  private headers: Record<string, string>;
  private timeout: number;

  constructor(vaultPath: string, options: ConnectorOptions = {}) {
    this.vaultPath = vaultPath;
    this.apiUrl = (options.apiUrl ?? '').replace(/\/+$/, '');
    this.headers = {
      'Content-Type': 'application/json',
      ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
    };
    this.timeout = options.timeoutMs ?? 30000;
  }

  async listDocuments(): Promise<NoteRef[]> {
    if (this.vaultPath && (await fs.pathExists(this.vaultPath))) {
      return listFiles(this.vaultPath, '**/*.md');
    }
    if (!this.apiUrl) {
      return [];
    }

    // 列表失败直接抛出，由调用方保留原有索引
    const notes = ApiNoteListSchema.parse(await this.request(`${this.apiUrl}/files`));
    return notes.map(note => ({
      id: note.id,
      title: note.title ?? path.basename(note.id, path.extname(note.id)),
      path: note.path ?? note.id,
      modifiedTime: note.modified_time,
    }));
  }

  async getContent(ref: NoteRef): Promise<string> {
    const filePath = path.join(this.vaultPath, ref.id);
    if (this.vaultPath && (await fs.pathExists(filePath))) {
      const content = await fs.readFile(filePath, 'utf-8');
      return extractTextFromMarkdown(content);
    }
    if (!this.apiUrl) {
      throw new Error(`Note not found: ${ref.id}`);
    }

    const url = `${this.apiUrl}/file?path=${encodeURIComponent(ref.id)}`;
    const note = ApiNoteSchema.parse(await this.request(url));
    return extractTextFromMarkdown(note.content);
  }

  private async request(url: string): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    try {
      const response = await fetch(url, { headers: this.headers, signal: controller.signal });
      if (!response.ok) {
        throw new Error(`Request failed: ${response.status} ${response.statusText}`);
      }
      return await response.json();
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * 普通文件夹连接器（markdown / 纯文本）
 */
export class FolderConnector implements Connector {
  readonly type = 'folder' as const;
  private root: string;

  constructor(root: string) {
    this.root = root;
  }

  async listDocuments(): Promise<NoteRef[]> {
    if (!(await fs.pathExists(this.root))) {
      return [];
    }
    return listFiles(this.root, '**/*.{md,markdown,txt}');
  }

  async getContent(ref: NoteRef): Promise<string> {
    const content = await fs.readFile(path.join(this.root, ref.id), 'utf-8');
    if (path.extname(ref.id).toLowerCase() === '.txt') {
      return content
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0)
        .join('\n');
    }
    return extractTextFromMarkdown(content);
  }
}

type ConnectorFactory = (config: KnowledgeBaseConfig, options: ConnectorOptions) => Connector;

const CONNECTOR_FACTORIES: Record<ConnectorType, ConnectorFactory> = {
  obsidian: (config, options) => new ObsidianConnector(config.sourcePath, options),
  folder: config => new FolderConnector(config.sourcePath),
};

export function isConnectorType(type: string): type is ConnectorType {
  return Object.prototype.hasOwnProperty.call(CONNECTOR_FACTORIES, type);
}

/**
 * 按知识库类型创建连接器；不支持的类型返回 null
 */
export function createConnector(config: KnowledgeBaseConfig, options: ConnectorOptions = {}): Connector | null {
  if (!isConnectorType(config.type)) {
    console.warn(`[KnowledgeBase] Unsupported connector type "${config.type}" for ${config.name}`);
    return null;
  }
  return CONNECTOR_FACTORIES[config.type](config, options);
}
