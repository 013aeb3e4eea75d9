/**
 * 知识库发现
 * 依次回退：环境变量配置 -> 配置文件 -> 根目录下的子目录 -> 单个默认知识库
 */
import fs from 'fs-extra';
import * as path from 'path';
import type { AgentConfig } from '../llm/config';
import { errorMessage } from '../llm/errors';
import { createSentenceChunker } from './chunker';
import { KnowledgeBaseRegistry, type RegistryOptions } from './registry';
import { parseJsonText, parseKnowledgeBaseRecords, type KnowledgeBaseConfig } from './types';

type DiscoveryConfig = Pick<
  AgentConfig,
  'vaultPath' | 'knowledgeBaseRoot' | 'vectorStorePath' | 'knowledgeBasesConfig' | 'knowledgeBasesFile'
>;

/**
 * 目录名 -> 知识库名
 */
export function knowledgeBaseNameForDirectory(dirName: string): string {
  return `kb_${dirName.toLowerCase().replace(/ /g, '_').replace(/-/g, '_')}`;
}

/**
 * 解析 KNOWLEDGE_BASES_CONFIG（JSON 数组）；格式错误返回 []
 */
export function parseExplicitConfigs(raw: string): KnowledgeBaseConfig[] {
  if (!raw.trim()) {
    return [];
  }
  try {
    return parseKnowledgeBaseRecords(parseJsonText(raw, 'KNOWLEDGE_BASES_CONFIG'), 'KNOWLEDGE_BASES_CONFIG');
  } catch (error) {
    console.error(`[KnowledgeBase] ${errorMessage(error)}`);
    return [];
  }
}

/**
 * 读取知识库配置文件；不存在或格式错误返回 []
 */
export async function loadConfigFile(filePath: string): Promise<KnowledgeBaseConfig[]> {
  if (!filePath || !(await fs.pathExists(filePath))) {
    return [];
  }
  try {
    const raw = await fs.readFile(filePath, 'utf-8');
    return parseKnowledgeBaseRecords(parseJsonText(raw, filePath), filePath);
  } catch (error) {
    console.error(`[KnowledgeBase] ${errorMessage(error)}`);
    return [];
  }
}

/**
 * 每个直接子目录一个知识库（跳过 .obsidian 等隐藏目录）
 */
export async function discoverFromDirectory(root: string, vectorStorePath: string): Promise<KnowledgeBaseConfig[]> {
  if (!(await fs.pathExists(root))) {
    return [];
  }

  const entries = await fs.readdir(root, { withFileTypes: true });
  const discovered = new Map<string, KnowledgeBaseConfig>();
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    if (!entry.isDirectory() || entry.name.startsWith('.')) continue;

    const name = knowledgeBaseNameForDirectory(entry.name);
    if (discovered.has(name)) continue;
    discovered.set(name, {
      name,
      type: 'obsidian',
      sourcePath: path.join(root, entry.name),
      description: `${entry.name} 知识库`,
      enabled: true,
      indexPath: path.join(vectorStorePath, name),
    });
    console.log(`[KnowledgeBase] Discovered ${name} at ${path.join(root, entry.name)}`);
  }
  return [...discovered.values()];
}

/**
 * 单个默认知识库，索引放在 <vectorStorePath>/default，与其他知识库并列
 */
export function defaultKnowledgeBase(config: DiscoveryConfig): KnowledgeBaseConfig {
  return {
    name: 'default',
    type: 'obsidian',
    sourcePath: config.vaultPath,
    description: '默认 Obsidian 知识库',
    enabled: true,
    indexPath: path.join(config.vectorStorePath, 'default'),
  };
}

export async function discoverKnowledgeBases(config: DiscoveryConfig): Promise<KnowledgeBaseConfig[]> {
  const explicit = parseExplicitConfigs(config.knowledgeBasesConfig);
  if (explicit.length > 0) {
    return explicit;
  }

  const fromFile = await loadConfigFile(config.knowledgeBasesFile);
  if (fromFile.length > 0) {
    return fromFile;
  }

  const discovered = await discoverFromDirectory(config.knowledgeBaseRoot, config.vectorStorePath);
  if (discovered.length > 0) {
    return discovered;
  }

  console.log('[KnowledgeBase] No knowledge bases found, using default vault');
  return [defaultKnowledgeBase(config)];
}

/**
 * 根据配置创建注册表
 */
export async function createRegistry(
  config: DiscoveryConfig & Pick<AgentConfig, 'chunkSize' | 'chunkOverlap' | 'obsidianApiUrl' | 'obsidianApiKey'>,
  overrides: Partial<RegistryOptions> = {},
): Promise<KnowledgeBaseRegistry> {
  const initial = await discoverKnowledgeBases(config);
  return new KnowledgeBaseRegistry(
    {
      indexRoot: config.vectorStorePath,
      chunker: createSentenceChunker(config.chunkSize, config.chunkOverlap),
      connectorOptions: { apiUrl: config.obsidianApiUrl, apiKey: config.obsidianApiKey },
      ...overrides,
    },
    initial,
  );
}
