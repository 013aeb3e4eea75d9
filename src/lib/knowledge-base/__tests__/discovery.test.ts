import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import {
  createRegistry,
  defaultKnowledgeBase,
  discoverFromDirectory,
  discoverKnowledgeBases,
  knowledgeBaseNameForDirectory,
  loadConfigFile,
  parseExplicitConfigs,
} from '../discovery';
import { parseKnowledgeBaseRecords } from '../types';
import { ConfigurationError } from '../../llm/errors';

type DiscoveryOptions = Parameters<typeof discoverKnowledgeBases>[0];

describe('knowledge base discovery', () => {
  let dir: string;

  function discoveryConfig(overrides: Partial<DiscoveryOptions> = {}): DiscoveryOptions {
    return {
      vaultPath: path.join(dir, 'vault'),
      knowledgeBaseRoot: path.join(dir, 'root'),
      vectorStorePath: path.join(dir, 'vectors'),
      knowledgeBasesConfig: '',
      knowledgeBasesFile: path.join(dir, 'knowledge_bases.json'),
      ...overrides,
    };
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'discovery-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  describe('knowledgeBaseNameForDirectory', () => {
    it('lower-cases and replaces spaces and dashes', () => {
      expect(knowledgeBaseNameForDirectory('Work Notes')).toBe('kb_work_notes');
      expect(knowledgeBaseNameForDirectory('daily-log 2026')).toBe('kb_daily_log_2026');
    });
  });

  describe('parseExplicitConfigs', () => {
    it('returns nothing for an empty value', () => {
      expect(parseExplicitConfigs('   ')).toEqual([]);
    });

    it('converts records into configs', () => {
      const configs = parseExplicitConfigs(JSON.stringify([
        { name: 'kb_env', type: 'folder', path: '/data/env', vector_store_path: '/data/vectors/env' },
      ]));

      expect(configs).toEqual([{
        name: 'kb_env',
        type: 'folder',
        sourcePath: '/data/env',
        description: '',
        enabled: true,
        indexPath: '/data/vectors/env',
      }]);
    });

    it('logs and ignores text that is not JSON', () => {
      expect(parseExplicitConfigs('not json')).toEqual([]);
      expect(console.error).toHaveBeenCalledWith(
        expect.stringContaining('[KnowledgeBase] KNOWLEDGE_BASES_CONFIG is not valid JSON'),
      );
    });

    it('logs and ignores records without a path', () => {
      expect(parseExplicitConfigs('[{"name": "kb_x"}]')).toEqual([]);
      expect(console.error).toHaveBeenCalledWith(
        expect.stringContaining('[KnowledgeBase] Invalid knowledge base config in KNOWLEDGE_BASES_CONFIG'),
      );
    });
  });

  describe('parseKnowledgeBaseRecords', () => {
    it('raises a configuration error for invalid records', () => {
      expect(() => parseKnowledgeBaseRecords({ name: 'kb_x' }, 'inline')).toThrow(ConfigurationError);
    });
  });

  describe('loadConfigFile', () => {
    it('returns nothing for a missing or malformed file', async () => {
      const broken = path.join(dir, 'broken.json');
      await fs.writeFile(broken, '{ nope');

      expect(await loadConfigFile(path.join(dir, 'missing.json'))).toEqual([]);
      expect(await loadConfigFile(broken)).toEqual([]);
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining(`[KnowledgeBase] ${broken} is not valid JSON`));
    });
  });

  describe('discoverFromDirectory', () => {
    it('creates one knowledge base per visible subdirectory', async () => {
      const root = path.join(dir, 'root');
      await fs.ensureDir(path.join(root, 'Work Notes'));
      await fs.ensureDir(path.join(root, 'daily-log'));
      await fs.ensureDir(path.join(root, '.obsidian'));
      await fs.outputFile(path.join(root, 'readme.md'), 'not a knowledge base');

      const configs = await discoverFromDirectory(root, path.join(dir, 'vectors'));

      expect(configs).toEqual([
        {
          name: 'kb_daily_log',
          type: 'obsidian',
          sourcePath: path.join(root, 'daily-log'),
          description: 'daily-log 知识库',
          enabled: true,
          indexPath: path.join(dir, 'vectors', 'kb_daily_log'),
        },
        {
          name: 'kb_work_notes',
          type: 'obsidian',
          sourcePath: path.join(root, 'Work Notes'),
          description: 'Work Notes 知识库',
          enabled: true,
          indexPath: path.join(dir, 'vectors', 'kb_work_notes'),
        },
      ]);
    });

    it('returns nothing when the root does not exist', async () => {
      expect(await discoverFromDirectory(path.join(dir, 'missing'), dir)).toEqual([]);
    });
  });

  describe('discoverKnowledgeBases', () => {
    beforeEach(async () => {
      await fs.ensureDir(path.join(dir, 'root', 'projects'));
      await fs.writeJson(path.join(dir, 'knowledge_bases.json'), [{ name: 'kb_file', path: '/data/file' }]);
    });

    it('prefers configs from the environment', async () => {
      const configs = await discoverKnowledgeBases(discoveryConfig({
        knowledgeBasesConfig: JSON.stringify([{ name: 'kb_env', path: '/data/env' }]),
      }));

      expect(configs.map(config => config.name)).toEqual(['kb_env']);
    });

    it('falls back to the config file when the environment value is malformed', async () => {
      const configs = await discoverKnowledgeBases(discoveryConfig({ knowledgeBasesConfig: '[{"name":' }));

      expect(configs.map(config => config.name)).toEqual(['kb_file']);
    });

    it('falls back to subdirectories when there is no config file', async () => {
      const configs = await discoverKnowledgeBases(discoveryConfig({
        knowledgeBasesFile: path.join(dir, 'missing.json'),
      }));

      expect(configs.map(config => config.name)).toEqual(['kb_projects']);
    });

    it('falls back to subdirectories when the config file is invalid', async () => {
      await fs.writeJson(path.join(dir, 'knowledge_bases.json'), [{ name: 'kb_file' }]);

      const configs = await discoverKnowledgeBases(discoveryConfig());

      expect(configs.map(config => config.name)).toEqual(['kb_projects']);
    });

    it('uses the default vault when nothing else is found', async () => {
      const options = discoveryConfig({
        knowledgeBaseRoot: path.join(dir, 'empty'),
        knowledgeBasesFile: path.join(dir, 'missing.json'),
      });

      const configs = await discoverKnowledgeBases(options);

      expect(configs).toEqual([defaultKnowledgeBase(options)]);
      expect(configs[0].sourcePath).toBe(path.join(dir, 'vault'));
      expect(configs[0].indexPath).toBe(path.join(dir, 'vectors', 'default'));
    });
  });

  describe('createRegistry', () => {
    it('registers the discovered knowledge bases', async () => {
      const registry = await createRegistry({
        ...discoveryConfig({ knowledgeBasesFile: path.join(dir, 'missing.json') }),
        chunkSize: 200,
        chunkOverlap: 20,
        obsidianApiUrl: '',
        obsidianApiKey: '',
      });

      expect(registry.names()).toEqual(['default']);
      expect((await registry.getVectorStore('default'))?.indexPath).toBe(path.join(dir, 'vectors', 'default'));
    });
  });
});
