import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { parseCommand, runCommand, type CommandContext } from '../commands';
import { RagAgent } from '../../lib/agent/agent';
import { KnowledgeBaseRegistry } from '../../lib/knowledge-base/registry';
import { InMemoryVectorIndex, MemoryConnector, ScriptedGenerator } from '../../test/fakes';

describe('parseCommand', () => {
  it('recognises management commands case-insensitively', () => {
    expect(parseCommand('  EXIT ')).toEqual({ kind: 'quit' });
    expect(parseCommand('reindex')).toEqual({ kind: 'reindex' });
    expect(parseCommand('Status')).toEqual({ kind: 'status' });
    expect(parseCommand('clear')).toEqual({ kind: 'clear' });
    expect(parseCommand('kb list')).toEqual({ kind: 'kb-list' });
    expect(parseCommand('kb disable kb_work')).toEqual({ kind: 'kb-enable', name: 'kb_work', enabled: false });
    expect(parseCommand('kb save ./out.json')).toEqual({ kind: 'kb-save', path: './out.json' });
    expect(parseCommand('kb save')).toEqual({ kind: 'kb-save', path: undefined });
  });

  it('explains how to use incomplete kb commands', () => {
    expect(parseCommand('kb enable')).toEqual({ kind: 'usage', message: '用法: kb enable <名称>' });
    expect(parseCommand('kb')).toEqual({
      kind: 'usage',
      message: '用法: kb list | kb enable <名称> | kb disable <名称> | kb save [路径]',
    });
  });

  it('treats everything else as a question', () => {
    expect(parseCommand('clear up the confusion about RAG')).toEqual({
      kind: 'query',
      question: 'clear up the confusion about RAG',
    });
    expect(parseCommand('什么是RAG？')).toEqual({ kind: 'query', question: '什么是RAG？' });
    expect(parseCommand('   ')).toEqual({ kind: 'empty' });
  });
});

describe('runCommand', () => {
  let dir: string;
  let lines: string[];
  let ctx: CommandContext;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-'));
    lines = [];
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const registry = new KnowledgeBaseRegistry(
      {
        indexRoot: dir,
        chunker: text => [text],
        createIndex: indexPath => new InMemoryVectorIndex(indexPath),
        createConnector: () => new MemoryConnector({ 'note.md': '笔记内容' }),
      },
      [
        { name: 'kb_work', type: 'folder', sourcePath: dir, description: '工作笔记', enabled: true },
        { name: 'kb_life', type: 'folder', sourcePath: dir, description: '生活笔记', enabled: false },
      ],
    );
    ctx = {
      agent: new RagAgent(registry, new ScriptedGenerator('你好！')),
      registry,
      knowledgeBasesFile: path.join(dir, 'knowledge_bases.json'),
      print: line => lines.push(line),
    };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it('stops the loop on quit', async () => {
    expect(await runCommand({ kind: 'quit' }, ctx)).toBe(false);
    expect(lines).toEqual(['再见！']);
  });

  it('reindexes every knowledge base and reports status', async () => {
    await runCommand({ kind: 'reindex' }, ctx);
    expect(lines).toEqual(['正在重新索引笔记...', '  - kb_work: 成功', '  - kb_life: 成功', '索引完成！']);

    lines.length = 0;
    await runCommand({ kind: 'status' }, ctx);
    expect(lines).toEqual([
      '向量库状态:',
      '  - kb_work (启用): 1 个文档块，最近索引: 2026-01-01T00:00:00.000Z',
      '  - kb_life (禁用): 0 个文档块，最近索引: 从未',
    ]);
  });

  it('enables a knowledge base by name', async () => {
    await runCommand({ kind: 'kb-enable', name: 'kb_life', enabled: true }, ctx);
    await runCommand({ kind: 'kb-enable', name: 'kb_none', enabled: true }, ctx);

    expect(ctx.registry.enabledNames()).toEqual(['kb_work', 'kb_life']);
    expect(lines).toEqual(['知识库 kb_life 已启用。', '未找到知识库: kb_none']);
  });

  it('saves the configs to the default file', async () => {
    await runCommand({ kind: 'kb-save' }, ctx);

    const saved: unknown = await fs.readJson(ctx.knowledgeBasesFile);
    expect(Array.isArray(saved) && saved.length).toBe(2);
    expect(lines).toEqual([`知识库配置已保存到 ${ctx.knowledgeBasesFile}`]);
  });

  it('clears the conversation', async () => {
    await ctx.agent.query('你好');

    await runCommand({ kind: 'clear' }, ctx);

    expect(ctx.agent.history).toEqual([]);
    expect(lines).toEqual(['对话历史已清空。']);
  });
});
