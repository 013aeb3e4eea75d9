/**
 * 命令行指令
 * 解析一行输入并执行管理指令；不是指令的输入交给问答
 */
import type { RagAgent } from '../lib/agent/agent';
import type { KnowledgeBaseRegistry } from '../lib/knowledge-base/registry';

export type Command =
  | { kind: 'quit' }
  | { kind: 'reindex' }
  | { kind: 'status' }
  | { kind: 'clear' }
  | { kind: 'kb-list' }
  | { kind: 'kb-enable'; name: string; enabled: boolean }
  | { kind: 'kb-save'; path?: string }
  | { kind: 'usage'; message: string }
  | { kind: 'query'; question: string }
  | { kind: 'empty' };

export function parseCommand(line: string): Command {
  const input = line.trim();
  if (!input) return { kind: 'empty' };

  const [head, ...rest] = input.split(/\s+/);
  switch (head.toLowerCase()) {
    case 'quit':
    case 'exit':
      if (rest.length === 0) return { kind: 'quit' };
      break;
    case 'reindex':
      if (rest.length === 0) return { kind: 'reindex' };
      break;
    case 'status':
      if (rest.length === 0) return { kind: 'status' };
      break;
    case 'clear':
      if (rest.length === 0) return { kind: 'clear' };
      break;
    case 'kb':
      return parseKnowledgeBaseCommand(rest);
  }
  return { kind: 'query', question: input };
}

function parseKnowledgeBaseCommand(args: string[]): Command {
  const [action, name] = args;
  switch (action?.toLowerCase()) {
    case 'list':
      return { kind: 'kb-list' };
    case 'enable':
    case 'disable':
      if (!name) return { kind: 'usage', message: `用法: kb ${action.toLowerCase()} <名称>` };
      return { kind: 'kb-enable', name, enabled: action.toLowerCase() === 'enable' };
    case 'save':
      return { kind: 'kb-save', path: name };
    default:
      return { kind: 'usage', message: '用法: kb list | kb enable <名称> | kb disable <名称> | kb save [路径]' };
  }
}

export interface CommandContext {
  agent: RagAgent;
  registry: KnowledgeBaseRegistry;
  knowledgeBasesFile: string;
  print: (line: string) => void;
}

/**
 * 执行管理指令，返回 false 表示退出
 * query / empty 不在这里处理
 */
export async function runCommand(command: Command, ctx: CommandContext): Promise<boolean> {
  const { print, registry } = ctx;

  switch (command.kind) {
    case 'quit':
      print('再见！');
      return false;

    case 'reindex': {
      print('正在重新索引笔记...');
      const results = await registry.indexAll();
      for (const [name, success] of Object.entries(results)) {
        print(`  - ${name}: ${success ? '成功' : '失败'}`);
      }
      print('索引完成！');
      return true;
    }

    case 'status': {
      const infos = await registry.list();
      if (infos.length === 0) {
        print('没有配置任何知识库。');
        return true;
      }
      print('向量库状态:');
      for (const info of infos) {
        const state = info.enabled ? '启用' : '禁用';
        print(`  - ${info.name} (${state}): ${info.indexedDocumentCount} 个文档块，最近索引: ${info.lastIndexed ?? '从未'}`);
      }
      return true;
    }

    case 'clear':
      ctx.agent.reset();
      print('对话历史已清空。');
      return true;

    case 'kb-list': {
      const infos = await registry.list();
      for (const info of infos) {
        const state = info.enabled ? '启用' : '禁用';
        print(`  - ${info.name} [${info.type}] (${state}): ${info.description}`);
        print(`    路径: ${info.sourcePath}`);
      }
      return true;
    }

    case 'kb-enable': {
      const changed = await registry.setEnabled(command.name, command.enabled);
      print(changed
        ? `知识库 ${command.name} 已${command.enabled ? '启用' : '禁用'}。`
        : `未找到知识库: ${command.name}`);
      return true;
    }

    case 'kb-save': {
      const target = command.path ?? ctx.knowledgeBasesFile;
      const saved = await registry.saveConfigs(target);
      print(saved ? `知识库配置已保存到 ${target}` : `保存失败: ${target}`);
      return true;
    }

    case 'usage':
      print(command.message);
      return true;

    case 'query':
    case 'empty':
      return true;
  }
}
