/**
 * 交互式命令行
 * npm start 启动；管理指令见 commands.ts，其余输入按流式问答处理
 */
import 'dotenv/config';
import { createInterface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import { configureLLM, getDefaultConfig } from '../lib/llm/config';
import { LlamaGenerator } from '../lib/llm/generator';
import { errorMessage } from '../lib/llm/errors';
import { createRegistry } from '../lib/knowledge-base/discovery';
import type { KnowledgeBaseRegistry } from '../lib/knowledge-base/registry';
import { RagAgent } from '../lib/agent/agent';
import { parseCommand, runCommand } from './commands';

const print = (line: string) => stdout.write(`${line}\n`);

/**
 * 所有启用的知识库都还没有索引时自动索引一次
 */
async function indexIfEmpty(registry: KnowledgeBaseRegistry): Promise<void> {
  const enabled = (await registry.list()).filter(info => info.enabled);
  if (enabled.length === 0 || enabled.some(info => info.indexedDocumentCount > 0)) {
    return;
  }
  print('向量库为空，开始索引笔记...');
  const results = await registry.indexAll();
  for (const [name, success] of Object.entries(results)) {
    print(`  - ${name}: ${success ? '成功' : '失败'}`);
  }
}

async function answer(agent: RagAgent, question: string): Promise<void> {
  stdout.write('\n回答: ');
  for await (const event of agent.queryStream(question)) {
    switch (event.event) {
      case 'text':
        stdout.write(event.content);
        break;
      case 'reference_doc':
        print(`[${event.content}]`);
        break;
      case 'done':
        print(`\n(${event.elapsedTime?.toFixed(1) ?? '?'}s)`);
        break;
      case 'error':
        print(`\n${event.content}`);
        break;
      default:
        break;
    }
  }
}

async function main(): Promise<void> {
  const config = getDefaultConfig();
  configureLLM(config);

  const registry = await createRegistry(config);
  const agent = new RagAgent(registry, new LlamaGenerator(), {
    topK: config.topK,
    similarityThreshold: config.similarityThreshold,
    historyWindow: config.historyWindow,
    hallucinationCheck: config.hallucinationCheck,
  });

  await indexIfEmpty(registry);

  print("RAG 智能体已启动！输入 'quit' 或 'exit' 退出，输入 'reindex' 重新索引笔记。");
  print("输入 'status' 查看向量库状态，'clear' 清空对话历史，'kb list' 查看知识库。");

  const rl = createInterface({ input: stdin, output: stdout });
  const closed = new AbortController();
  rl.on('SIGINT', () => rl.close());
  rl.on('close', () => closed.abort());

  try {
    for (;;) {
      let line: string;
      try {
        line = await rl.question('\n您的问题: ', { signal: closed.signal });
      } catch {
        // 输入流关闭（Ctrl+C / Ctrl+D）
        print('\n再见！');
        break;
      }

      const command = parseCommand(line);
      if (command.kind === 'query') {
        await answer(agent, command.question);
        continue;
      }
      try {
        if (!(await runCommand(command, { agent, registry, knowledgeBasesFile: config.knowledgeBasesFile, print }))) {
          break;
        }
      } catch (error) {
        print(`出现错误: ${errorMessage(error)}`);
      }
    }
  } finally {
    rl.close();
  }
}

main().catch(error => {
  console.error('[CLI] ❌ Fatal error:', error);
  process.exitCode = 1;
});
