/**
 * RAG Agent 核心模块
 * 意图识别 -> （短路回答 | 跨知识库检索）-> 生成回答，支持流式输出
 */
import type { Generator } from '../llm/generator';
import { completeWithRetry, streamWithRetry } from '../llm/generator';
import { errorMessage } from '../llm/errors';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from '../llm/retry';
import type { KnowledgeBaseRegistry } from '../knowledge-base/registry';
import type { RetrievalResult } from '../knowledge-base/types';
import { CrossKnowledgeBaseOrchestrator } from '../retrieval/orchestrator';
import { formatResults } from '../retrieval/retriever';
import { IntentRecognizer } from '../context/intent/analyzer';
import { intentTypes, type IntentResult } from '../context/types';
import { ConversationLog, answerHistoryQuery } from './conversation';
import { HallucinationDetector, type HallucinationCheckResult } from './hallucination';
import { buildChitchatPrompt, buildNoDocumentPrompt, buildRagPrompt } from './prompts';
import { streamEvent, type StreamEvent } from './streaming';

export interface RagAgentOptions {
  topK: number;
  similarityThreshold: number;
  historyWindow: number;
  hallucinationCheck: boolean;
  retryPolicy: RetryPolicy;
}

const DEFAULT_OPTIONS: RagAgentOptions = {
  topK: 5,
  similarityThreshold: 0.3,
  historyWindow: 10,
  hallucinationCheck: false,
  retryPolicy: DEFAULT_RETRY_POLICY,
};

// 低于该置信度且不一致时，在回答后附加提示
const HALLUCINATION_WARNING_THRESHOLD = 0.5;
const HALLUCINATION_WARNING = '\n\n⚠️ 提示：该回答中的部分内容可能无法在知识库中找到依据，请谨慎参考。';

/**
 * Agent 查询结果
 */
export interface AgentAnswer {
  answer: string;
  intent: IntentResult;
  documents: RetrievalResult[];
  failed: boolean;
  hallucination?: HallucinationCheckResult;
}

/**
 * 本轮的处理计划
 */
type Plan =
  | { kind: 'direct'; text: string }
  | { kind: 'generate'; prompt: string; query: string; documents: RetrievalResult[] };

export class RagAgent {
  private readonly generator: Generator;
  private readonly orchestrator: CrossKnowledgeBaseOrchestrator;
  private readonly recognizer: IntentRecognizer;
  private readonly detector: HallucinationDetector;
  private readonly conversation: ConversationLog;
  private readonly options: RagAgentOptions;

  constructor(
    registry: KnowledgeBaseRegistry,
    generator: Generator,
    options: Partial<RagAgentOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.generator = generator;
    this.orchestrator = new CrossKnowledgeBaseOrchestrator(registry, {
      topK: this.options.topK,
      similarityThreshold: this.options.similarityThreshold,
    });
    this.recognizer = new IntentRecognizer(generator);
    this.detector = new HallucinationDetector(generator);
    this.conversation = new ConversationLog(this.options.historyWindow);
  }

  get history() {
    return this.conversation.list();
  }

  reset(): void {
    this.conversation.clear();
    console.log('[Agent] Conversation history cleared');
  }

  /**
   * 同步问答；生成失败时返回道歉文本而不是抛出
   */
  async query(question: string): Promise<AgentAnswer> {
    console.log(`[Agent] Query: "${question}"`);
    const intent = await this.recognizer.recognize(question, this.conversation.list());
    const plan = await this.plan(question, intent);

    if (plan.kind === 'direct') {
      this.remember(question, plan.text, intent);
      return { answer: plan.text, intent, documents: [], failed: false };
    }

    const generated = await completeWithRetry(this.generator, plan.prompt, 'Answer generation', this.options.retryPolicy);
    if (!generated.ok) {
      console.error(`[Agent] ❌ Generation failed: ${generated.error.message}`);
      return {
        answer: `抱歉，处理您的问题时出现错误: ${generated.error.message}`,
        intent,
        documents: plan.documents,
        failed: true,
      };
    }

    let answer = generated.value;
    let hallucination: HallucinationCheckResult | undefined;
    if (this.options.hallucinationCheck && plan.documents.length > 0) {
      hallucination = await this.detector.detect(answer, plan.documents, plan.query);
      if (!hallucination.isConsistent && hallucination.confidenceScore < HALLUCINATION_WARNING_THRESHOLD) {
        answer += HALLUCINATION_WARNING;
      }
    }

    this.remember(question, answer, intent);
    console.log(`[Agent] ✅ Answered (${answer.length} chars, ${plan.documents.length} documents)`);
    return { answer, intent, documents: plan.documents, failed: false, hallucination };
  }

  /**
   * 流式问答
   * 事件顺序：loading -> think... -> [reference_doc] -> text... -> done | error
   * 调用方停止迭代后不会再发起新的模型调用
   */
  async *queryStream(question: string): AsyncGenerator<StreamEvent, void, undefined> {
    const startTime = Date.now();
    yield streamEvent('loading', '正在处理您的问题...');

    try {
      yield streamEvent('think', '正在分析您的问题意图...');
      const intent = await this.recognizer.recognize(question, this.conversation.list());
      yield streamEvent('think', `识别到意图类型: ${intent.intentType}（${intentTypes[intent.intentType]}），置信度: ${intent.confidence}`, {
        metadata: { intent: intent.intentType, confidence: intent.confidence, rewrittenQuery: intent.rewrittenQuery },
      });

      const retrieves = intent.intentType === 'knowledge_query' || intent.intentType === 'tool_request';
      if (retrieves) {
        yield streamEvent('think', '正在检索相关文档...');
      }
      const plan = await this.plan(question, intent);

      if (plan.kind === 'direct') {
        yield streamEvent('text', plan.text);
        this.remember(question, plan.text, intent);
        yield streamEvent('done', '回答生成完成', { elapsedTime: (Date.now() - startTime) / 1000 });
        return;
      }

      if (plan.documents.length > 0) {
        yield streamEvent('reference_doc', `找到 ${plan.documents.length} 个相关文档`, { documents: plan.documents });
      }

      yield streamEvent('think', '正在生成回答...');
      let answer = '';
      for await (const chunk of streamWithRetry(this.generator, plan.prompt, 'Answer streaming', this.options.retryPolicy)) {
        answer += chunk;
        yield streamEvent('text', chunk);
      }

      if (this.options.hallucinationCheck && plan.documents.length > 0) {
        const check = await this.detector.detect(answer, plan.documents, plan.query);
        if (!check.isConsistent && check.confidenceScore < HALLUCINATION_WARNING_THRESHOLD) {
          answer += HALLUCINATION_WARNING;
          yield streamEvent('text', HALLUCINATION_WARNING);
        }
      }

      this.remember(question, answer, intent);
      yield streamEvent('done', '回答生成完成', { elapsedTime: (Date.now() - startTime) / 1000 });
    } catch (error) {
      console.error('[Agent] ❌ Stream failed:', error);
      yield streamEvent('error', `处理过程中出现错误: ${errorMessage(error)}`);
    }
  }

  private async plan(question: string, intent: IntentResult): Promise<Plan> {
    switch (intent.intentType) {
      case 'history_query':
        return { kind: 'direct', text: answerHistoryQuery(question, this.conversation.list()) };
      case 'ambiguous':
        return { kind: 'direct', text: intent.clarification ?? '能否把您的问题说得更具体一些？' };
      case 'chitchat':
        return { kind: 'generate', prompt: buildChitchatPrompt(question), query: question, documents: [] };
      case 'knowledge_query':
      case 'tool_request': {
        const query = intent.rewrittenQuery;
        const { results, hasRelevant } = await this.orchestrator.retrieveFromAll(query);
        if (!hasRelevant) {
          console.log('[Agent] No relevant documents, answering from general knowledge');
          return { kind: 'generate', prompt: buildNoDocumentPrompt(query), query, documents: [] };
        }
        return {
          kind: 'generate',
          prompt: buildRagPrompt(query, formatResults(results)),
          query,
          documents: results,
        };
      }
    }
  }

  private remember(query: string, response: string, intent: IntentResult): void {
    this.conversation.append({ query, response, intent: intent.intentType });
  }
}
