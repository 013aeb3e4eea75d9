/**
 * 意图识别模块
 * 决定本轮是直接回答、查询对话历史、请求澄清，还是进入检索
 *
 * 流程：历史查询词表 -> 快速关键词 -> 模型分类 -> 条件改写 -> 槽位提取 -> 澄清判断
 * 每个依赖模型的步骤失败时都回退到规则，不会向调用方抛出异常
 */
import { z } from 'zod';
import type { Generator } from '../../llm/generator';
import { errorMessage } from '../../llm/errors';
import { rewriteWithHistory } from '../rag/query-rewriter';
import type { HistoryEntry, IntentResult, IntentType, QuerySlots } from '../types';
import { LEXICON, findKeyword } from './lexicon';
import { buildClassificationPrompt, buildSlotPrompt } from './prompts';
import { extractSlotsByRules } from './slots';

/**
 * 各阶段的固定置信度与澄清阈值
 */
export const INTENT_CONFIDENCE = {
  history: 1.0,
  quick: {
    knowledge_query: 0.85,
    tool_request: 0.8,
    chitchat: 0.9,
  },
  modelSubstring: 0.6,
  fallback: 0.5,
  clarifyKnowledgeQuery: 0.3,
  clarifyOther: 0.4,
} as const;

// 快速匹配的优先顺序
const QUICK_ORDER = ['knowledge_query', 'tool_request', 'chitchat'] as const;

type ModelIntent = Exclude<IntentType, 'history_query'>;

const MODEL_INTENTS: readonly ModelIntent[] = ['knowledge_query', 'tool_request', 'chitchat', 'ambiguous'];

const ClassificationSchema = z.object({
  intent: z.enum(['chitchat', 'knowledge_query', 'tool_request', 'ambiguous']),
  confidence: z.coerce.number().catch(INTENT_CONFIDENCE.fallback),
  reason: z.string().optional(),
});

const SlotSchema = z.object({
  entity: z.string().catch(''),
  aspect: z.string().catch(''),
});

interface Classification {
  intent: ModelIntent;
  confidence: number;
  reason?: string;
}

function clamp(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function extractJson(text: string): unknown {
  const match = text.match(/\{[\s\S]*\}/);
  if (!match) return null;
  try {
    return JSON.parse(match[0]);
  } catch {
    return null;
  }
}

/**
 * 是否在询问对话历史
 */
export function isHistoryQuery(query: string): boolean {
  return findKeyword(query, LEXICON.history) !== null;
}

/**
 * 快速关键词分类（命中则跳过模型）
 */
export function classifyByKeywords(query: string): { intent: ModelIntent; confidence: number } | null {
  for (const intent of QUICK_ORDER) {
    if (findKeyword(query, LEXICON.quick[intent])) {
      return { intent, confidence: INTENT_CONFIDENCE.quick[intent] };
    }
  }
  return null;
}

/**
 * 解析模型的分类输出；JSON 不合法时按意图名子串匹配
 */
export function parseClassification(text: string): Classification {
  const parsed = ClassificationSchema.safeParse(extractJson(text));
  if (parsed.success) {
    return {
      intent: parsed.data.intent,
      confidence: clamp(parsed.data.confidence),
      reason: parsed.data.reason,
    };
  }

  const lower = text.toLowerCase();
  const named = MODEL_INTENTS.find(intent => lower.includes(intent));
  if (named) {
    return { intent: named, confidence: INTENT_CONFIDENCE.modelSubstring, reason: 'parsed from free text' };
  }
  return { intent: 'knowledge_query', confidence: INTENT_CONFIDENCE.fallback, reason: 'unparseable model output' };
}

/**
 * 生成澄清话术
 */
export function buildClarification(slots: QuerySlots): string {
  const { entity, aspect } = slots;
  if (entity && aspect) {
    return `您是想了解「${entity}」的「${aspect}」吗？`;
  }
  if (entity) {
    return `您是想了解「${entity}」的哪方面信息呢？`;
  }
  if (aspect) {
    return `您想了解哪个对象的「${aspect}」呢？`;
  }
  return '抱歉，我没有完全理解您的问题，能否说得更具体一些？';
}

export interface IntentRecognizerOptions {
  clarifyKnowledgeQuery?: number;
  clarifyOther?: number;
}

/**
 * 意图识别器
 */
export class IntentRecognizer {
  private readonly generator: Generator;
  private readonly clarifyKnowledgeQuery: number;
  private readonly clarifyOther: number;

  constructor(generator: Generator, options: IntentRecognizerOptions = {}) {
    this.generator = generator;
    this.clarifyKnowledgeQuery = options.clarifyKnowledgeQuery ?? INTENT_CONFIDENCE.clarifyKnowledgeQuery;
    this.clarifyOther = options.clarifyOther ?? INTENT_CONFIDENCE.clarifyOther;
  }

  async recognize(query: string, history: readonly HistoryEntry[] = []): Promise<IntentResult> {
    const base = { originalQuery: query, rewrittenQuery: query, entity: '', aspect: '' };

    // 1. 历史查询（不调用模型）
    if (isHistoryQuery(query)) {
      console.log('[Intent] history_query (lexicon)');
      return { ...base, intentType: 'history_query', confidence: INTENT_CONFIDENCE.history };
    }

    // 2. 快速关键词 / 3. 模型分类
    const quick = classifyByKeywords(query);
    const classification: Classification = quick
      ? { ...quick, reason: 'keyword match' }
      : await this.classifyWithModel(query, history);

    if (classification.intent === 'chitchat') {
      console.log(`[Intent] chitchat (${classification.confidence})`);
      return { ...base, intentType: 'chitchat', confidence: classification.confidence, reason: classification.reason };
    }

    // 4. 条件改写
    let rewrittenQuery = query;
    if (classification.intent === 'knowledge_query') {
      rewrittenQuery = (await rewriteWithHistory(query, history, this.generator)).rewrittenQuery;
    }

    // 5. 槽位提取
    const slots = await this.extractSlots(rewrittenQuery);

    const result: IntentResult = {
      intentType: classification.intent,
      confidence: classification.confidence,
      entity: slots.entity,
      aspect: slots.aspect,
      originalQuery: query,
      rewrittenQuery,
      reason: classification.reason,
    };

    // 6. 澄清判断
    const threshold = classification.intent === 'knowledge_query' ? this.clarifyKnowledgeQuery : this.clarifyOther;
    if (classification.intent === 'ambiguous' || classification.confidence < threshold) {
      result.intentType = 'ambiguous';
      result.clarification = buildClarification(slots);
    }

    console.log(`[Intent] ${result.intentType} (${result.confidence})${rewrittenQuery !== query ? ` rewritten: ${rewrittenQuery}` : ''}`);
    return result;
  }

  private async classifyWithModel(query: string, history: readonly HistoryEntry[]): Promise<Classification> {
    try {
      const response = await this.generator.complete(buildClassificationPrompt(query, history));
      return parseClassification(response);
    } catch (error) {
      console.error(`[Intent] Classification failed: ${errorMessage(error)}`);
      return { intent: 'knowledge_query', confidence: INTENT_CONFIDENCE.fallback, reason: 'classification unavailable' };
    }
  }

  private async extractSlots(query: string): Promise<QuerySlots> {
    try {
      const response = await this.generator.complete(buildSlotPrompt(query));
      const parsed = SlotSchema.safeParse(extractJson(response));
      if (parsed.success && (parsed.data.entity || parsed.data.aspect)) {
        return { entity: parsed.data.entity.trim(), aspect: parsed.data.aspect.trim() };
      }
      console.warn('[Intent] Slot output unparseable, using rules');
    } catch (error) {
      console.error(`[Intent] Slot extraction failed: ${errorMessage(error)}`);
    }
    return extractSlotsByRules(query);
  }
}

/**
 * 识别用户意图
 */
export function recognizeIntent(
  query: string,
  history: readonly HistoryEntry[],
  generator: Generator,
): Promise<IntentResult> {
  return new IntentRecognizer(generator).recognize(query, history);
}
