/**
 * 上下文工程
 *
 * - 意图识别（Intent）：历史问题短路、关键词快速判断、模型分类、槽位与澄清
 * - 查询改写（RAG）：结合对话历史消解指代
 *
 * 使用方式：
 * ```typescript
 * import { IntentRecognizer } from './lib/context';
 *
 * const recognizer = new IntentRecognizer(generator);
 * const intent = await recognizer.recognize(query, history);
 * ```
 */

export { intentTypes } from './types';
export type { IntentType, IntentResult, QuerySlots, ConversationTurn, HistoryEntry } from './types';

export * from './intent';
export * from './rag';
