/**
 * Agent 模块导出
 */
export { RagAgent } from './agent';
export type { AgentAnswer, RagAgentOptions } from './agent';
export { ConversationLog, answerHistoryQuery } from './conversation';
export {
  HallucinationDetector,
  checkFactConsistency,
  parseSemanticCheck,
  splitSentences,
  tokenize,
} from './hallucination';
export type { HallucinationCheckResult } from './hallucination';
export { buildRagPrompt, buildNoDocumentPrompt, buildChitchatPrompt } from './prompts';
export { streamEvent, formatSseEvent } from './streaming';
export type { StreamEvent, StreamEventType } from './streaming';
