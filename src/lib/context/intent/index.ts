/**
 * 意图识别模块
 */

export {
  IntentRecognizer,
  recognizeIntent,
  isHistoryQuery,
  classifyByKeywords,
  parseClassification,
  buildClarification,
  INTENT_CONFIDENCE,
} from './analyzer';
export type { IntentRecognizerOptions } from './analyzer';

export { extractSlotsByRules, normalizeQuestion } from './slots';
export { LEXICON, containsKeyword, findKeyword } from './lexicon';
export { formatHistory } from './prompts';
