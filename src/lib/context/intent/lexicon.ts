/**
 * 意图识别词表
 */
import { z } from 'zod';
import lexiconData from './lexicon.json';

const LexiconSchema = z.object({
  history: z.array(z.string()),
  quick: z.object({
    knowledge_query: z.array(z.string()),
    tool_request: z.array(z.string()),
    chitchat: z.array(z.string()),
  }),
  referential: z.array(z.string()),
  declined: z.array(z.string()),
  slotLeading: z.array(z.string()),
  slotTrailing: z.array(z.string()),
});

export type Lexicon = z.infer<typeof LexiconSchema>;

export const LEXICON: Lexicon = LexiconSchema.parse(lexiconData);

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * 关键词匹配：ASCII 关键词按单词边界匹配（不区分大小写），其他按子串匹配
 */
export function containsKeyword(text: string, keyword: string): boolean {
  if (/^[\x20-\x7e]+$/.test(keyword)) {
    return new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'i').test(text);
  }
  return text.includes(keyword);
}

export function findKeyword(text: string, keywords: readonly string[]): string | null {
  return keywords.find(keyword => containsKeyword(text, keyword)) ?? null;
}
