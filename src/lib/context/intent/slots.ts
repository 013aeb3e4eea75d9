/**
 * 槽位规则提取（模型不可用时的回退）
 * 以「的」或 "of" 为界拆出实体和方面
 */
import type { QuerySlots } from '../types';
import { LEXICON } from './lexicon';

function stripLeading(text: string, words: readonly string[]): string {
  let current = text;
  let changed = true;
  while (changed) {
    changed = false;
    for (const word of words) {
      const lower = current.toLowerCase();
      const isAscii = /^[\x20-\x7e]+$/.test(word);
      // ASCII 前缀后面必须是空白，避免把 "theory" 剥成 "ory"
      if (isAscii ? lower.startsWith(`${word} `) : current.startsWith(word)) {
        current = current.slice(word.length).trim();
        changed = true;
      }
    }
  }
  return current;
}

function stripTrailing(text: string, words: readonly string[]): string {
  let current = text.replace(/[？?。！!，,\s]+$/, '');
  let changed = true;
  while (changed) {
    changed = false;
    for (const word of words) {
      if (current.length > word.length && current.endsWith(word)) {
        current = current.slice(0, -word.length).replace(/[？?。！!，,\s]+$/, '');
        changed = true;
      }
    }
  }
  return current.trim();
}

/**
 * 去掉疑问词和标点，保留查询主体
 */
export function normalizeQuestion(query: string): string {
  const trailingStripped = stripTrailing(query.trim(), LEXICON.slotTrailing);
  return stripLeading(trailingStripped, LEXICON.slotLeading);
}

export function extractSlotsByRules(query: string): QuerySlots {
  const core = normalizeQuestion(query);

  const deIndex = core.indexOf('的');
  if (deIndex > 0) {
    return {
      entity: core.slice(0, deIndex).trim(),
      aspect: core.slice(deIndex + 1).trim(),
    };
  }

  const ofMatch = /^(.+?)\s+of\s+(.+)$/i.exec(core);
  if (ofMatch) {
    return {
      entity: stripLeading(ofMatch[2].trim(), LEXICON.slotLeading),
      aspect: ofMatch[1].trim(),
    };
  }

  return { entity: core, aspect: '' };
}
