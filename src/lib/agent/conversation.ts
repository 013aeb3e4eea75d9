/**
 * 对话历史
 * 只保留最近若干轮，reset 时清空
 */
import type { ConversationTurn } from '../context/types';

export class ConversationLog {
  private turns: ConversationTurn[] = [];
  private readonly maxTurns: number;

  constructor(maxTurns = 10) {
    this.maxTurns = Math.max(1, maxTurns);
  }

  append(turn: ConversationTurn): void {
    this.turns.push(turn);
    if (this.turns.length > this.maxTurns) {
      this.turns = this.turns.slice(-this.maxTurns);
    }
  }

  list(): ConversationTurn[] {
    return [...this.turns];
  }

  get size(): number {
    return this.turns.length;
  }

  clear(): void {
    this.turns = [];
  }
}

function formatTurns(turns: readonly ConversationTurn[]): string {
  const lines = ['最近的对话记录：'];
  turns.forEach((turn, i) => {
    lines.push(`${i + 1}. 问题: ${turn.query}`);
    lines.push(`   回答: ${turn.response}`);
  });
  return lines.join('\n');
}

/**
 * 根据对话历史直接回答历史类问题（不调用模型）
 */
export function answerHistoryQuery(query: string, history: readonly ConversationTurn[]): string {
  if (history.length === 0) {
    return '我们还没有开始对话，您还没有问过任何问题。';
  }

  if (query.includes('第一个') || /first question/i.test(query)) {
    return `您的第一个问题是："${history[0].query}"`;
  }

  if (/前面|之前|刚才|上一个/.test(query) || /earlier|just now|previous|last question/i.test(query)) {
    return formatTurns(history.slice(-3));
  }

  if (/什么问题|问了什么/.test(query) || /what (did i ask|i asked)/i.test(query)) {
    const questions = history.slice(-5).map(turn => `- ${turn.query}`);
    return `您最近问过的问题包括：\n${questions.join('\n')}`;
  }

  return formatTurns(history.slice(-2));
}
