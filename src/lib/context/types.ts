/**
 * 上下文工程系统类型定义
 */

// ==================== 意图相关 ====================

export const intentTypes = {
  chitchat: '闲聊',
  knowledge_query: '知识查询',
  tool_request: '工具请求',
  ambiguous: '模糊需澄清',
  history_query: '对话历史查询',
} as const;

export type IntentType = keyof typeof intentTypes;

/**
 * 意图识别结果（每轮一次，不持久化）
 */
export interface IntentResult {
  intentType: IntentType;
  confidence: number;
  entity: string;
  aspect: string;
  originalQuery: string;
  rewrittenQuery: string;
  reason?: string;
  clarification?: string;
}

/**
 * 查询槽位
 */
export interface QuerySlots {
  entity: string;
  aspect: string;
}

// ==================== 对话历史 ====================

/**
 * 一轮完整对话
 */
export interface ConversationTurn {
  query: string;
  response: string;
  intent: IntentType;
}

/**
 * 意图识别只需要问答文本
 */
export type HistoryEntry = Pick<ConversationTurn, 'query' | 'response'>;
