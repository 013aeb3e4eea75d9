/**
 * 意图识别提示词模板
 */
import type { HistoryEntry } from '../types';

/**
 * 格式化最近几轮对话（回答截断）
 */
export function formatHistory(history: readonly HistoryEntry[], turns = 3, maxResponseLength = 200): string {
  const recent = history.slice(-turns);
  if (recent.length === 0) {
    return '（无）';
  }
  return recent.map(turn => {
    const response = turn.response.length > maxResponseLength
      ? `${turn.response.substring(0, maxResponseLength)}...`
      : turn.response;
    return `用户: ${turn.query}\n助手: ${response}`;
  }).join('\n');
}

export function buildClassificationPrompt(query: string, history: readonly HistoryEntry[]): string {
  return `请对以下用户输入进行分类：

分类类型：
1. chitchat（闲聊）：如问候、感谢、告别等
2. knowledge_query（知识查询）：询问知识库中的信息，如"什么是XXX？"、"如何XXX？"、"XXX是什么？"
3. tool_request（工具请求）：请求执行某种操作，如"帮我XXX"、"计算XXX"、"生成XXX"
4. ambiguous（模糊需澄清）：意图不明确，需要澄清

用户输入：${query}

历史对话：
${formatHistory(history)}

请按照以下 JSON 格式返回分类结果：
{"intent": "chitchat|knowledge_query|tool_request|ambiguous", "confidence": 0.0-1.0, "reason": "分类理由"}

只返回 JSON，不要返回其他内容。`;
}

export function buildRewritePrompt(query: string, history: readonly HistoryEntry[]): string {
  return `你负责把用户的最新输入改写成一个完全独立的查询。

历史对话：
${formatHistory(history)}

用户最新输入：${query}

要求：
1. 包含所有必要信息，不依赖历史对话
2. 不使用指代词，明确写出具体对象
3. 如果输入已经是独立的查询，原样返回

例如：
- 历史：用户问"iPhone 15 有哪些新功能？"
- 新输入："它的电池续航呢？"
- 改写："iPhone 15 的电池续航怎么样？"

只返回改写后的查询，不要返回其他内容。`;
}

export function buildSlotPrompt(query: string): string {
  return `请解析以下查询的结构：

用户查询：${query}

按照以下 JSON 格式返回：
{"entity": "主要实体（如产品名称、概念等）", "aspect": "查询的方面（如功能、价格、使用方法等）"}

例如：
- 查询："iPhone 15 的电池续航怎么样？"
- 结果：{"entity": "iPhone 15", "aspect": "电池续航"}

只返回 JSON，不要返回其他内容。`;
}
