/**
 * 回答生成提示词
 */

const MAX_CONTEXT_LENGTH = 3000;

/**
 * 基于检索上下文回答
 */
export function buildRagPrompt(query: string, context: string, maxContextLength = MAX_CONTEXT_LENGTH): string {
  const truncated = context.length > maxContextLength
    ? `${context.substring(0, maxContextLength)}...(内容已截断)`
    : context;

  return `你是一个专业的助手，回答要有用、准确、简洁。

以下是从用户笔记知识库中检索到的相关内容：
\`\`\`
${truncated}
\`\`\`

回答原则：
- 只使用与问题相关的文档内容，排除无关信息
- 不要编造文档中没有的事实
- 如果文档中没有相关信息，请明确说明"无法根据提供的文档内容回答该问题"
- 如果文档与问题无关而你根据自己的知识作答，先说明"无法从文档中获取相关信息，以下根据我自己的知识回答："

用户问题：
${query}

请用中文回答，保持准确、简洁、条理清晰。`;
}

/**
 * 知识库中没有相关内容时
 */
export function buildNoDocumentPrompt(query: string): string {
  return `你是一个智能助手。用户的问题是："${query}"

本地知识库中没有找到与该问题相关的内容。

请根据你的通用知识回答。如果问题涉及非常具体或专业的内容而你无法准确回答，请如实告知用户，并建议查阅相关资料或寻求专业帮助。`;
}

/**
 * 闲聊
 */
export function buildChitchatPrompt(query: string): string {
  return `你是一个友好的笔记助手，可以帮用户查询他们笔记知识库中的内容。
请自然、简短地回应用户（1-2 句话），不要编造笔记内容。

用户：${query}`;
}
