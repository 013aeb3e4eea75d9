/**
 * 幻觉检测模块
 * 检查回答与检索文档是否一致：句子级词汇重叠 + 模型语义判断
 */
import type { Generator } from '../llm/generator';
import { errorMessage } from '../llm/errors';
import type { RetrievalResult } from '../knowledge-base/types';

export interface HallucinationCheckResult {
  isConsistent: boolean;
  confidenceScore: number;     // 0-1
  inconsistencies: string[];
  explanation: string;
}

const SUPPORT_OVERLAP_RATIO = 0.3;
const DOC_PREVIEW_LENGTH = 500;

export function splitSentences(text: string): string[] {
  return text
    .split(/[.!?。！？\n]+/)
    .map(sentence => sentence.trim())
    .filter(sentence => sentence.length > 0);
}

/**
 * 词汇单元：英文/数字按单词，中文按相邻两字
 */
export function tokenize(text: string): Set<string> {
  const tokens = new Set<string>();
  const lower = text.toLowerCase();

  for (const word of lower.match(/[a-z0-9]+/g) ?? []) {
    tokens.add(word);
  }
  for (const run of lower.match(/[一-鿿]+/g) ?? []) {
    if (run.length === 1) {
      tokens.add(run);
      continue;
    }
    for (let i = 0; i < run.length - 1; i++) {
      tokens.add(run.slice(i, i + 2));
    }
  }
  return tokens;
}

function isSupported(sentence: string, facts: readonly Set<string>[]): boolean {
  const words = tokenize(sentence);
  if (words.size === 0) return true;

  return facts.some(fact => {
    let overlap = 0;
    for (const word of words) {
      if (fact.has(word)) overlap++;
    }
    return overlap / words.size > SUPPORT_OVERLAP_RATIO;
  });
}

/**
 * 事实一致性：回答的每个句子都应能在文档中找到足够重叠的句子
 */
export function checkFactConsistency(response: string, docs: readonly RetrievalResult[]): HallucinationCheckResult {
  const sentences = splitSentences(response);
  const facts = docs.flatMap(doc => splitSentences(doc.content)).map(tokenize);
  const inconsistencies = sentences.filter(sentence => !isSupported(sentence, facts));

  const confidenceScore = sentences.length === 0
    ? 1.0
    : Math.max(0.1, 1 - inconsistencies.length / sentences.length);

  return {
    isConsistent: inconsistencies.length === 0,
    confidenceScore,
    inconsistencies,
    explanation: `总句子数: ${sentences.length}, 不一致句子数: ${inconsistencies.length}`,
  };
}

export function buildSemanticCheckPrompt(response: string, docs: readonly RetrievalResult[], query: string): string {
  const context = docs.map(doc => {
    const content = doc.content.length > DOC_PREVIEW_LENGTH
      ? `${doc.content.substring(0, DOC_PREVIEW_LENGTH)}...`
      : doc.content;
    return `文档: ${doc.metadata.title || 'Unknown'}\n内容: ${content}\n`;
  }).join('\n');

  return `请判断下面的回答是否与参考文档一致，是否包含文档中没有依据的内容。

参考文档：
${context}

用户问题：${query}

回答：
${response}

请严格按以下格式输出：
一致性: 是/否
置信度: 0.0-1.0
不一致之处: 列出不一致的内容，用分号分隔；没有则写"无"
解释: 一句话说明判断理由`;
}

/**
 * 解析模型的语义检查输出
 */
export function parseSemanticCheck(analysis: string): HallucinationCheckResult {
  const isConsistent = /一致性\s*[:：]\s*是/.test(analysis);

  const confidenceMatch = analysis.match(/置信度\s*[:：]\s*([0-9.]+)/);
  const parsedConfidence = confidenceMatch ? Number.parseFloat(confidenceMatch[1]) : Number.NaN;
  const confidenceScore = Number.isFinite(parsedConfidence) ? Math.min(1, Math.max(0, parsedConfidence)) : 0.7;

  const inconsistencyLine = analysis.match(/不一致之处\s*[:：]\s*(.*)/)?.[1]?.trim() ?? '';
  const inconsistencies = inconsistencyLine
    .split(/[;；]/)
    .map(item => item.trim())
    .filter(item => item.length > 0 && item !== '无');

  const explanation = analysis.match(/解释\s*[:：]\s*(.*)/)?.[1]?.trim()
    || `${analysis.substring(0, 200)}...`;

  return { isConsistent, confidenceScore, inconsistencies, explanation };
}

export class HallucinationDetector {
  private readonly generator: Generator;

  constructor(generator: Generator) {
    this.generator = generator;
  }

  async detect(response: string, docs: readonly RetrievalResult[], query: string): Promise<HallucinationCheckResult> {
    if (docs.length === 0) {
      return {
        isConsistent: true,
        confidenceScore: 0.8,
        inconsistencies: [],
        explanation: '没有检索到相关文档，无法进行幻觉检测',
      };
    }

    const fact = checkFactConsistency(response, docs);
    const semantic = await this.checkSemanticConsistency(response, docs, query);

    const result: HallucinationCheckResult = {
      isConsistent: fact.isConsistent && semantic.isConsistent,
      confidenceScore: Math.min(fact.confidenceScore, semantic.confidenceScore),
      inconsistencies: [...fact.inconsistencies, ...semantic.inconsistencies],
      explanation: `事实一致性: ${fact.explanation}, 语义一致性: ${semantic.explanation}`,
    };
    console.log(`[Hallucination] consistent=${result.isConsistent}, confidence=${result.confidenceScore.toFixed(2)}`);
    return result;
  }

  private async checkSemanticConsistency(
    response: string,
    docs: readonly RetrievalResult[],
    query: string,
  ): Promise<HallucinationCheckResult> {
    try {
      const analysis = await this.generator.complete(buildSemanticCheckPrompt(response, docs, query));
      return parseSemanticCheck(analysis);
    } catch (error) {
      console.error(`[Hallucination] Semantic check failed: ${errorMessage(error)}`);
      return {
        isConsistent: true,
        confidenceScore: 0.6,
        inconsistencies: [],
        explanation: `语义检查失败，使用默认判断: ${errorMessage(error)}`,
      };
    }
  }
}
