/**
 * 文档切分
 */
import { SentenceSplitter } from 'llamaindex';

/**
 * 文本 -> 分块列表
 */
export type Chunker = (text: string) => string[];

export function createSentenceChunker(chunkSize: number, chunkOverlap: number): Chunker {
  const splitter = new SentenceSplitter({ chunkSize, chunkOverlap });
  return text => splitter.splitText(text).filter(chunk => chunk.trim().length > 0);
}
