/**
 * 流式事件
 */
import type { RetrievalResult } from '../knowledge-base/types';

export type StreamEventType = 'loading' | 'think' | 'text' | 'reference_doc' | 'done' | 'error';

export interface StreamEvent {
  event: StreamEventType;
  content: string;
  cover: boolean;            // 前端是否覆盖上一条显示
  documents?: RetrievalResult[];
  elapsedTime?: number;      // 秒
  metadata?: Record<string, unknown>;
}

export function streamEvent(
  event: StreamEventType,
  content: string,
  extra: Partial<Omit<StreamEvent, 'event' | 'content'>> = {},
): StreamEvent {
  return { event, content, cover: false, ...extra };
}

/**
 * 格式化为 Server-Sent Events
 */
export function formatSseEvent(event: StreamEvent): string {
  const data: Record<string, unknown> = {
    event: event.event,
    content: event.content,
    cover: event.cover,
  };
  if (event.documents !== undefined) {
    data.documents = event.documents;
  }
  if (event.elapsedTime !== undefined) {
    data.elapsed_time = event.elapsedTime;
  }
  if (event.metadata !== undefined) {
    data.metadata = event.metadata;
  }
  return `data: ${JSON.stringify(data)}\n\n`;
}
