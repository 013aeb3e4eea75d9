import { describe, expect, it } from 'vitest';
import { formatSseEvent, streamEvent } from '../streaming';

describe('formatSseEvent', () => {
  it('serialises an event as a server-sent data line', () => {
    expect(formatSseEvent(streamEvent('done', '回答生成完成', { elapsedTime: 1.5 })))
      .toBe('data: {"event":"done","content":"回答生成完成","cover":false,"elapsed_time":1.5}\n\n');
  });

  it('omits optional fields that are not set', () => {
    expect(formatSseEvent(streamEvent('think', '正在检索相关文档...')))
      .toBe('data: {"event":"think","content":"正在检索相关文档...","cover":false}\n\n');
  });
});
