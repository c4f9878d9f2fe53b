import { SseDecoder, encodeEvent } from './sse';

describe('SseDecoder', () => {
  it('returns payloads of complete events', () => {
    const decoder = new SseDecoder();
    expect(decoder.push('data: {"a":1}\n\ndata: {"b":2}\n\n')).toEqual(['{"a":1}', '{"b":2}']);
  });

  it('waits for the blank line before releasing an event', () => {
    const decoder = new SseDecoder();
    expect(decoder.push('data: {"a"')).toEqual([]);
    expect(decoder.push(':1}\n')).toEqual([]);
    expect(decoder.push('\n')).toEqual(['{"a":1}']);
  });

  it('accepts CRLF separators, also when split between pushes', () => {
    const decoder = new SseDecoder();
    expect(decoder.push('data: one\r\n\r')).toEqual([]);
    expect(decoder.push('\ndata: two\r\n\r\n')).toEqual(['one', 'two']);
  });

  it('joins multi-line data and skips comments and other fields', () => {
    const decoder = new SseDecoder();
    expect(decoder.push(': keep-alive\n\nevent: x\ndata:line1\ndata: line2\n\n')).toEqual([
      'line1\nline2',
    ]);
  });

  it('stops at [DONE]', () => {
    const decoder = new SseDecoder();
    expect(decoder.push('data: first\n\ndata: [DONE]\n\ndata: late\n\n')).toEqual(['first']);
    expect(decoder.done).toBe(true);
    expect(decoder.push('data: later\n\n')).toEqual([]);
    expect(decoder.flush()).toEqual([]);
  });

  it('decodes a trailing event without separator on flush', () => {
    const decoder = new SseDecoder();
    expect(decoder.push('data: tail')).toEqual([]);
    expect(decoder.flush()).toEqual(['tail']);
  });
});

describe('encodeEvent', () => {
  it('writes a named event with a JSON payload', () => {
    expect(encodeEvent({ type: 'content_block_stop', index: 2 })).toBe(
      'event: content_block_stop\ndata: {"type":"content_block_stop","index":2}\n\n',
    );
  });
});
