import { ThinkingEvent, ThinkingStreamParser, parseThinkingBlocks } from './thinking.parser';

describe('parseThinkingBlocks', () => {
  it('returns plain text unchanged', () => {
    expect(parseThinkingBlocks('Just a regular response.')).toEqual([
      { type: 'text', text: 'Just a regular response.' },
    ]);
  });

  it('splits a leading thinking span from the answer', () => {
    expect(parseThinkingBlocks('<thinking>Let me think...</thinking>The answer is 42.')).toEqual([
      { type: 'thinking', thinking: 'Let me think...' },
      { type: 'text', text: 'The answer is 42.' },
    ]);
  });

  it('keeps text on both sides of a span', () => {
    expect(parseThinkingBlocks('Before<thinking>hmm</thinking>\n\nAfter')).toEqual([
      { type: 'text', text: 'Before' },
      { type: 'thinking', thinking: 'hmm' },
      { type: 'text', text: 'After' },
    ]);
  });

  it('handles several spans and drops whitespace between them', () => {
    expect(
      parseThinkingBlocks('<thinking>First</thinking>  \n\t <thinking>Second</thinking>End'),
    ).toEqual([
      { type: 'thinking', thinking: 'First' },
      { type: 'thinking', thinking: 'Second' },
      { type: 'text', text: 'End' },
    ]);
  });

  it('treats an unclosed tag as text', () => {
    expect(parseThinkingBlocks('<thinking>This is never closed')).toEqual([
      { type: 'text', text: '<thinking>This is never closed' },
    ]);
  });
});

describe('ThinkingStreamParser', () => {
  function feed(parser: ThinkingStreamParser, chunks: string[]): ThinkingEvent[] {
    return [...chunks.flatMap((chunk) => parser.push(chunk)), ...parser.flush()];
  }

  it('passes plain text straight through', () => {
    const parser = new ThinkingStreamParser();
    expect(parser.push('Hello')).toEqual([{ type: 'text_delta', text: 'Hello' }]);
    expect(parser.push(' world')).toEqual([{ type: 'text_delta', text: ' world' }]);
    expect(parser.flush()).toEqual([]);
  });

  it('holds back only a possible tag prefix', () => {
    const parser = new ThinkingStreamParser();
    expect(parser.push('a < b and <thi')).toEqual([{ type: 'text_delta', text: 'a < b and ' }]);
    expect(parser.push('s is not a tag')).toEqual([
      { type: 'text_delta', text: '<this is not a tag' },
    ]);
  });

  it('recognises tags split across chunks', () => {
    const parser = new ThinkingStreamParser();
    expect(feed(parser, ['<thin', 'king>step one', ' and two</thi', 'nking>\n', 'Answer'])).toEqual([
      { type: 'thinking_start' },
      { type: 'thinking_delta', text: 'step one' },
      { type: 'thinking_delta', text: ' and two' },
      { type: 'thinking_end' },
      { type: 'text_delta', text: 'Answer' },
    ]);
  });

  it('emits text before a span', () => {
    const parser = new ThinkingStreamParser();
    expect(parser.push('Intro <thinking>x</thinking>')).toEqual([
      { type: 'text_delta', text: 'Intro ' },
      { type: 'thinking_start' },
      { type: 'thinking_delta', text: 'x' },
      { type: 'thinking_end' },
    ]);
  });

  it('closes an unterminated span on flush', () => {
    const parser = new ThinkingStreamParser();
    expect(feed(parser, ['<thinking>still going</thin'])).toEqual([
      { type: 'thinking_start' },
      { type: 'thinking_delta', text: 'still going' },
      { type: 'thinking_delta', text: '</thin' },
      { type: 'thinking_end' },
    ]);
    expect(parser.thinking).toBe(false);
  });

  it('releases a held prefix as text on flush', () => {
    const parser = new ThinkingStreamParser();
    expect(feed(parser, ['ends with <'])).toEqual([
      { type: 'text_delta', text: 'ends with ' },
      { type: 'text_delta', text: '<' },
    ]);
  });
});
