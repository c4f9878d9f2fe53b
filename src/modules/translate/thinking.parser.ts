import { TextBlock, ThinkingBlock } from './interfaces/messages.interfaces';

export const THINKING_OPEN_TAG = '<thinking>';
export const THINKING_CLOSE_TAG = '</thinking>';

/**
 * Appended to the system prompt when the caller asks for extended thinking, so
 * the backend model writes its reasoning inside tags we can pick out again.
 */
export const THINKING_INSTRUCTION =
  'Before answering, reason step by step inside <thinking></thinking> tags. ' +
  'Write the final answer after the closing tag.';

/**
 * Split a complete assistant text into thinking and text blocks.
 *
 * Text without tags comes back as one text block, unchanged. An unclosed
 * opening tag turns the rest of the text into plain text. Whitespace-only text
 * between spans is dropped, as is leading whitespace after a closing tag.
 */
export function parseThinkingBlocks(text: string): Array<TextBlock | ThinkingBlock> {
  if (!text.includes(THINKING_OPEN_TAG)) {
    return [{ type: 'text', text }];
  }

  const blocks: Array<TextBlock | ThinkingBlock> = [];
  let remaining = text;

  for (;;) {
    const start = remaining.indexOf(THINKING_OPEN_TAG);
    if (start === -1) {
      break;
    }
    const end = remaining.indexOf(THINKING_CLOSE_TAG, start + THINKING_OPEN_TAG.length);
    if (end === -1) {
      break;
    }

    const before = remaining.slice(0, start);
    if (before.trim()) {
      blocks.push({ type: 'text', text: before });
    }
    blocks.push({
      type: 'thinking',
      thinking: remaining.slice(start + THINKING_OPEN_TAG.length, end),
    });
    remaining = remaining.slice(end + THINKING_CLOSE_TAG.length).trimStart();
  }

  if (remaining.trim()) {
    blocks.push({ type: 'text', text: remaining });
  }
  return blocks;
}

export type ThinkingEvent =
  | { type: 'thinking_start' }
  | { type: 'thinking_delta'; text: string }
  | { type: 'thinking_end' }
  | { type: 'text_delta'; text: string };

/**
 * Length of the longest suffix of `buffer` that is a proper prefix of `tag`.
 */
function partialTagLength(buffer: string, tag: string): number {
  const max = Math.min(buffer.length, tag.length - 1);
  for (let length = max; length > 0; length--) {
    if (buffer.endsWith(tag.slice(0, length))) {
      return length;
    }
  }
  return 0;
}

/**
 * Incremental counterpart of {@link parseThinkingBlocks}. Text is released as
 * soon as it cannot be part of a tag; only a suffix that could still grow into
 * `<thinking>` or `</thinking>` is held back until the next push.
 */
export class ThinkingStreamParser {
  private buffer = '';
  private inThinking = false;
  private afterThinking = false;

  get thinking(): boolean {
    return this.inThinking;
  }

  push(chunk: string): ThinkingEvent[] {
    this.buffer += chunk;
    const events: ThinkingEvent[] = [];

    for (;;) {
      if (this.inThinking) {
        const end = this.buffer.indexOf(THINKING_CLOSE_TAG);
        if (end !== -1) {
          if (end > 0) {
            events.push({ type: 'thinking_delta', text: this.buffer.slice(0, end) });
          }
          events.push({ type: 'thinking_end' });
          this.buffer = this.buffer.slice(end + THINKING_CLOSE_TAG.length);
          this.inThinking = false;
          this.afterThinking = true;
          continue;
        }
        this.release(events, 'thinking_delta', THINKING_CLOSE_TAG);
        return events;
      }

      if (this.afterThinking) {
        this.buffer = this.buffer.trimStart();
        if (!this.buffer) {
          return events;
        }
        this.afterThinking = false;
      }

      const start = this.buffer.indexOf(THINKING_OPEN_TAG);
      if (start !== -1) {
        const before = this.buffer.slice(0, start);
        if (before.trim()) {
          events.push({ type: 'text_delta', text: before });
        }
        events.push({ type: 'thinking_start' });
        this.buffer = this.buffer.slice(start + THINKING_OPEN_TAG.length);
        this.inThinking = true;
        continue;
      }
      this.release(events, 'text_delta', THINKING_OPEN_TAG);
      return events;
    }
  }

  /**
   * Release everything held back. An unclosed thinking span is closed.
   */
  flush(): ThinkingEvent[] {
    const events: ThinkingEvent[] = [];
    if (this.inThinking) {
      if (this.buffer) {
        events.push({ type: 'thinking_delta', text: this.buffer });
      }
      events.push({ type: 'thinking_end' });
      this.inThinking = false;
    } else if (this.buffer) {
      events.push({ type: 'text_delta', text: this.buffer });
    }
    this.buffer = '';
    this.afterThinking = false;
    return events;
  }

  private release(
    events: ThinkingEvent[],
    type: 'thinking_delta' | 'text_delta',
    tag: string,
  ): void {
    const held = partialTagLength(this.buffer, tag);
    const ready = this.buffer.slice(0, this.buffer.length - held);
    if (ready) {
      events.push({ type, text: ready });
    }
    this.buffer = this.buffer.slice(this.buffer.length - held);
  }
}
