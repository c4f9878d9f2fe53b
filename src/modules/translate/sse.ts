import { StreamEvent } from './interfaces/messages.interfaces';

export const SSE_DONE = '[DONE]';

/**
 * Incremental decoder for the backend's `data:` event stream. Accepts text in
 * arbitrary slices and returns the payload of every complete event. Events are
 * separated by a blank line (`\n\n` or `\r\n\r\n`); multiple `data:` lines in
 * one event are joined with `\n`. Nothing is returned after `[DONE]`.
 */
export class SseDecoder {
  private buffer = '';
  private finished = false;

  get done(): boolean {
    return this.finished;
  }

  push(text: string): string[] {
    if (this.finished) {
      return [];
    }
    this.buffer = (this.buffer + text).replace(/\r\n/g, '\n');

    const payloads: string[] = [];
    let separator = this.buffer.indexOf('\n\n');
    while (separator !== -1 && !this.finished) {
      this.collect(this.buffer.slice(0, separator), payloads);
      this.buffer = this.buffer.slice(separator + 2);
      separator = this.buffer.indexOf('\n\n');
    }
    return payloads;
  }

  /**
   * Decode whatever is left once the source has ended.
   */
  flush(): string[] {
    const payloads: string[] = [];
    if (!this.finished && this.buffer.trim()) {
      this.collect(this.buffer, payloads);
    }
    this.buffer = '';
    return payloads;
  }

  private collect(block: string, payloads: string[]): void {
    const data: string[] = [];
    for (const line of block.split('\n')) {
      if (line.startsWith('data:')) {
        data.push(line.slice(line.startsWith('data: ') ? 6 : 5));
      }
    }
    if (data.length === 0) {
      return;
    }

    const payload = data.join('\n');
    if (payload.trim() === SSE_DONE) {
      this.finished = true;
      return;
    }
    payloads.push(payload);
  }
}

/**
 * `event: <type>\ndata: <json>\n\n`
 */
export function encodeEvent(event: StreamEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}
