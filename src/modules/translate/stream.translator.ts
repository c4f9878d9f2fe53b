import { Logger } from '@nestjs/common';
import {
  BlockKind,
  ContentBlockDelta,
  StopReason,
  StreamEvent,
  Usage,
} from './interfaces/messages.interfaces';
import { ChatCompletionChunk, ChunkToolCall } from './interfaces/chat.interfaces';
import { chatCompletionChunkSchema } from './chat.schema';
import { mapFinishReason, mapUsage, newMessageId } from './response.translator';
import { ThinkingEvent, ThinkingStreamParser } from './thinking.parser';

export interface StreamTranslatorOptions {
  toClient: (backendId: string) => string;
  emulateThinking: boolean;
  requestedModel: string;
}

type OpenBlock =
  | { kind: 'text' | 'thinking'; index: number }
  | { kind: 'tool_use'; index: number; slot: number };

interface ToolCallAccumulator {
  id: string;
  name: string;
  index: number;
  arguments: string;
}

interface StreamState {
  messageStarted: boolean;
  openBlock: OpenBlock | null;
  nextIndex: number;
  toolCalls: Map<number, ToolCallAccumulator>;
  stopReason: StopReason | null;
  usage: Usage | null;
  terminated: boolean;
}

/**
 * Per-connection state machine turning backend chunks into Messages stream
 * events. Never shared between connections.
 *
 * The chunk carrying a finish reason closes the open block and ends the
 * message with `message_delta` (usage as known at that point) and
 * `message_stop`. Anything after it, trailing usage-only chunks included, is
 * ignored.
 */
export class StreamTranslator {
  private readonly logger = new Logger(StreamTranslator.name);
  private readonly thinkingParser: ThinkingStreamParser | null;
  private readonly state: StreamState = {
    messageStarted: false,
    openBlock: null,
    nextIndex: 0,
    toolCalls: new Map(),
    stopReason: null,
    usage: null,
    terminated: false,
  };

  constructor(private readonly options: StreamTranslatorOptions) {
    this.thinkingParser = options.emulateThinking ? new ThinkingStreamParser() : null;
  }

  get terminated(): boolean {
    return this.state.terminated;
  }

  /**
   * Translate one decoded backend chunk. Chunks of an unexpected shape are
   * logged and skipped.
   */
  push(raw: unknown): StreamEvent[] {
    if (this.state.terminated) {
      return [];
    }
    const result = chatCompletionChunkSchema.validate(raw);
    if (result.error !== undefined) {
      this.logger.warn(`Skipping malformed stream chunk: ${result.error.message}`);
      return [];
    }
    return this.translate(result.value);
  }

  /**
   * Upstream ended. Closes whatever is still open; a stream that never started
   * ends with an error event instead.
   */
  finish(): StreamEvent[] {
    if (this.state.terminated) {
      return [];
    }
    if (!this.state.messageStarted) {
      return this.abort('Upstream stream ended before any data was received');
    }

    const events: StreamEvent[] = [];
    this.logger.warn('Upstream stream ended without a finish reason');
    this.flushThinking(events);
    this.closeBlock(events);
    this.state.stopReason = 'end_turn';
    this.terminate(events);
    return events;
  }

  /**
   * Upstream failed mid-stream. Events already sent stand.
   */
  abort(message: string): StreamEvent[] {
    if (this.state.terminated) {
      return [];
    }
    this.state.terminated = true;
    return [{ type: 'error', error: { type: 'api_error', message } }];
  }

  private translate(chunk: ChatCompletionChunk): StreamEvent[] {
    const events: StreamEvent[] = [];

    if (!this.state.messageStarted) {
      this.start(chunk, events);
    }
    if (chunk.usage) {
      this.state.usage = mapUsage(chunk.usage);
    }

    const [choice] = chunk.choices;
    if (!choice) {
      return events;
    }
    const { content, tool_calls: toolCalls } = choice.delta;
    if (content) {
      this.text(content, events);
    }
    for (const fragment of toolCalls ?? []) {
      this.toolCall(fragment, events);
    }
    if (choice.finish_reason) {
      this.flushThinking(events);
      this.closeBlock(events);
      this.state.stopReason =
        mapFinishReason(choice.finish_reason, this.state.toolCalls.size > 0) ?? 'end_turn';
      this.terminate(events);
    }
    return events;
  }

  private start(chunk: ChatCompletionChunk, events: StreamEvent[]): void {
    this.state.messageStarted = true;
    events.push({
      type: 'message_start',
      message: {
        id: chunk.id || newMessageId(),
        type: 'message',
        role: 'assistant',
        model: this.options.toClient(chunk.model || this.options.requestedModel),
        content: [],
        stop_reason: null,
        stop_sequence: null,
        usage: { ...mapUsage(chunk.usage), output_tokens: 0 },
      },
    });
  }

  private text(text: string, events: StreamEvent[]): void {
    if (!this.thinkingParser) {
      this.delta('text', { type: 'text_delta', text }, events);
      return;
    }
    for (const event of this.thinkingParser.push(text)) {
      this.thinkingEvent(event, events);
    }
  }

  private thinkingEvent(event: ThinkingEvent, events: StreamEvent[]): void {
    switch (event.type) {
      case 'thinking_start':
        this.closeBlock(events);
        this.openBlock('thinking', events);
        break;
      case 'thinking_delta':
        this.delta('thinking', { type: 'thinking_delta', thinking: event.text }, events);
        break;
      case 'thinking_end':
        if (this.state.openBlock?.kind === 'thinking') {
          this.closeBlock(events);
        }
        break;
      case 'text_delta':
        this.delta('text', { type: 'text_delta', text: event.text }, events);
        break;
    }
  }

  private toolCall(fragment: ChunkToolCall, events: StreamEvent[]): void {
    const slot = fragment.index;
    const known = this.state.toolCalls.get(slot);
    const name = fragment.function?.name;
    const args = fragment.function?.arguments;

    if (fragment.id && name && known?.id !== fragment.id) {
      this.flushThinking(events);
      this.closeBlock(events);
      const index = this.state.nextIndex++;
      this.state.toolCalls.set(slot, { id: fragment.id, name, index, arguments: '' });
      this.state.openBlock = { kind: 'tool_use', index, slot };
      events.push({
        type: 'content_block_start',
        index,
        content_block: { type: 'tool_use', id: fragment.id, name, input: {} },
      });
    } else if (!known) {
      this.logger.warn(`Dropping tool call fragment for unknown slot ${slot}`);
      return;
    }

    if (!args) {
      return;
    }
    const open = this.state.openBlock;
    const accumulator = this.state.toolCalls.get(slot);
    if (!accumulator || open?.kind !== 'tool_use' || open.slot !== slot) {
      this.logger.warn(`Dropping arguments for closed tool call slot ${slot}`);
      return;
    }
    accumulator.arguments += args;
    events.push({
      type: 'content_block_delta',
      index: accumulator.index,
      delta: { type: 'input_json_delta', partial_json: args },
    });
  }

  private delta(kind: 'text' | 'thinking', delta: ContentBlockDelta, events: StreamEvent[]): void {
    const open = this.state.openBlock;
    const index = open?.kind === kind ? open.index : this.openBlock(kind, events);
    events.push({ type: 'content_block_delta', index, delta });
  }

  private openBlock(kind: Exclude<BlockKind, 'tool_use'>, events: StreamEvent[]): number {
    this.closeBlock(events);
    const index = this.state.nextIndex++;
    this.state.openBlock = { kind, index };
    events.push({
      type: 'content_block_start',
      index,
      content_block: kind === 'text' ? { type: 'text', text: '' } : { type: 'thinking', thinking: '' },
    });
    return index;
  }

  private closeBlock(events: StreamEvent[]): void {
    if (this.state.openBlock) {
      events.push({ type: 'content_block_stop', index: this.state.openBlock.index });
      this.state.openBlock = null;
    }
  }

  private flushThinking(events: StreamEvent[]): void {
    if (this.thinkingParser) {
      for (const event of this.thinkingParser.flush()) {
        this.thinkingEvent(event, events);
      }
    }
  }

  private terminate(events: StreamEvent[]): void {
    events.push({
      type: 'message_delta',
      delta: { stop_reason: this.state.stopReason, stop_sequence: null },
      usage: this.state.usage ?? { input_tokens: 0, output_tokens: 0 },
    });
    events.push({ type: 'message_stop' });
    this.state.terminated = true;
  }
}
