import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { UpstreamError } from '../../common/errors/proxy-errors';
import {
  MessagesResponse,
  ResponseContentBlock,
  StopReason,
  ToolUseBlock,
  Usage,
} from './interfaces/messages.interfaces';
import { ChatCompletionResponse, ChatToolCall, ChatUsage } from './interfaces/chat.interfaces';
import { chatCompletionResponseSchema } from './chat.schema';
import { parseThinkingBlocks } from './thinking.parser';

const logger = new Logger('ResponseTranslator');

export interface ResponseTranslationOptions {
  toClient: (backendId: string) => string;
  emulateThinking: boolean;
  /** Backend model the request was sent with; used when the reply names none. */
  requestedModel: string;
}

export function newMessageId(): string {
  return `msg_${uuidv4().replace(/-/g, '')}`;
}

/**
 * Map a backend finish reason. `stop` with tool calls present means the model
 * stopped to call them.
 */
export function mapFinishReason(
  reason: string | null | undefined,
  hasToolCalls: boolean,
): StopReason | null {
  if (reason === null || reason === undefined) {
    return null;
  }
  switch (reason) {
    case 'stop':
      return hasToolCalls ? 'tool_use' : 'end_turn';
    case 'length':
      return 'max_tokens';
    case 'tool_calls':
    case 'function_call':
      return 'tool_use';
    case 'content_filter':
      return 'refusal';
    default:
      return 'other';
  }
}

/**
 * Cached prompt tokens are reported apart from, not inside, `input_tokens`.
 */
export function mapUsage(usage: ChatUsage | null | undefined): Usage {
  const prompt = usage?.prompt_tokens ?? 0;
  const cached = usage?.prompt_tokens_details?.cached_tokens ?? 0;
  const mapped: Usage = {
    input_tokens: Math.max(0, prompt - cached),
    output_tokens: usage?.completion_tokens ?? 0,
  };
  if (cached > 0) {
    mapped.cache_read_input_tokens = cached;
  }
  return mapped;
}

/**
 * Check a backend reply against the shape the translator reads.
 */
export function parseChatResponse(raw: unknown): ChatCompletionResponse {
  const result = chatCompletionResponseSchema.validate(raw, { abortEarly: true });
  if (result.error !== undefined) {
    throw new UpstreamError(`Malformed upstream response: ${result.error.message}`);
  }
  return result.value;
}

export function toolUseBlock(call: ChatToolCall): ToolUseBlock {
  return { type: 'tool_use', id: call.id, name: call.function.name, input: parseArguments(call) };
}

function parseArguments(call: ChatToolCall): Record<string, unknown> {
  if (!call.function.arguments) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(call.function.arguments);
  } catch {
    logger.warn(`Tool call ${call.id} has unparseable arguments, using {}`);
    return {};
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    logger.warn(`Tool call ${call.id} arguments are not an object, using {}`);
    return {};
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function translateResponse(
  response: ChatCompletionResponse,
  options: ResponseTranslationOptions,
): MessagesResponse {
  const [choice] = response.choices;
  if (!choice) {
    throw new UpstreamError('Upstream response has no choices');
  }

  const content: ResponseContentBlock[] = [];
  const text = choice.message.content;
  if (text) {
    const blocks: ResponseContentBlock[] = options.emulateThinking
      ? parseThinkingBlocks(text)
      : [{ type: 'text', text }];
    content.push(...blocks);
  }
  const toolCalls = choice.message.tool_calls ?? [];
  for (const call of toolCalls) {
    content.push(toolUseBlock(call));
  }

  return {
    id: response.id || newMessageId(),
    type: 'message',
    role: 'assistant',
    model: options.toClient(response.model || options.requestedModel),
    content,
    stop_reason: mapFinishReason(choice.finish_reason, toolCalls.length > 0),
    stop_sequence: null,
    usage: mapUsage(response.usage),
  };
}
