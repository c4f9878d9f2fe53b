import { ValidationError } from 'joi';
import { TranslationError } from '../../common/errors/proxy-errors';
import {
  AssistantContentBlock,
  ImageSource,
  MessageParam,
  MessagesRequest,
  ImageBlock,
  TextBlock,
  ToolChoice,
  ToolDefinition,
  ToolResultBlock,
  UserContentBlock,
} from './interfaces/messages.interfaces';
import {
  ChatCompletionRequest,
  ChatContentPart,
  ChatMessage,
  ChatTool,
  ChatToolCall,
  ChatToolChoice,
} from './interfaces/chat.interfaces';
import { messagesRequestSchema } from './messages.schema';
import { THINKING_CLOSE_TAG, THINKING_INSTRUCTION, THINKING_OPEN_TAG } from './thinking.parser';

export interface RequestTranslationOptions {
  toBackend: (clientId: string) => string;
  emulateThinking: boolean;
}

/**
 * Facts about a request the transport turns into backend headers.
 */
export interface RequestHints {
  /** Any user message carries an image block. */
  vision: boolean;
  /** The conversation already has assistant turns, i.e. an agent loop. */
  agent: boolean;
}

const BLOCK_SEPARATOR = '\n\n';

/**
 * Validate a raw request body. The first violation becomes a
 * {@link TranslationError} naming its dotted field path.
 */
export function parseMessagesRequest(body: unknown): MessagesRequest {
  const result = messagesRequestSchema.validate(body, {
    abortEarly: true,
    convert: false,
    errors: { label: false },
  });
  if (result.error !== undefined) {
    throw toTranslationError(result.error);
  }
  return result.value;
}

function toTranslationError(error: ValidationError): TranslationError {
  const [detail] = error.details;
  const field = detail.path.length > 0 ? detail.path.join('.') : 'body';
  const kind =
    detail.path[0] === 'tool_choice' && detail.type === 'any.only'
      ? 'unsupported_tool_choice'
      : 'invalid_input';
  return new TranslationError(kind, field, detail.message);
}

export function translateRequest(
  request: MessagesRequest,
  options: RequestTranslationOptions,
): ChatCompletionRequest {
  const translated: ChatCompletionRequest = {
    model: options.toBackend(request.model),
    messages: translateMessages(request, options),
    max_tokens: request.max_tokens,
  };

  if (request.temperature !== undefined) {
    translated.temperature = request.temperature;
  }
  if (request.top_p !== undefined) {
    translated.top_p = request.top_p;
  }
  if (request.stop_sequences && request.stop_sequences.length > 0) {
    translated.stop =
      request.stop_sequences.length === 1 ? request.stop_sequences[0] : request.stop_sequences;
  }
  if (request.stream) {
    translated.stream = true;
    translated.stream_options = { include_usage: true };
  }
  if (request.tools && request.tools.length > 0) {
    translated.tools = request.tools.map(translateTool);
  }
  if (request.tool_choice) {
    translated.tool_choice = translateToolChoice(request.tool_choice);
  }
  if (request.metadata?.user_id) {
    translated.user = request.metadata.user_id;
  }
  return translated;
}

export function requestHints(request: MessagesRequest): RequestHints {
  return {
    vision: request.messages.some(
      (message) =>
        message.role === 'user' &&
        typeof message.content !== 'string' &&
        message.content.some((block) => block.type === 'image'),
    ),
    agent: request.messages.some((message) => message.role === 'assistant'),
  };
}

export function wantsThinking(request: MessagesRequest): boolean {
  return request.thinking?.type === 'enabled';
}

function translateMessages(
  request: MessagesRequest,
  options: RequestTranslationOptions,
): ChatMessage[] {
  const messages: ChatMessage[] = [];

  let system = systemText(request.system);
  if (options.emulateThinking && wantsThinking(request)) {
    system = system ? `${system}${BLOCK_SEPARATOR}${THINKING_INSTRUCTION}` : THINKING_INSTRUCTION;
  }
  if (system) {
    messages.push({ role: 'system', content: system });
  }

  for (const message of request.messages) {
    messages.push(...translateMessage(message, options));
  }
  return messages;
}

function systemText(system: MessagesRequest['system']): string {
  if (system === undefined) {
    return '';
  }
  if (typeof system === 'string') {
    return system;
  }
  return system.map((block) => block.text).join(BLOCK_SEPARATOR);
}

function translateMessage(message: MessageParam, options: RequestTranslationOptions): ChatMessage[] {
  switch (message.role) {
    case 'user':
      return translateUserMessage(message.content);
    case 'assistant':
      return [translateAssistantMessage(message.content, options)];
  }
}

/**
 * Tool results first, one `tool` message each, then whatever else the turn
 * carried as a single user message.
 */
function translateUserMessage(content: string | UserContentBlock[]): ChatMessage[] {
  if (typeof content === 'string') {
    return [{ role: 'user', content }];
  }

  const messages: ChatMessage[] = [];
  const rest: Array<TextBlock | ImageBlock> = [];
  for (const block of content) {
    switch (block.type) {
      case 'tool_result':
        messages.push({
          role: 'tool',
          tool_call_id: block.tool_use_id,
          content: toolResultText(block),
        });
        break;
      case 'text':
      case 'image':
        rest.push(block);
        break;
    }
  }

  if (rest.length === 0) {
    return messages;
  }
  if (rest.every((block) => block.type === 'text')) {
    messages.push({
      role: 'user',
      content: rest.map((block) => (block.type === 'text' ? block.text : '')).join(BLOCK_SEPARATOR),
    });
  } else {
    messages.push({ role: 'user', content: rest.map(toContentPart) });
  }
  return messages;
}

function toContentPart(block: TextBlock | ImageBlock): ChatContentPart {
  switch (block.type) {
    case 'text':
      return { type: 'text', text: block.text };
    case 'image':
      return { type: 'image_url', image_url: { url: imageUrl(block.source) } };
  }
}

function imageUrl(source: ImageSource): string {
  switch (source.type) {
    case 'base64':
      return `data:${source.media_type};base64,${source.data}`;
    case 'url':
      return source.url;
  }
}

/**
 * The backend's tool role only takes text. Images inside a tool result are
 * replaced by a marker.
 */
function toolResultText(block: ToolResultBlock): string {
  const text =
    block.content === undefined
      ? ''
      : typeof block.content === 'string'
        ? block.content
        : block.content
            .map((part) => (part.type === 'text' ? part.text : '[image]'))
            .join(BLOCK_SEPARATOR);
  return block.is_error && text ? `Error: ${text}` : text;
}

function translateAssistantMessage(
  content: string | AssistantContentBlock[],
  options: RequestTranslationOptions,
): ChatMessage {
  if (typeof content === 'string') {
    return { role: 'assistant', content };
  }

  const text: string[] = [];
  const toolCalls: ChatToolCall[] = [];
  for (const block of content) {
    switch (block.type) {
      case 'text':
        if (block.text) {
          text.push(block.text);
        }
        break;
      case 'thinking':
        if (options.emulateThinking && block.thinking) {
          text.push(`${THINKING_OPEN_TAG}${block.thinking}${THINKING_CLOSE_TAG}`);
        }
        break;
      case 'tool_use':
        toolCalls.push({
          id: block.id,
          type: 'function',
          function: { name: block.name, arguments: JSON.stringify(block.input) },
        });
        break;
    }
  }

  const joined = text.join(BLOCK_SEPARATOR);
  if (toolCalls.length === 0) {
    return { role: 'assistant', content: joined };
  }
  return { role: 'assistant', content: joined || null, tool_calls: toolCalls };
}

/**
 * Only the fields the backend's function tool understands are carried over.
 */
function translateTool(tool: ToolDefinition): ChatTool {
  const fn: ChatTool['function'] = { name: tool.name, parameters: tool.input_schema };
  if (tool.description) {
    fn.description = tool.description;
  }
  return { type: 'function', function: fn };
}

function translateToolChoice(choice: ToolChoice): ChatToolChoice {
  switch (choice.type) {
    case 'auto':
      return 'auto';
    case 'any':
      return 'required';
    case 'none':
      return 'none';
    case 'tool':
      return { type: 'function', function: { name: choice.name } };
  }
}
