/**
 * OpenAI-compatible chat completion request
 */
export type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string; detail?: 'auto' | 'low' | 'high' } };

export interface ChatToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string | ChatContentPart[] }
  | { role: 'assistant'; content: string | null; tool_calls?: ChatToolCall[] }
  | { role: 'tool'; content: string; tool_call_id: string };

export interface ChatTool {
  type: 'function';
  function: {
    name: string;
    description?: string;
    parameters: Record<string, unknown>;
  };
}

export type ChatToolChoice =
  | 'auto'
  | 'required'
  | 'none'
  | { type: 'function'; function: { name: string } };

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens?: number;
  temperature?: number;
  top_p?: number;
  stop?: string | string[];
  stream?: boolean;
  stream_options?: { include_usage: boolean };
  tools?: ChatTool[];
  tool_choice?: ChatToolChoice;
  user?: string;
}

export interface ChatUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens?: number;
  prompt_tokens_details?: {
    cached_tokens?: number | null;
  } | null;
}

/**
 * OpenAI-compatible chat completion response
 */
export interface ChatCompletionResponse {
  id: string;
  model: string;
  choices: Array<{
    index: number;
    message: {
      role: string;
      content: string | null;
      tool_calls?: ChatToolCall[] | null;
    };
    finish_reason: string | null;
  }>;
  usage?: ChatUsage | null;
}

/**
 * Tool call fragment inside a streaming delta. Only the first fragment of a
 * slot carries `id` and `function.name`.
 */
export interface ChunkToolCall {
  index: number;
  id?: string | null;
  function?: {
    name?: string | null;
    arguments?: string | null;
  };
}

/**
 * OpenAI streaming chunk
 */
export interface ChatCompletionChunk {
  id: string;
  model: string;
  choices: Array<{
    index: number;
    delta: {
      role?: string | null;
      content?: string | null;
      tool_calls?: ChunkToolCall[] | null;
    };
    finish_reason: string | null;
  }>;
  usage?: ChatUsage | null;
}

/**
 * Model entry as listed by the backend. Extra fields are passed through.
 */
export interface BackendModel {
  id: string;
  object?: string;
  name?: string;
  vendor?: string;
  version?: string;
  created?: number;
  [key: string]: unknown;
}

export interface ModelsListResponse {
  object: 'list';
  data: BackendModel[];
}
