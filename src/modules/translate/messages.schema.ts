import * as Joi from 'joi';
import { MessagesRequest } from './interfaces/messages.interfaces';

const USER_BLOCK_TYPES = ['text', 'image', 'tool_result'];
const ASSISTANT_BLOCK_TYPES = ['text', 'tool_use', 'thinking'];

const textBlock = Joi.object({
  type: Joi.string().valid('text').required(),
  text: Joi.string().allow('').required(),
}).unknown(true);

const imageSource = Joi.object({
  type: Joi.string().valid('base64', 'url').required(),
  media_type: Joi.when('type', { is: 'base64', then: Joi.string().required() }),
  data: Joi.when('type', { is: 'base64', then: Joi.string().required() }),
  url: Joi.when('type', { is: 'url', then: Joi.string().required() }),
}).unknown(true);

const imageBlock = Joi.object({
  type: Joi.string().valid('image').required(),
  source: imageSource.required(),
}).unknown(true);

const toolResultContent = Joi.alternatives().conditional(Joi.string(), {
  then: Joi.string().allow(''),
  otherwise: Joi.array().items(
    Joi.object({
      type: Joi.string().valid('text', 'image').required(),
      text: Joi.when('type', { is: 'text', then: Joi.string().allow('').required() }),
      source: Joi.when('type', { is: 'image', then: imageSource.required() }),
    }).unknown(true),
  ),
});

const userBlock = Joi.object({
  type: Joi.string()
    .valid(...USER_BLOCK_TYPES)
    .required(),
  text: Joi.when('type', { is: 'text', then: Joi.string().allow('').required() }),
  source: Joi.when('type', { is: 'image', then: imageSource.required() }),
  tool_use_id: Joi.when('type', { is: 'tool_result', then: Joi.string().required() }),
  content: Joi.when('type', { is: 'tool_result', then: toolResultContent }),
  is_error: Joi.boolean(),
}).unknown(true);

const assistantBlock = Joi.object({
  type: Joi.string()
    .valid(...ASSISTANT_BLOCK_TYPES)
    .required(),
  text: Joi.when('type', { is: 'text', then: Joi.string().allow('').required() }),
  id: Joi.when('type', { is: 'tool_use', then: Joi.string().required() }),
  name: Joi.when('type', { is: 'tool_use', then: Joi.string().required() }),
  input: Joi.when('type', { is: 'tool_use', then: Joi.object().unknown(true).required() }),
  thinking: Joi.when('type', { is: 'thinking', then: Joi.string().allow('').required() }),
  signature: Joi.string().allow(''),
}).unknown(true);

const contentOf = (block: Joi.ObjectSchema) =>
  Joi.alternatives().conditional(Joi.string(), {
    then: Joi.string().allow(''),
    otherwise: Joi.array().items(block),
  });

const message = Joi.object({
  role: Joi.string().valid('user', 'assistant').required(),
  content: Joi.when('role', {
    is: 'user',
    then: contentOf(userBlock),
    otherwise: contentOf(assistantBlock),
  }).required(),
}).unknown(true);

const tool = Joi.object({
  name: Joi.string().required(),
  description: Joi.string().allow(''),
  input_schema: Joi.object().unknown(true).required(),
}).unknown(true);

const toolChoice = Joi.object({
  type: Joi.string().valid('auto', 'any', 'tool', 'none').required(),
  name: Joi.when('type', { is: 'tool', then: Joi.string().required() }),
}).unknown(true);

/**
 * Structural schema of a Messages request. Unknown fields are accepted and
 * ignored; anything the translation reads is checked here so the translator
 * can rely on the declared types.
 */
export const messagesRequestSchema = Joi.object<MessagesRequest>({
  model: Joi.string().required(),
  messages: Joi.array().items(message).required(),
  max_tokens: Joi.number().integer().min(1).required(),
  system: Joi.alternatives().conditional(Joi.string(), {
    then: Joi.string().allow(''),
    otherwise: Joi.array().items(textBlock),
  }),
  temperature: Joi.number(),
  top_p: Joi.number(),
  stop_sequences: Joi.array().items(Joi.string()),
  stream: Joi.boolean(),
  tools: Joi.array().items(tool),
  tool_choice: toolChoice,
  metadata: Joi.object({ user_id: Joi.string() }).unknown(true),
  thinking: Joi.object({
    type: Joi.string().valid('enabled', 'disabled').required(),
    budget_tokens: Joi.number().integer(),
  }).unknown(true),
}).unknown(true);
