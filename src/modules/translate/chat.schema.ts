import * as Joi from 'joi';
import {
  ChatCompletionChunk,
  ChatCompletionResponse,
  ModelsListResponse,
} from './interfaces/chat.interfaces';

const usage = Joi.object({
  prompt_tokens: Joi.number().min(0).default(0),
  completion_tokens: Joi.number().min(0).default(0),
  total_tokens: Joi.number(),
  prompt_tokens_details: Joi.object({
    cached_tokens: Joi.number().min(0).allow(null),
  })
    .unknown(true)
    .allow(null),
}).unknown(true);

const toolCall = Joi.object({
  id: Joi.string().required(),
  type: Joi.string().default('function'),
  function: Joi.object({
    name: Joi.string().required(),
    arguments: Joi.string().allow('').default(''),
  })
    .unknown(true)
    .required(),
}).unknown(true);

/**
 * Non-streaming backend reply. Nulls the backend uses for "absent" are
 * normalized away.
 */
export const chatCompletionResponseSchema = Joi.object<ChatCompletionResponse>({
  id: Joi.string().allow('').default(''),
  model: Joi.string().allow('').default(''),
  choices: Joi.array()
    .items(
      Joi.object({
        index: Joi.number().default(0),
        message: Joi.object({
          role: Joi.string().default('assistant'),
          content: Joi.string().allow('', null).default(null),
          tool_calls: Joi.array().items(toolCall).allow(null),
        })
          .unknown(true)
          .required(),
        finish_reason: Joi.string().allow(null).default(null),
      }).unknown(true),
    )
    .required(),
  usage: usage.allow(null),
}).unknown(true);

const chunkToolCall = Joi.object({
  index: Joi.number().integer().min(0).default(0),
  id: Joi.string().allow(null),
  function: Joi.object({
    name: Joi.string().allow(null),
    arguments: Joi.string().allow('', null),
  }).unknown(true),
}).unknown(true);

/**
 * One streamed backend chunk.
 */
export const chatCompletionChunkSchema = Joi.object<ChatCompletionChunk>({
  id: Joi.string().allow('').default(''),
  model: Joi.string().allow('').default(''),
  choices: Joi.array()
    .items(
      Joi.object({
        index: Joi.number().default(0),
        delta: Joi.object({
          role: Joi.string().allow(null),
          content: Joi.string().allow('', null),
          tool_calls: Joi.array().items(chunkToolCall).allow(null),
        })
          .unknown(true)
          .default({}),
        finish_reason: Joi.string().allow(null).default(null),
      }).unknown(true),
    )
    .default([]),
  usage: usage.allow(null),
}).unknown(true);

export const modelsListSchema = Joi.object<ModelsListResponse>({
  object: Joi.string().default('list'),
  data: Joi.array()
    .items(Joi.object({ id: Joi.string().required() }).unknown(true))
    .required(),
}).unknown(true);
