import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as Joi from 'joi';
import { Readable } from 'stream';
import { TranslationError } from '../../common/errors/proxy-errors';
import { Credential } from '../auth/interfaces/auth.interfaces';
import { ModelCatalogService } from '../catalog/model-catalog.service';
import { ModelNameMapper } from '../naming/model-name.mapper';
import { MessagesResponse } from '../translate/interfaces/messages.interfaces';
import { TranslationService } from '../translate/translation.service';
import { UpstreamClient } from '../upstream/upstream-client.service';
import { MessagesStream, wrapStream } from './stream/stream-wrapper';
import { StreamMetrics } from './stream/stream-metrics.interface';

export interface CallContext {
  requestId: string;
  /** Fires when the client disconnects. */
  signal: AbortSignal;
}

export type MessagesResult =
  | { stream: false; response: MessagesResponse }
  | { stream: true; events: MessagesStream };

export type PassthroughResult =
  | { stream: false; response: unknown }
  | { stream: true; body: Readable };

const passthroughSchema = Joi.object<{ model: string; stream?: boolean }>({
  model: Joi.string().required(),
  stream: Joi.boolean(),
}).unknown(true);

@Injectable()
export class MessagesService {
  private readonly logger = new Logger(MessagesService.name);
  private readonly maxStreamDurationMs: number;

  constructor(
    private readonly upstream: UpstreamClient,
    private readonly translation: TranslationService,
    private readonly names: ModelNameMapper,
    private readonly catalog: ModelCatalogService,
    config: ConfigService,
  ) {
    this.maxStreamDurationMs = config.get<number>('STREAM_MAX_DURATION_MS', 300000);
  }

  /**
   * Serve a Messages request against the chat backend.
   */
  async createMessage(body: unknown, credential: Credential, context: CallContext): Promise<MessagesResult> {
    const request = this.translation.parseRequest(body);
    await this.loadCatalog(credential, context.requestId);
    const backendRequest = this.translation.toBackendRequest(request);
    const hints = this.translation.hints(request);
    const options = { ...hints, requestId: context.requestId, signal: context.signal };

    this.logger.debug(
      `Request ${context.requestId}: ${request.model} → ${backendRequest.model}, ` +
        `${backendRequest.messages.length} messages, stream=${request.stream === true}`,
    );

    if (request.stream !== true) {
      const raw = await this.upstream.chatCompletion(credential.value, backendRequest, options);
      return { stream: false, response: this.translation.toClientResponse(raw, backendRequest.model) };
    }

    const upstream = await this.upstream.chatCompletionStream(credential.value, backendRequest, options);
    const events = wrapStream(upstream, context.requestId, this.translation.createStream(backendRequest.model), {
      maxDurationMs: this.maxStreamDurationMs,
      onMetrics: (metrics: StreamMetrics) => {
        if (metrics.status === 'COMPLETED' || metrics.status === 'CLIENT_ABORT') {
          this.logger.debug(
            `Stream ${metrics.status.toLowerCase()} for ${metrics.requestId}: ` +
              `chunks=${metrics.chunkCount}, events=${metrics.eventCount}, ttfb=${metrics.ttfbMs}`,
          );
        } else {
          this.logger.warn(
            `Stream error for ${metrics.requestId}: ${metrics.errorMessage}, status=${metrics.status}, ttfb=${metrics.ttfbMs}`,
          );
        }
      },
    });
    return { stream: true, events };
  }

  /**
   * Forward a chat-completions request unchanged apart from the model id.
   */
  async chatCompletions(body: unknown, credential: Credential, context: CallContext): Promise<PassthroughResult> {
    const result = passthroughSchema.validate(body, { errors: { label: false } });
    if (result.error !== undefined) {
      const [detail] = result.error.details;
      throw new TranslationError('invalid_input', detail.path.join('.') || 'body', detail.message);
    }
    await this.loadCatalog(credential, context.requestId);
    const request = { ...result.value, model: this.names.toBackend(result.value.model) };
    const options = { requestId: context.requestId, signal: context.signal };

    if (request.stream === true) {
      return { stream: true, body: await this.upstream.chatCompletionStream(credential.value, request, options) };
    }
    return { stream: false, response: await this.upstream.chatCompletion(credential.value, request, options) };
  }

  /**
   * Reverse model lookup needs the learned catalog pairs. Cached and
   * single-flight; without a catalog the name mapper uses its pattern rules.
   */
  private async loadCatalog(credential: Credential, requestId: string): Promise<void> {
    try {
      await this.catalog.getModels(credential);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Model catalog unavailable for ${requestId}, resolving model ids by pattern only: ${message}`);
    }
  }
}
