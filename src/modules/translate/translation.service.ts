import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ModelNameMapper } from '../naming/model-name.mapper';
import { MessagesRequest, MessagesResponse } from './interfaces/messages.interfaces';
import { ChatCompletionRequest } from './interfaces/chat.interfaces';
import {
  RequestHints,
  parseMessagesRequest,
  requestHints,
  translateRequest,
} from './request.translator';
import { parseChatResponse, translateResponse } from './response.translator';
import { StreamTranslator } from './stream.translator';

/**
 * Binds the translators to the configured name mapper and thinking emulation
 * setting.
 */
@Injectable()
export class TranslationService {
  private readonly emulateThinking: boolean;

  constructor(
    private readonly names: ModelNameMapper,
    config: ConfigService,
  ) {
    this.emulateThinking = config.get<boolean>('EMULATE_THINKING', true);
  }

  parseRequest(body: unknown): MessagesRequest {
    return parseMessagesRequest(body);
  }

  toBackendRequest(request: MessagesRequest): ChatCompletionRequest {
    return translateRequest(request, {
      toBackend: (id) => this.names.toBackend(id),
      emulateThinking: this.emulateThinking,
    });
  }

  hints(request: MessagesRequest): RequestHints {
    return requestHints(request);
  }

  /**
   * @param requestedModel backend model id the request was sent with
   */
  toClientResponse(raw: unknown, requestedModel: string): MessagesResponse {
    return translateResponse(parseChatResponse(raw), {
      toClient: (id) => this.names.toClient(id),
      emulateThinking: this.emulateThinking,
      requestedModel,
    });
  }

  createStream(requestedModel: string): StreamTranslator {
    return new StreamTranslator({
      toClient: (id) => this.names.toClient(id),
      emulateThinking: this.emulateThinking,
      requestedModel,
    });
  }
}
