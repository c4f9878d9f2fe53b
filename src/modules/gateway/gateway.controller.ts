import {
  Controller,
  Post,
  Get,
  Body,
  Headers,
  Req,
  Res,
  UseGuards,
} from '@nestjs/common';
import { FastifyRequest, FastifyReply } from 'fastify';
import { BackendCredential } from '../../common/decorators/auth-context.decorator';
import { AuthGuard } from '../auth/guards/auth.guard';
import { Credential } from '../auth/interfaces/auth.interfaces';
import { ModelCatalogService, toMessagesModelList } from '../catalog/model-catalog.service';
import { ModelsListResponse } from '../translate/interfaces/chat.interfaces';
import { MessagesModelList } from '../translate/interfaces/messages.interfaces';
import { CallContext, MessagesService } from './messages.service';

/**
 * Messages protocol, chat-completions pass-through and model catalog.
 */
@Controller()
@UseGuards(AuthGuard)
export class GatewayController {
  constructor(
    private readonly messagesService: MessagesService,
    private readonly catalog: ModelCatalogService,
  ) { }

  /**
   * POST /v1/messages
   */
  @Post('v1/messages')
  async createMessage(
    @Body() body: unknown,
    @BackendCredential() credential: Credential,
    @Req() request: FastifyRequest,
    @Res() reply: FastifyReply,
  ): Promise<void> {
    const context = this.callContext(request, reply);
    const result = await this.messagesService.createMessage(body, credential, context);

    if (!result.stream) {
      await reply.status(200).send(result.response);
      return;
    }

    const { events } = result;
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) {
        events.handleClientAbort();
      }
    });
    this.sseHeaders(reply);
    await reply.status(200).send(events);
  }

  /**
   * POST /v1/chat/completions, POST /chat/completions
   */
  @Post(['v1/chat/completions', 'chat/completions'])
  async chatCompletions(
    @Body() body: unknown,
    @BackendCredential() credential: Credential,
    @Req() request: FastifyRequest,
    @Res() reply: FastifyReply,
  ): Promise<void> {
    const result = await this.messagesService.chatCompletions(body, credential, this.callContext(request, reply));

    if (!result.stream) {
      await reply.status(200).send(result.response);
      return;
    }
    this.sseHeaders(reply);
    await reply.status(200).send(result.body);
  }

  /**
   * GET /v1/models, GET /models
   * Messages clients (identified by `anthropic-version`) get the Messages list shape.
   */
  @Get(['v1/models', 'models'])
  async listModels(
    @BackendCredential() credential: Credential,
    @Headers('anthropic-version') anthropicVersion?: string,
  ): Promise<ModelsListResponse | MessagesModelList> {
    const list = await this.catalog.getModels(credential);
    return anthropicVersion ? toMessagesModelList(list) : list;
  }

  private callContext(request: FastifyRequest, reply: FastifyReply): CallContext {
    const requestId = request.id;
    reply.header('x-request-id', requestId);

    // Client disconnect cancels the backend call
    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) {
        controller.abort();
      }
    });
    return { requestId, signal: controller.signal };
  }

  private sseHeaders(reply: FastifyReply): void {
    reply.header('Content-Type', 'text/event-stream');
    reply.header('Cache-Control', 'no-cache');
    reply.header('Connection', 'keep-alive');
  }
}
