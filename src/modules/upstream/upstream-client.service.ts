import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as Joi from 'joi';
import { Readable } from 'stream';
import { UpstreamError } from '../../common/errors/proxy-errors';
import { ModelsListResponse } from '../translate/interfaces/chat.interfaces';
import { modelsListSchema } from '../translate/chat.schema';
import {
  TOKEN_EXCHANGE_URL,
  backendBaseUrl,
  backendHeaders,
  exchangeHeaders,
} from './upstream.constants';

/**
 * Result of a credential exchange.
 */
export interface TokenExchange {
  token: string;
  /** Epoch milliseconds. */
  expiresAt: number;
  /** Seconds after which the issuer suggests refreshing. */
  refreshIn: number;
}

export interface ChatCallOptions {
  vision?: boolean;
  agent?: boolean;
  requestId?: string;
  /** Aborts the backend call, e.g. when the client disconnects. */
  signal?: AbortSignal;
}

const tokenExchangeSchema = Joi.object<{ token: string; expires_at: number; refresh_in: number }>({
  token: Joi.string().required(),
  expires_at: Joi.number().required(),
  refresh_in: Joi.number().default(0),
}).unknown(true);

/**
 * Transport to the chat backend and its token issuer.
 */
@Injectable()
export class UpstreamClient {
  private readonly logger = new Logger(UpstreamClient.name);
  private readonly baseUrl: string;
  private readonly editorVersion: string;
  private readonly readTimeoutMs: number;

  constructor(config: ConfigService) {
    this.baseUrl = backendBaseUrl(config.get<string>('ACCOUNT_TYPE', 'individual'));
    this.editorVersion = config.get<string>('VSCODE_VERSION', '1.100.0');
    this.readTimeoutMs = config.get<number>('UPSTREAM_READ_TIMEOUT_MS', 120000);
  }

  /**
   * Exchange a long-lived account token for a short-lived backend credential.
   */
  async exchangeToken(longLivedToken: string): Promise<TokenExchange> {
    this.logger.debug('Exchanging account token for a backend credential');
    const response = await this.send(
      TOKEN_EXCHANGE_URL,
      { method: 'GET', headers: exchangeHeaders(longLivedToken, this.editorVersion) },
      this.readTimeoutMs,
    );
    const result = tokenExchangeSchema.validate(await this.readJson(response));
    if (result.error !== undefined) {
      throw new UpstreamError(`Malformed token exchange response: ${result.error.message}`);
    }
    return {
      token: result.value.token,
      expiresAt: result.value.expires_at * 1000,
      refreshIn: result.value.refresh_in,
    };
  }

  async fetchModels(credential: string): Promise<ModelsListResponse> {
    const response = await this.send(
      `${this.baseUrl}/models`,
      { method: 'GET', headers: backendHeaders(credential, { editorVersion: this.editorVersion }) },
      this.readTimeoutMs,
    );
    const result = modelsListSchema.validate(await this.readJson(response));
    if (result.error !== undefined) {
      throw new UpstreamError(`Malformed models response: ${result.error.message}`);
    }
    return result.value;
  }

  /**
   * Non-streaming chat completion. Returns the decoded JSON body unchecked.
   */
  async chatCompletion(credential: string, body: object, options: ChatCallOptions = {}): Promise<unknown> {
    const response = await this.send(
      `${this.baseUrl}/chat/completions`,
      { method: 'POST', headers: this.chatHeaders(credential, options), body: JSON.stringify(body) },
      this.readTimeoutMs,
      options.signal,
    );
    return this.readJson(response);
  }

  /**
   * Streaming chat completion. Resolves once the backend accepted the request;
   * the returned stream yields raw SSE bytes. Aborting `options.signal` or
   * destroying the stream cancels the backend request.
   */
  async chatCompletionStream(
    credential: string,
    body: object,
    options: ChatCallOptions = {},
  ): Promise<Readable> {
    const response = await this.send(
      `${this.baseUrl}/chat/completions`,
      {
        method: 'POST',
        headers: { ...this.chatHeaders(credential, options), accept: 'text/event-stream' },
        body: JSON.stringify(body),
      },
      0,
      options.signal,
    );

    if (!response.body) {
      throw new UpstreamError('No response body from upstream');
    }

    // Convert web stream to Node readable
    const reader = response.body.getReader();
    return new Readable({
      async read() {
        try {
          const { done, value } = await reader.read();
          if (done) {
            this.push(null);
          } else {
            this.push(Buffer.from(value));
          }
        } catch (error) {
          this.destroy(error instanceof Error ? error : new Error(String(error)));
        }
      },
      destroy(err, callback) {
        reader.cancel().then(
          () => callback(err),
          () => callback(err),
        );
      },
    });
  }

  private chatHeaders(credential: string, options: ChatCallOptions): Record<string, string> {
    return backendHeaders(credential, {
      editorVersion: this.editorVersion,
      vision: options.vision,
      agent: options.agent,
      requestId: options.requestId,
    });
  }

  /**
   * `fetch` with a response timeout (0 = none) and an optional caller signal.
   * Non-2xx statuses become {@link UpstreamError}s carrying the backend status.
   */
  private async send(
    url: string,
    init: { method: string; headers: Record<string, string>; body?: string },
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<Response> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, timeoutMs)
        : undefined;
    const onAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      if (!response.ok) {
        const errorBody = await response.text();
        this.logger.warn(`Upstream ${init.method} ${url} returned ${response.status}`);
        throw this.parseUpstreamError(errorBody, response.status);
      }
      return response;
    } catch (error) {
      if (error instanceof UpstreamError) {
        throw error;
      }
      if (timedOut) {
        throw new UpstreamError(
          `Upstream did not respond within ${timeoutMs}ms`,
          HttpStatus.GATEWAY_TIMEOUT,
          'api_error',
          'upstream_timeout',
        );
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamError(`Upstream request failed: ${message}`);
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async readJson(response: Response): Promise<unknown> {
    const text = await response.text();
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new UpstreamError(`Upstream returned non-JSON body: ${text.substring(0, 200)}`);
    }
  }

  /**
   * Parse upstream error response
   */
  private parseUpstreamError(body: string, statusCode: number): UpstreamError {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      parsed = undefined;
    }

    const error = typeof parsed === 'object' && parsed !== null && 'error' in parsed ? parsed.error : undefined;
    if (typeof error === 'object' && error !== null) {
      const field = (name: string): string | undefined =>
        name in error && typeof Reflect.get(error, name) === 'string' ? String(Reflect.get(error, name)) : undefined;
      return new UpstreamError(
        field('message') ?? 'Upstream error',
        statusCode,
        field('type') ?? 'api_error',
        field('code') ?? 'upstream_error',
      );
    }
    return new UpstreamError(`Upstream error (${statusCode}): ${body.substring(0, 200)}`, statusCode);
  }
}
