import { Test } from '@nestjs/testing';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { Readable } from 'stream';
import { AppModule } from '../src/app.module';
import { UpstreamError } from '../src/common/errors/proxy-errors';
import { ChatCallOptions, UpstreamClient } from '../src/modules/upstream/upstream-client.service';

function frame(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

/**
 * In-process stand-in for the chat backend and its token issuer.
 */
class FakeUpstream {
  exchangeToken = jest.fn(async (token: string) => {
    if (token !== 'ghp_test') {
      throw new UpstreamError('Bad credentials', 401);
    }
    return { token: 'short-lived', expiresAt: Date.now() + 3_600_000, refreshIn: 1_800 };
  });

  fetchModels = jest.fn(async () => ({
    object: 'list' as const,
    data: [{ id: 'claude-sonnet-4.5' }, { id: 'claude-sonnet-4.5-20250115' }, { id: 'gpt-4o', name: 'GPT-4o' }],
  }));

  chatCompletion = jest.fn(async (_credential: string, _body: object, _options?: ChatCallOptions): Promise<unknown> => ({
    id: 'chatcmpl-1',
    model: 'claude-sonnet-4.5-20250115',
    choices: [{ index: 0, message: { role: 'assistant', content: 'Hello there' }, finish_reason: 'stop' }],
    usage: { prompt_tokens: 10, completion_tokens: 2, total_tokens: 12 },
  }));

  chatCompletionStream = jest.fn(async (_credential: string, _body: object, _options?: ChatCallOptions) =>
    Readable.from([
      frame({
        id: 'chatcmpl-2',
        model: 'claude-sonnet-4.5',
        choices: [{ index: 0, delta: { content: 'Hi' }, finish_reason: null }],
      }),
      frame({
        id: 'chatcmpl-2',
        choices: [{ index: 0, delta: {}, finish_reason: 'stop' }],
        usage: { prompt_tokens: 4, completion_tokens: 1 },
      }),
      'data: [DONE]\n\n',
    ]),
  );
}

const auth = { 'x-api-key': 'ghp_test', 'x-request-id': 'test-req' };

const minimal = {
  model: 'claude-sonnet-4-5-20250115',
  max_tokens: 64,
  messages: [{ role: 'user', content: 'Hi' }],
};

describe('Messages bridge (e2e)', () => {
  let app: NestFastifyApplication;
  let upstream: FakeUpstream;

  beforeEach(async () => {
    upstream = new FakeUpstream();
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(UpstreamClient)
      .useValue(upstream)
      .compile();

    app = moduleRef.createNestApplication<NestFastifyApplication>(
      new FastifyAdapter({ requestIdHeader: 'x-request-id' }),
      { logger: false },
    );
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('POST /v1/messages', () => {
    it('returns the reply under the client model id', async () => {
      const response = await app.inject({ method: 'POST', url: '/v1/messages', headers: auth, payload: minimal });

      expect(response.statusCode).toBe(200);
      expect(response.headers['x-request-id']).toBe('test-req');
      expect(response.json()).toEqual({
        id: 'chatcmpl-1',
        type: 'message',
        role: 'assistant',
        model: 'claude-sonnet-4-5',
        content: [{ type: 'text', text: 'Hello there' }],
        stop_reason: 'end_turn',
        stop_sequence: null,
        usage: { input_tokens: 10, output_tokens: 2 },
      });

      expect(upstream.exchangeToken).toHaveBeenCalledWith('ghp_test');
      const [credential, body, options] = upstream.chatCompletion.mock.calls[0];
      expect(credential).toBe('short-lived');
      expect(body).toEqual({
        model: 'claude-sonnet-4.5',
        max_tokens: 64,
        messages: [{ role: 'user', content: 'Hi' }],
      });
      expect(options).toMatchObject({ vision: false, agent: false, requestId: 'test-req' });
    });

    it('loads the catalog to resolve an advertised model id', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/messages',
        headers: auth,
        payload: { ...minimal, model: 'claude-sonnet-4-5' },
      });

      expect(response.statusCode).toBe(200);
      expect(upstream.fetchModels).toHaveBeenCalledTimes(1);
      const [, body] = upstream.chatCompletion.mock.calls[0];
      expect(body).toMatchObject({ model: 'claude-sonnet-4.5' });
    });

    it('sends the model id as given when the catalog cannot be loaded', async () => {
      upstream.fetchModels.mockRejectedValueOnce(new UpstreamError('catalog down', 503));

      const response = await app.inject({
        method: 'POST',
        url: '/v1/messages',
        headers: auth,
        payload: { ...minimal, model: 'claude-sonnet-4-5' },
      });

      expect(response.statusCode).toBe(200);
      const [, body] = upstream.chatCompletion.mock.calls[0];
      expect(body).toMatchObject({ model: 'claude-sonnet-4-5' });
    });

    it('streams Messages events', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/messages',
        headers: auth,
        payload: { ...minimal, stream: true },
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toContain('text/event-stream');
      expect(response.body.match(/^event: .+$/gm)).toEqual([
        'event: message_start',
        'event: content_block_start',
        'event: content_block_delta',
        'event: content_block_stop',
        'event: message_delta',
        'event: message_stop',
      ]);
      expect(response.body).toContain(
        'data: {"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":"Hi"}}\n\n',
      );
    });

    it('rejects a request without an account token with 403', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/messages',
        headers: { 'x-request-id': 'test-req' },
        payload: minimal,
      });

      expect(response.statusCode).toBe(403);
      expect(response.json()).toEqual({
        type: 'error',
        error: { type: 'authentication_error', message: 'No account token supplied', code: 'missing_token' },
        request_id: 'test-req',
      });
      expect(upstream.chatCompletion).not.toHaveBeenCalled();
    });

    it('rejects a token the issuer refuses with 401', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/messages',
        headers: { authorization: 'Bearer ghp_bad' },
        payload: minimal,
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({
        type: 'error',
        error: { type: 'authentication_error', code: 'exchange_failed' },
      });
    });

    it('names the offending field of an invalid request', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/messages',
        headers: auth,
        payload: { model: 'm', messages: [] },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        type: 'error',
        error: { type: 'invalid_request_error', code: 'invalid_input', param: 'max_tokens' },
        request_id: 'test-req',
      });
    });

    it('passes a backend client error through', async () => {
      upstream.chatCompletion.mockRejectedValueOnce(
        new UpstreamError('model not supported', 400, 'invalid_request_error'),
      );

      const response = await app.inject({ method: 'POST', url: '/v1/messages', headers: auth, payload: minimal });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        type: 'error',
        error: { type: 'invalid_request_error', message: 'model not supported', code: 'upstream_error' },
        request_id: 'test-req',
      });
    });
  });

  describe('POST /v1/chat/completions', () => {
    it.each(['/v1/chat/completions', '/chat/completions'])('forwards %s with the backend model id', async (url) => {
      const response = await app.inject({
        method: 'POST',
        url,
        headers: auth,
        payload: { model: 'claude-sonnet-4-5', messages: [{ role: 'user', content: 'Hi' }], temperature: 0 },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ id: 'chatcmpl-1', model: 'claude-sonnet-4.5-20250115' });
      const [, body] = upstream.chatCompletion.mock.calls[0];
      expect(body).toEqual({
        model: 'claude-sonnet-4.5',
        messages: [{ role: 'user', content: 'Hi' }],
        temperature: 0,
      });
    });

    it('pipes a streamed reply through with status 200', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat/completions',
        headers: auth,
        payload: { model: 'claude-sonnet-4-5', messages: [{ role: 'user', content: 'Hi' }], stream: true },
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toContain('text/event-stream');
      expect(response.body.endsWith('data: [DONE]\n\n')).toBe(true);
      const [, body] = upstream.chatCompletionStream.mock.calls[0];
      expect(body).toMatchObject({ model: 'claude-sonnet-4.5', stream: true });
    });

    it('requires a model id', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat/completions',
        headers: auth,
        payload: { messages: [] },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: { code: 'invalid_input', param: 'model' } });
      expect(upstream.chatCompletion).not.toHaveBeenCalled();
    });
  });

  describe('GET /v1/models', () => {
    it('lists the catalog under client ids', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/models', headers: auth });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        object: 'list',
        data: [{ id: 'claude-sonnet-4-5' }, { id: 'gpt-4o', name: 'GPT-4o' }],
      });
    });

    it('uses the Messages list shape for Messages clients', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/v1/models',
        headers: { ...auth, 'anthropic-version': '2023-06-01' },
      });

      expect(response.json()).toEqual({
        data: [
          {
            id: 'claude-sonnet-4-5',
            type: 'model',
            display_name: 'claude-sonnet-4-5',
            created_at: '1970-01-01T00:00:00.000Z',
          },
          { id: 'gpt-4o', type: 'model', display_name: 'GPT-4o', created_at: '1970-01-01T00:00:00.000Z' },
        ],
        has_more: false,
        first_id: 'claude-sonnet-4-5',
        last_id: 'gpt-4o',
      });
    });
  });

  describe('health', () => {
    it.each(['/', '/health'])('reports status at %s without a token', async (url) => {
      const response = await app.inject({ method: 'GET', url });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        status: 'degraded',
        checks: { credential: { status: 'ok', mode: 'caller' }, catalog: { status: 'degraded' } },
      });
    });

    it('reports the catalog as ok once it has been fetched', async () => {
      await app.inject({ method: 'GET', url: '/v1/models', headers: auth });

      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.json()).toMatchObject({ status: 'ok', checks: { catalog: { status: 'ok' } } });
    });
  });

  it('renders unknown routes in the error shape', async () => {
    const response = await app.inject({ method: 'GET', url: '/nope', headers: { 'x-request-id': 'test-req' } });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      type: 'error',
      error: { type: 'not_found_error', message: 'Cannot GET /nope', code: 'not_found' },
      request_id: 'test-req',
    });
  });
});
