import { ConfigService } from '@nestjs/config';
import { UpstreamError } from '../../common/errors/proxy-errors';
import { CredentialService } from '../auth/credential.service';
import { Credential } from '../auth/interfaces/auth.interfaces';
import { ModelNameMapper } from '../naming/model-name.mapper';
import { UpstreamClient } from '../upstream/upstream-client.service';
import { ModelCatalogService, toMessagesModelList } from './model-catalog.service';

const credential: Credential = {
  value: 'short-lived',
  expiresAt: Date.now() + 3_600_000,
  refreshMargin: 60_000,
};

const backendList = {
  object: 'list' as const,
  data: [
    { id: 'gpt-4o', name: 'GPT-4o', created: 1_700_000_000 },
    { id: 'claude-sonnet-4.5', name: 'Claude Sonnet 4.5' },
    { id: 'claude-sonnet-4.5-20250115' },
    { id: 'claude-3.5-sonnet' },
  ],
};

function setup(settings: Record<string, unknown> = {}) {
  const config = new ConfigService({ MODELS_CACHE_TTL: 300, ...settings });
  const upstream = new UpstreamClient(config);
  const fetchModels = jest.spyOn(upstream, 'fetchModels').mockResolvedValue(backendList);
  const names = new ModelNameMapper({ autoRename: true, overrides: {} });
  const credentials = new CredentialService(upstream, config);
  const catalog = new ModelCatalogService(upstream, names, credentials, config);
  return { catalog, fetchModels, names, credentials };
}

describe('ModelCatalogService', () => {
  it('serves client ids, drops collapsed duplicates and learns the reverse names', async () => {
    const { catalog, fetchModels, names } = setup();

    const list = await catalog.getModels(credential);

    expect(fetchModels).toHaveBeenCalledWith('short-lived');
    expect(list.data.map((model) => model.id)).toEqual(['gpt-4o', 'claude-sonnet-4-5', 'claude-sonnet-3-5']);
    expect(list.data[1]).toEqual({ id: 'claude-sonnet-4-5', name: 'Claude Sonnet 4.5' });
    expect(names.toBackend('claude-sonnet-4-5')).toBe('claude-sonnet-4.5');
    expect(names.toBackend('claude-sonnet-3-5')).toBe('claude-3.5-sonnet');
  });

  it('fetches once within the TTL', async () => {
    const { catalog, fetchModels } = setup();

    await catalog.getModels(credential);
    await catalog.getModels(credential);

    expect(fetchModels).toHaveBeenCalledTimes(1);
    expect(catalog.fetchedAt).not.toBeNull();
  });

  it('fetches on every read when the TTL is 0', async () => {
    const { catalog, fetchModels } = setup({ MODELS_CACHE_TTL: 0 });

    await catalog.getModels(credential);
    await catalog.getModels(credential);

    expect(fetchModels).toHaveBeenCalledTimes(2);
    expect(catalog.fetchedAt).not.toBeNull();
  });

  it('shares one fetch between concurrent readers', async () => {
    const { catalog, fetchModels } = setup();

    await Promise.all([catalog.getModels(credential), catalog.getModels(credential)]);

    expect(fetchModels).toHaveBeenCalledTimes(1);
  });

  it('surfaces a failed fetch without caching it', async () => {
    const { catalog, fetchModels } = setup();
    fetchModels.mockRejectedValueOnce(new UpstreamError('down', 503));

    await expect(catalog.getModels(credential)).rejects.toThrow('down');
    expect(catalog.fetchedAt).toBeNull();
    await expect(catalog.getModels(credential)).resolves.toMatchObject({ object: 'list' });
    expect(fetchModels).toHaveBeenCalledTimes(2);
  });

  it('skips warm-up without an operator token', async () => {
    const { catalog, fetchModels } = setup();

    await catalog.onApplicationBootstrap();

    expect(fetchModels).not.toHaveBeenCalled();
  });

  it('keeps starting when warm-up fails', async () => {
    const { catalog, fetchModels, credentials } = setup({ GH_TOKEN: 'ghp_test' });
    jest.spyOn(credentials, 'current').mockReturnValue(credential);
    fetchModels.mockRejectedValueOnce(new UpstreamError('down', 503));

    await expect(catalog.onApplicationBootstrap()).resolves.toBeUndefined();
    expect(catalog.fetchedAt).toBeNull();
  });
});

describe('toMessagesModelList', () => {
  it('reshapes the catalog for Messages clients', () => {
    expect(
      toMessagesModelList({
        object: 'list',
        data: [{ id: 'gpt-4o', name: 'GPT-4o', created: 1_700_000_000 }, { id: 'claude-sonnet-4-5' }],
      }),
    ).toEqual({
      data: [
        { id: 'gpt-4o', type: 'model', display_name: 'GPT-4o', created_at: '2023-11-14T22:13:20.000Z' },
        {
          id: 'claude-sonnet-4-5',
          type: 'model',
          display_name: 'claude-sonnet-4-5',
          created_at: '1970-01-01T00:00:00.000Z',
        },
      ],
      has_more: false,
      first_id: 'gpt-4o',
      last_id: 'claude-sonnet-4-5',
    });
    expect(toMessagesModelList({ object: 'list', data: [] })).toEqual({
      data: [],
      has_more: false,
      first_id: null,
      last_id: null,
    });
  });
});
