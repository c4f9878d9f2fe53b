import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CredentialService } from '../auth/credential.service';
import { Credential } from '../auth/interfaces/auth.interfaces';
import { ModelNameMapper } from '../naming/model-name.mapper';
import { BackendModel, ModelsListResponse } from '../translate/interfaces/chat.interfaces';
import { MessagesModelList } from '../translate/interfaces/messages.interfaces';
import { UpstreamClient } from '../upstream/upstream-client.service';
import { TtlCache } from './ttl-cache';

const CATALOG_KEY = 'models';

/**
 * Backend model list under client-facing ids.
 */
@Injectable()
export class ModelCatalogService implements OnApplicationBootstrap {
  private readonly logger = new Logger(ModelCatalogService.name);
  private readonly cache: TtlCache<ModelsListResponse>;
  private loadedAt: number | null = null;

  constructor(
    private readonly upstream: UpstreamClient,
    private readonly names: ModelNameMapper,
    private readonly credentials: CredentialService,
    config: ConfigService,
  ) {
    this.cache = new TtlCache(config.get<number>('MODELS_CACHE_TTL', 300) * 1000);
  }

  async onApplicationBootstrap(): Promise<void> {
    if (!this.credentials.hasOperatorToken) {
      return;
    }
    try {
      const list = await this.getModels(this.credentials.current());
      this.logger.log(`Model catalog warmed with ${list.data.length} models`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Model catalog warm-up failed, continuing without cache: ${message}`);
    }
  }

  /**
   * Cached catalog, fetched on miss. Each entry's id is the client id; the
   * backend id is registered on the name mapper. Later entries that collapse
   * onto an id already listed are dropped.
   */
  getModels(credential: Credential): Promise<ModelsListResponse> {
    return this.cache.get(CATALOG_KEY, () => this.load(credential));
  }

  /** Time of the last successful fetch, cached or not. */
  get fetchedAt(): number | null {
    return this.loadedAt;
  }

  private async load(credential: Credential): Promise<ModelsListResponse> {
    const list = await this.upstream.fetchModels(credential.value);

    const pairs: Array<[string, string]> = [];
    const seen = new Set<string>();
    const data: BackendModel[] = [];
    for (const model of list.data) {
      const clientId = this.names.toClient(model.id);
      pairs.push([model.id, clientId]);
      if (seen.has(clientId)) {
        this.logger.debug(`Dropping ${model.id}: duplicate of ${clientId}`);
        continue;
      }
      seen.add(clientId);
      data.push({ ...model, id: clientId });
    }
    this.names.registerAll(pairs);
    this.loadedAt = Date.now();

    this.logger.debug(`Fetched ${list.data.length} backend models, serving ${data.length}`);
    return { ...list, object: 'list', data };
  }
}

/**
 * Catalog in the Messages protocol's model-list shape.
 */
export function toMessagesModelList(list: ModelsListResponse): MessagesModelList {
  const data = list.data.map((model) => ({
    id: model.id,
    type: 'model' as const,
    display_name: typeof model.name === 'string' && model.name ? model.name : model.id,
    created_at: new Date(typeof model.created === 'number' ? model.created * 1000 : 0).toISOString(),
  }));
  return {
    data,
    has_more: false,
    first_id: data.length > 0 ? data[0].id : null,
    last_id: data.length > 0 ? data[data.length - 1].id : null,
  };
}
