import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuthError } from '../../common/errors/proxy-errors';
import { SingleFlight } from '../../common/utils/single-flight';
import { UpstreamClient } from '../upstream/upstream-client.service';
import { Credential } from './interfaces/auth.interfaces';

const BACKOFF_BASE_MS = 1_000;
const BACKOFF_CAP_MS = 30_000;
const EVICTION_INTERVAL_MS = 60_000;

/** Log-safe form of an account token. */
function redact(token: string): string {
  return `${token.substring(0, 8)}…`;
}

/**
 * Owns short-lived backend credentials.
 *
 * With an operator token configured, one credential is acquired at startup and
 * refreshed in the background `refreshMargin` before it expires. Failed
 * refreshes retry with exponential backoff while the old credential keeps being
 * served until its own expiry.
 *
 * Without one, each caller's account token is exchanged on first use and cached
 * until it nears expiry.
 */
@Injectable()
export class CredentialService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CredentialService.name);
  private readonly operatorToken: string | undefined;
  private readonly refreshMarginMs: number;

  private operatorCredential: Credential | null = null;
  private refreshTimer: NodeJS.Timeout | null = null;
  private evictionTimer: NodeJS.Timeout | null = null;
  private failedRefreshes = 0;
  private stopped = false;

  private readonly callerCredentials = new Map<string, Credential>();
  private readonly exchanges = new SingleFlight<Credential>();

  constructor(
    private readonly upstream: UpstreamClient,
    config: ConfigService,
  ) {
    this.operatorToken = config.get<string>('GH_TOKEN') || undefined;
    this.refreshMarginMs = config.get<number>('TOKEN_REFRESH_MARGIN_SECS', 60) * 1000;
  }

  get hasOperatorToken(): boolean {
    return this.operatorToken !== undefined;
  }

  async onModuleInit(): Promise<void> {
    this.stopped = false;
    if (this.operatorToken) {
      this.operatorCredential = await this.acquire(this.operatorToken);
      this.logger.log(
        `Backend credential acquired, expires at ${new Date(this.operatorCredential.expiresAt).toISOString()}`,
      );
      this.scheduleRefresh(this.refreshDelay(this.operatorCredential));
    } else {
      this.logger.log('No operator token configured; callers must supply their own');
      this.evictionTimer = setInterval(() => this.evictExpired(), EVICTION_INTERVAL_MS);
      this.evictionTimer.unref();
    }
  }

  onModuleDestroy(): void {
    this.stopped = true;
    if (this.refreshTimer) {
      clearTimeout(this.refreshTimer);
      this.refreshTimer = null;
    }
    if (this.evictionTimer) {
      clearInterval(this.evictionTimer);
      this.evictionTimer = null;
    }
  }

  /**
   * Exchange a long-lived token (the operator's by default) for a credential.
   */
  async acquire(longLivedToken: string | undefined = this.operatorToken): Promise<Credential> {
    if (!longLivedToken) {
      throw new AuthError('missing_token', 'No account token configured or supplied');
    }
    try {
      const exchanged = await this.upstream.exchangeToken(longLivedToken);
      return {
        value: exchanged.token,
        expiresAt: exchanged.expiresAt,
        refreshMargin: this.refreshMarginMs,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Token exchange failed for ${redact(longLivedToken)}: ${message}`);
      throw new AuthError('exchange_failed', `Token exchange failed: ${message}`);
    }
  }

  /**
   * Latest operator credential.
   */
  current(): Credential {
    const credential = this.operatorCredential;
    if (!credential) {
      throw new AuthError('missing_token', 'No backend credential has been acquired');
    }
    if (Date.now() >= credential.expiresAt) {
      throw new AuthError('expired', 'Backend credential expired and could not be refreshed');
    }
    return credential;
  }

  /**
   * Credential for a request. The operator token takes precedence over
   * whatever the caller sent.
   */
  async resolve(callerToken?: string): Promise<Credential> {
    if (this.operatorToken) {
      return this.current();
    }
    if (!callerToken) {
      throw new AuthError('missing_token', 'No account token supplied');
    }

    const cached = this.callerCredentials.get(callerToken);
    if (cached && Date.now() < cached.expiresAt - cached.refreshMargin) {
      return cached;
    }

    return this.exchanges.run(callerToken, async () => {
      try {
        const credential = await this.acquire(callerToken);
        this.callerCredentials.set(callerToken, credential);
        return credential;
      } catch (error) {
        if (cached && Date.now() < cached.expiresAt) {
          this.logger.warn(`Serving cached credential for ${redact(callerToken)} after failed re-exchange`);
          return cached;
        }
        throw error;
      }
    });
  }

  /** Number of caller credentials held. */
  get cachedCallers(): number {
    return this.callerCredentials.size;
  }

  evictExpired(): void {
    const now = Date.now();
    for (const [token, credential] of this.callerCredentials) {
      if (now >= credential.expiresAt) {
        this.callerCredentials.delete(token);
      }
    }
  }

  private refreshDelay(credential: Credential): number {
    return Math.max(0, credential.expiresAt - credential.refreshMargin - Date.now());
  }

  private scheduleRefresh(delayMs: number): void {
    if (this.stopped) {
      return;
    }
    if (this.refreshTimer) {
      clearTimeout(this.refreshTimer);
    }
    this.refreshTimer = setTimeout(() => {
      this.refresh().catch((error: unknown) => {
        this.logger.error(`Credential refresh loop failed: ${String(error)}`);
      });
    }, delayMs);
    this.refreshTimer.unref();
  }

  private async refresh(): Promise<void> {
    this.refreshTimer = null;
    try {
      const next = await this.acquire();
      if (this.stopped) {
        return;
      }
      this.operatorCredential = next;
      this.failedRefreshes = 0;
      this.logger.log(`Backend credential refreshed, expires at ${new Date(next.expiresAt).toISOString()}`);
      this.scheduleRefresh(this.refreshDelay(next));
    } catch (error) {
      this.failedRefreshes++;
      let delay = Math.min(BACKOFF_BASE_MS * 2 ** (this.failedRefreshes - 1), BACKOFF_CAP_MS);
      const untilExpiry = (this.operatorCredential?.expiresAt ?? 0) - Date.now();
      if (untilExpiry > 0) {
        delay = Math.min(delay, untilExpiry);
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Credential refresh failed (attempt ${this.failedRefreshes}), retrying in ${delay}ms: ${message}`);
      this.scheduleRefresh(delay);
    }
  }
}
