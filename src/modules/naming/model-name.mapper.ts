import { Inject, Injectable, Logger } from '@nestjs/common';

export const MODEL_NAMING_OPTIONS = 'MODEL_NAMING_OPTIONS';

export interface ModelNamingOptions {
  /** Date stripping and pattern rules. Overrides apply either way. */
  autoRename: boolean;
  /** Explicit `backend id → client id` pairs, highest precedence. */
  overrides: Record<string, string>;
}

const DATE_SUFFIX = /-(?:\d{8}|\d{4}-\d{2}-\d{2})$/;

/**
 * Strip a trailing date token: `claude-sonnet-4-20250514` → `claude-sonnet-4`,
 * `gpt-4o-2024-08-06` → `gpt-4o`.
 */
export function stripDateSuffix(id: string): string {
  return id.replace(DATE_SUFFIX, '');
}

/**
 * Dots between two digits become dashes: `4.6` → `4-6`. Other dots stay.
 */
export function replaceVersionDots(value: string): string {
  return value.replace(/(?<=\d)\.(?=\d)/g, '-');
}

const startsWithDigit = (segment: string): boolean => /^\d/.test(segment);

/**
 * Pattern rule for `claude-*` ids. Returns null when the id needs no change.
 *
 * - version first: `claude-3.5-sonnet` → `claude-sonnet-3-5`
 * - variant first: `claude-opus-4.6-fast` → `claude-opus-4-6-fast`
 */
export function autoRename(id: string): string | null {
  if (!id.startsWith('claude-')) {
    return null;
  }
  const rest = id.slice('claude-'.length);
  const segments = rest.split('-');

  if (startsWithDigit(segments[0])) {
    let versionEnd = 0;
    while (versionEnd < segments.length && startsWithDigit(segments[versionEnd])) {
      versionEnd++;
    }
    if (versionEnd === segments.length) {
      return null;
    }
    const version = replaceVersionDots(segments.slice(0, versionEnd).join('-'));
    const variant = segments.slice(versionEnd).join('-');
    return `claude-${variant}-${version}`;
  }

  const normalized = replaceVersionDots(rest);
  return normalized === rest ? null : `claude-${normalized}`;
}

/**
 * Translates backend model ids to client-facing ids and back.
 *
 * Forward: override → date strip → override → pattern rule → pass through.
 * Reverse: override → known backend id → date strip → override → learned
 * pair → pass through. Learned pairs come from {@link registerAll}, called with
 * every catalog entry. When several backend ids collapse onto one client id,
 * the canonical backend id is the one equal to the client id if present,
 * otherwise the first registered.
 */
@Injectable()
export class ModelNameMapper {
  private readonly logger = new Logger(ModelNameMapper.name);
  private readonly reverseOverrides = new Map<string, string>();
  private readonly forwardOverrides = new Map<string, string>();
  private learned = new Map<string, string>();
  private knownBackendIds = new Set<string>();

  constructor(@Inject(MODEL_NAMING_OPTIONS) private readonly options: ModelNamingOptions) {
    for (const [backendId, clientId] of Object.entries(options.overrides)) {
      this.forwardOverrides.set(backendId, clientId);
      this.reverseOverrides.set(clientId, backendId);
    }
    if (options.autoRename || this.forwardOverrides.size > 0) {
      this.logger.log(
        `Model renaming active (auto=${options.autoRename}, overrides=${this.forwardOverrides.size})`,
      );
    }
  }

  toClient(backendId: string): string {
    const direct = this.forwardOverrides.get(backendId);
    if (direct !== undefined) {
      return direct;
    }
    if (!this.options.autoRename) {
      return backendId;
    }

    const stripped = stripDateSuffix(backendId);
    const override = this.forwardOverrides.get(stripped);
    if (override !== undefined) {
      return override;
    }
    return autoRename(stripped) ?? stripped;
  }

  toBackend(clientId: string): string {
    const direct = this.reverseOverrides.get(clientId);
    if (direct !== undefined) {
      return direct;
    }
    if (this.knownBackendIds.has(clientId)) {
      return clientId;
    }
    if (!this.options.autoRename) {
      return clientId;
    }

    const stripped = stripDateSuffix(clientId);
    return this.reverseOverrides.get(stripped) ?? this.learned.get(stripped) ?? stripped;
  }

  /**
   * Replace every learned pair at once after a catalog refresh. The maps are
   * built aside and swapped in, so lookups never see a half-built table.
   */
  registerAll(pairs: Array<[backendId: string, clientId: string]>): void {
    const learned = new Map<string, string>();
    const known = new Set<string>();
    for (const [backendId, clientId] of pairs) {
      ModelNameMapper.learn(learned, known, backendId, clientId);
    }
    this.learned = learned;
    this.knownBackendIds = known;
  }

  private static learn(
    learned: Map<string, string>,
    known: Set<string>,
    backendId: string,
    clientId: string,
  ): void {
    known.add(backendId);
    if (backendId === clientId || !learned.has(clientId)) {
      learned.set(clientId, backendId);
    }
  }
}

/**
 * Parse the `MODEL_RENAME_MAP` JSON object. Invalid input is logged and ignored.
 */
export function parseRenameMap(raw: string | undefined, logger: Logger): Record<string, string> {
  if (!raw) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.warn(
      `MODEL_RENAME_MAP is not valid JSON, ignoring: ${error instanceof Error ? error.message : String(error)}`,
    );
    return {};
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    logger.warn('MODEL_RENAME_MAP must be a JSON object, ignoring');
    return {};
  }

  const overrides: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') {
      overrides[key] = value;
    } else {
      logger.warn(`MODEL_RENAME_MAP entry '${key}' is not a string, skipping`);
    }
  }
  return overrides;
}
