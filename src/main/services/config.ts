/**
 * ConfigService: typed, validated configuration for the QA core.
 *
 * Features:
 * - Zod schema validation on load (invalid config → ConfigError, never a silent default)
 * - Config version tracking + ordered migrations
 * - TRAFFIC_QA_* environment overrides on top of the file
 * - Typed get<K>() with full TypeScript inference
 *
 * @module main/services/config
 */

import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from './logger';
import { ConfigError, ErrorCode } from '../../shared/types/errors';
import { QAConfigSchema, CURRENT_CONFIG_VERSION, CONFIG_MIGRATIONS } from '../../shared/schemas/config-schema';
import type { QAConfigParsed, QAConfigInput } from '../../shared/schemas/config-schema';

const log = createLogger('Config');

type RawConfig = Record<string, unknown>;

/** Environment variable → config path; numeric paths are converted before validation */
const ENV_OVERRIDES: ReadonlyArray<{ env: string; path: [string] | [string, string]; numeric?: boolean }> = [
  { env: 'TRAFFIC_QA_CORPUS_PATH', path: ['corpusPath'] },
  { env: 'TRAFFIC_QA_LOG_LEVEL', path: ['logLevel'] },
  { env: 'TRAFFIC_QA_EMBEDDING_PROVIDER', path: ['embedding', 'provider'] },
  { env: 'TRAFFIC_QA_EMBEDDING_MODEL', path: ['embedding', 'model'] },
  { env: 'TRAFFIC_QA_EMBEDDING_CACHE', path: ['embedding', 'cachePath'] },
  { env: 'TRAFFIC_QA_SIMILARITY_THRESHOLD', path: ['matcher', 'similarityThreshold'], numeric: true },
  { env: 'TRAFFIC_QA_TOP_K', path: ['matcher', 'topK'], numeric: true },
];

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Nested objects are merged; everything else in `override` replaces `base`. */
function mergeConfig(base: RawConfig, override: RawConfig): RawConfig {
  const merged: RawConfig = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? mergeConfig(current, value) : value;
  }
  return merged;
}

export interface ConfigServiceOptions {
  /** JSON config file; a missing file means defaults */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Applied last, mainly for tests and embedding callers */
  overrides?: QAConfigInput;
}

// ─── ConfigService ───

export class ConfigService {
  private readonly configPath: string | null;
  private readonly config: QAConfigParsed;

  constructor(options: ConfigServiceOptions = {}) {
    this.configPath = options.configPath ? path.resolve(options.configPath) : null;

    let raw = this.migrateConfig(this.readFile());
    raw = mergeConfig(raw, this.envOverrides(options.env ?? process.env));
    if (options.overrides) raw = mergeConfig(raw, { ...options.overrides });

    const result = QAConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new ConfigError(`Invalid configuration: ${issues}`, ErrorCode.CONFIG_VALIDATION_ERROR);
    }
    this.config = result.data;
    log.debug(`Config loaded (${this.configPath ?? 'defaults'})`);
  }

  get<K extends keyof QAConfigParsed>(key: K): QAConfigParsed[K] {
    return this.config[key];
  }

  getAll(): Readonly<QAConfigParsed> {
    return this.config;
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  /** Resolve a path from the config relative to the config file's directory. */
  resolvePath(value: string): string {
    if (value === ':memory:' || path.isAbsolute(value)) return value;
    return path.resolve(this.configPath ? path.dirname(this.configPath) : process.cwd(), value);
  }

  // ────────────── Load ──────────────

  private readFile(): RawConfig {
    if (!this.configPath || !fs.existsSync(this.configPath)) return {};

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf8'));
    } catch (error) {
      throw new ConfigError(
        `Failed to read config file ${this.configPath}`,
        ErrorCode.CONFIG_LOAD_ERROR,
        error instanceof Error ? error : undefined,
      );
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file ${this.configPath} must contain a JSON object`, ErrorCode.CONFIG_LOAD_ERROR);
    }
    return parsed;
  }

  private envOverrides(env: NodeJS.ProcessEnv): RawConfig {
    let overrides: RawConfig = {};
    for (const { env: name, path: keyPath, numeric } of ENV_OVERRIDES) {
      const value = env[name];
      if (value === undefined || value === '') continue;
      const parsed: unknown = numeric ? Number(value) : value;
      const patch: RawConfig =
        keyPath.length === 1 ? { [keyPath[0]]: parsed } : { [keyPath[0]]: { [keyPath[1]]: parsed } };
      overrides = mergeConfig(overrides, patch);
      log.info(`Config override from ${name}`);
    }
    return overrides;
  }

  /**
   * Run ordered migrations on raw config data.
   */
  private migrateConfig(raw: RawConfig): RawConfig {
    let version = typeof raw._version === 'number' ? raw._version : 0;
    let migrated = { ...raw };

    while (version < CURRENT_CONFIG_VERSION) {
      const migration = CONFIG_MIGRATIONS[version];
      if (migration) {
        log.info(`Migrating config v${version} → v${version + 1}`);
        migrated = migration(migrated);
      }
      version++;
    }

    migrated._version = CURRENT_CONFIG_VERSION;
    return migrated;
  }
}
