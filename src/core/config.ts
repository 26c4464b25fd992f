import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { ReasonerConfigSchema, type ReasonerConfig, type ReasonerConfigInput } from './types.js';
import { ConfigError, toError } from './errors.js';

export const PROJECT_CONFIG_FILE = '.ontoreason.yaml';

/** Environment variable → dotted config path, parsed as an integer. */
const NUMERIC_ENV_VARS: ReadonlyArray<[string, string, string]> = [
  ['ONTOREASON_MAX_DEPTH', 'query', 'maxDepth'],
  ['ONTOREASON_QUERY_TIMEOUT_MS', 'query', 'timeoutMs'],
  ['ONTOREASON_CACHE_CAPACITY', 'cache', 'capacity'],
  ['ONTOREASON_CACHE_TTL_MS', 'cache', 'ttlMs'],
  ['ONTOREASON_BREAKER_THRESHOLD', 'breaker', 'failureThreshold'],
  ['ONTOREASON_BREAKER_RESET_MS', 'breaker', 'resetTimeoutMs'],
  ['ONTOREASON_INGEST_WORKERS', 'ingestion', 'workers'],
  ['ONTOREASON_INGEST_BATCH_SIZE', 'ingestion', 'batchSize'],
];

export interface ConfigManagerOptions {
  projectDir?: string;
  /** Directory holding config.yaml; defaults to ~/.ontoreason */
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: ReasonerConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.ontoreason');
    this.projectDir = options.projectDir ?? process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: ReasonerConfigInput): ReasonerConfig {
    let raw: Record<string, unknown> = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, PROJECT_CONFIG_FILE), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, { ...overrides });
    }

    const parsed = ReasonerConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${detail}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  get(): ReasonerConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  private readYaml(path: string, label: string): Record<string, unknown> {
    if (!existsSync(path)) return {};

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }

    if (parsed === null || parsed === undefined) return {};
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Expected a mapping at the top of ${label} config ${path}`);
    }
    return parsed;
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const patch: Record<string, Record<string, unknown>> = {};

    for (const [name, section, key] of NUMERIC_ENV_VARS) {
      const value = this.env[name];
      if (value === undefined || value.trim() === '') continue;
      const num = Number(value);
      if (!Number.isFinite(num)) {
        throw new ConfigError(`Environment variable ${name} must be a number, got "${value}"`);
      }
      patch[section] = { ...patch[section], [key]: num };
    }

    const level = this.env.ONTOREASON_LOG_LEVEL;
    if (level) {
      patch.logging = { ...patch.logging, level };
    }

    return this.deepMerge(raw, patch);
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const existing = target[key];
      if (isPlainObject(incoming) && isPlainObject(existing)) {
        result[key] = this.deepMerge(existing, incoming);
      } else if (incoming !== undefined) {
        result[key] = incoming;
      }
    }
    return result;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
