import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type SemantixConfig,
  DEFAULT_CONFIG,
  semantixConfigSchema,
  ConfigError,
} from '@semantix/shared';
import { isPlainObject } from './value.js';

export const CONFIG_FILE_NAMES = ['semantix.config.yaml', 'semantix.config.yml', 'semantix.config.json'];

export interface ConfigManagerOptions {
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Directory the config file search starts from. Defaults to process.cwd() */
  cwd?: string;
  /** Receives startup warnings. Defaults to console.warn */
  onWarning?: (message: string) => void;
}

export class ConfigManager {
  private config: SemantixConfig = DEFAULT_CONFIG;
  private configPath: string | null = null;
  private warnings: string[] = [];
  private env: NodeJS.ProcessEnv;
  private cwd: string;
  private onWarning: (message: string) => void;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.cwd = options.cwd ?? process.cwd();
    this.onWarning = options.onWarning ?? (message => console.warn(`[semantix] ${message}`));
  }

  async load(options?: { configPath?: string }): Promise<SemantixConfig> {
    this.warnings = [];

    // 1. Defaults
    let merged: Record<string, unknown> = Object.fromEntries(Object.entries(structuredClone(DEFAULT_CONFIG)));

    // 2. Config file
    const fileConfig = await this.loadConfigFile(options?.configPath);
    if (fileConfig) {
      merged = deepMerge(merged, fileConfig);
    }

    // 3. Environment variables
    merged = deepMerge(merged, this.loadEnvVars());

    // 4. Validate
    const result = semantixConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError(
        `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      );
    }

    this.config = result.data;

    if (this.config.reasoning.provider === 'openai' && !this.config.reasoning.apiKey) {
      this.warn('No reasoning API key configured; set SEMANTIX_REASONING_API_KEY or OPENAI_API_KEY');
    }

    return this.config;
  }

  get<K extends keyof SemantixConfig>(key: K): SemantixConfig[K] {
    return this.config[key];
  }

  getAll(): SemantixConfig {
    return this.config;
  }

  /** Path of the file the last load read, if any. */
  getConfigPath(): string | null {
    return this.configPath;
  }

  getWarnings(): string[] {
    return [...this.warnings];
  }

  private warn(message: string): void {
    this.warnings.push(message);
    this.onWarning(message);
  }

  private async loadConfigFile(configPath?: string): Promise<Record<string, unknown> | null> {
    this.configPath = null;

    if (configPath) {
      const p = resolve(this.cwd, configPath);
      if (existsSync(p)) {
        return this.parseConfigFile(p);
      }
      throw new ConfigError(`Config file not found: ${p}`);
    }

    // Search cwd and parent directories
    let dir = resolve(this.cwd);

    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) {
          return this.parseConfigFile(p);
        }
      }
      const parent = dirname(dir);
      if (parent === dir) break; // reached filesystem root
      dir = parent;
    }

    return null;
  }

  private async parseConfigFile(p: string): Promise<Record<string, unknown>> {
    const content = await readFile(p, 'utf-8');
    let parsed: unknown;
    try {
      parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigError(`Cannot parse ${p}: ${err instanceof Error ? err.message : String(err)}`);
    }
    // An empty YAML file parses to null
    if (parsed === null || parsed === undefined) parsed = {};
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`${p} must contain a mapping at the top level`);
    }
    this.configPath = p;
    return parsed;
  }

  private loadEnvVars(): Record<string, unknown> {
    const env = this.env;
    const fallbackKey = env.OPENAI_API_KEY;

    const reasoning = compact({
      provider: env.SEMANTIX_REASONING_PROVIDER,
      apiKey: env.SEMANTIX_REASONING_API_KEY ?? fallbackKey,
      model: env.SEMANTIX_REASONING_MODEL,
      baseUrl: env.SEMANTIX_REASONING_BASE_URL,
      maxTokens: toNumber(env.SEMANTIX_REASONING_MAX_TOKENS),
    });
    const embedding = compact({
      provider: env.SEMANTIX_EMBEDDING_PROVIDER,
      apiKey: env.SEMANTIX_EMBEDDING_API_KEY ?? fallbackKey,
      model: env.SEMANTIX_EMBEDDING_MODEL,
      baseUrl: env.SEMANTIX_EMBEDDING_BASE_URL,
    });
    const indexing = compact({
      provider: env.SEMANTIX_INDEXING_PROVIDER,
      topK: toNumber(env.SEMANTIX_INDEXING_TOP_K),
    });
    const memory = compact({ tokenRatio: toNumber(env.SEMANTIX_TOKEN_RATIO) });
    const logging = compact({ level: env.SEMANTIX_LOG_LEVEL, traceOutput: env.SEMANTIX_TRACE_OUTPUT });
    const store = compact({ dbPath: env.SEMANTIX_DB_PATH });

    return compact({ reasoning, embedding, indexing, memory, logging, store });
  }
}

/** Drops undefined fields and empty sections. */
function compact(record: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value === undefined || value === '') continue;
    if (isPlainObject(value) && Object.keys(value).length === 0) continue;
    result[key] = value;
  }
  return result;
}

/** Non-numeric strings pass through so validation reports them. */
function toNumber(value: string | undefined): number | string | undefined {
  if (value === undefined || value === '') return undefined;
  const n = Number(value);
  return Number.isNaN(n) ? value : n;
}

export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const next = source[key];
    const current = target[key];
    result[key] = isPlainObject(next) && isPlainObject(current) ? deepMerge(current, next) : next;
  }
  return result;
}
