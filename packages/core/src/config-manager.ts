import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type CrewlineConfig,
  DEFAULT_CONFIG,
  crewlineConfigSchema,
  ConfigError,
  errorMessage,
  isRecord,
} from '@crewline/shared';

export const CONFIG_FILE_NAMES = ['crewline.config.yaml', 'crewline.config.yml', 'crewline.config.json'];

export interface ConfigLoadOptions {
  configPath?: string;
  /** Directory the upward search starts from. Defaults to cwd. */
  cwd?: string;
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

/** Defaults ← config file ← environment, validated by the config schema. */
export class ConfigManager {
  private config: CrewlineConfig = DEFAULT_CONFIG;
  private source: string | null = null;

  async load(options: ConfigLoadOptions = {}): Promise<CrewlineConfig> {
    // 1. Defaults
    const defaults: unknown = structuredClone(DEFAULT_CONFIG);
    let merged: Record<string, unknown> = isRecord(defaults) ? defaults : {};

    // 2. Config file
    const file = this.findConfigFile(options);
    if (file) {
      merged = deepMerge(merged, await this.parseConfigFile(file));
      this.source = file;
    }

    // 3. Environment
    merged = deepMerge(merged, loadEnvVars(options.env ?? process.env));

    // 4. Validate
    const result = crewlineConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError(
        `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      );
    }

    this.config = result.data;
    return this.config;
  }

  get<K extends keyof CrewlineConfig>(key: K): CrewlineConfig[K] {
    return this.config[key];
  }

  getAll(): CrewlineConfig {
    return this.config;
  }

  /** Config file the last load read, if any. */
  get loadedFrom(): string | null {
    return this.source;
  }

  private findConfigFile(options: ConfigLoadOptions): string | null {
    if (options.configPath) {
      if (!existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      return options.configPath;
    }

    // Search the start directory and its parents
    let dir = resolve(options.cwd ?? process.cwd());
    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) return p;
      }
      const parent = dirname(dir);
      if (parent === dir) break;
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
      throw new ConfigError(`Cannot parse ${p}: ${errorMessage(err)}`);
    }
    // An empty YAML file parses to null
    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`${p} must contain a mapping at the top level`);
    }
    return parsed;
  }
}

function loadEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, Record<string, unknown>> = {};
  const section = (name: string): Record<string, unknown> => (config[name] ??= {});

  if (env.CREWLINE_DB_PATH) {
    section('database').path = env.CREWLINE_DB_PATH;
  }
  if (env.CREWLINE_BATCH_SIZE) {
    section('ingestion').batchSize = Number(env.CREWLINE_BATCH_SIZE);
  }
  if (env.CREWLINE_MAX_RETRIES) {
    section('ingestion').maxRetries = Number(env.CREWLINE_MAX_RETRIES);
  }
  if (env.CREWLINE_LOG_LEVEL) {
    section('logging').level = env.CREWLINE_LOG_LEVEL;
  }
  if (env.CREWLINE_DBT_PROJECT_DIR) {
    section('transformation').projectDir = env.CREWLINE_DBT_PROJECT_DIR;
  }
  return config;
}

export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const from = source[key];
    const into = target[key];
    result[key] = isRecord(from) && isRecord(into) ? deepMerge(into, from) : from;
  }
  return result;
}
