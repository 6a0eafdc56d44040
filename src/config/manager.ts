/**
 * Config manager - handles reading, writing, and resolving credentials
 */

import { dirname } from 'path';
import { DEFAULT_CONFIG, ENV_VARS, type Config, type Credentials } from '../types/index.js';
import { resolveConfigPath } from '../utils/config-path.js';
import { isBlank } from '../utils/text.js';
import { parseConfig, validateConfig, type ValidationResult } from './schema.js';
import { configFileExists, readConfigText, writeConfigFile } from './store.js';

export class ConfigManager {
  private configPath: string;
  private config: Config | null = null;
  /** Cache TTL in milliseconds (default: 5 seconds) */
  private cacheTtlMs: number;
  /** Timestamp when cache was last updated */
  private cacheUpdatedAt: number = 0;

  constructor(configPath?: string, options?: { cacheTtlMs?: number }) {
    this.configPath = resolveConfigPath({ configPath });
    this.cacheTtlMs = options?.cacheTtlMs ?? 5000;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getConfigDir(): string {
    return dirname(this.configPath);
  }

  async exists(): Promise<boolean> {
    return configFileExists(this.configPath);
  }

  async load(): Promise<Config> {
    // Return cached config if still valid
    const now = Date.now();
    if (this.config && now - this.cacheUpdatedAt < this.cacheTtlMs) {
      return this.config;
    }

    const content = await readConfigText(this.configPath);
    if (content === null) {
      throw new Error(`Config file not found: ${this.configPath}`);
    }

    const { config, errors } = parseConfig(content);
    if (!config) {
      throw new Error(`Invalid config: ${errors.map((e) => `${e.path}: ${e.message}`).join(', ')}`);
    }

    this.config = config;
    this.cacheUpdatedAt = now;
    return config;
  }

  /**
   * Invalidate the config cache (force reload on next access)
   */
  invalidateCache(): void {
    this.cacheUpdatedAt = 0;
  }

  /**
   * Config from file, or the default when there is no file.
   * An invalid file is still an error.
   */
  async loadOrDefault(): Promise<Config> {
    if (!(await this.exists())) {
      return { ...DEFAULT_CONFIG };
    }
    return this.load();
  }

  async save(config: Config): Promise<void> {
    const result = validateConfig(config);
    if (!result.valid) {
      throw new Error(`Invalid config: ${result.errors.map((e) => `${e.path}: ${e.message}`).join(', ')}`);
    }

    await writeConfigFile(this.configPath, config);
    this.config = config;
    this.cacheUpdatedAt = Date.now();
  }

  async init(force: boolean = false, values: Omit<Config, 'version'> = {}): Promise<{ created: boolean; path: string }> {
    const exists = await this.exists();
    if (exists && !force) {
      return { created: false, path: this.configPath };
    }

    await this.save({ ...DEFAULT_CONFIG, ...values });
    return { created: true, path: this.configPath };
  }

  async validate(): Promise<ValidationResult> {
    const content = await readConfigText(this.configPath);
    if (content === null) {
      return { valid: false, errors: [{ path: '', message: 'Config file not found' }] };
    }

    const { errors } = parseConfig(content);
    return { valid: errors.length === 0, errors };
  }

  /**
   * Merge environment overrides over the config file (which may be absent)
   *
   * @throws Error naming every missing required setting
   */
  async resolveCredentials(env: NodeJS.ProcessEnv = process.env): Promise<Credentials> {
    const config = await this.loadOrDefault();
    const pick = (key: keyof typeof ENV_VARS): string | undefined => {
      const fromEnv = env[ENV_VARS[key]];
      return isBlank(fromEnv) ? config[key] : fromEnv;
    };

    const org = pick('org');
    const clientId = pick('clientId');
    const clientSecret = pick('clientSecret');

    const missing: string[] = [];
    if (isBlank(org)) missing.push(`org (${ENV_VARS.org})`);
    if (isBlank(clientId)) missing.push(`clientId (${ENV_VARS.clientId})`);
    if (isBlank(clientSecret)) missing.push(`clientSecret (${ENV_VARS.clientSecret})`);
    if (org === undefined || clientId === undefined || clientSecret === undefined || missing.length > 0) {
      throw new Error(`Missing credentials: ${missing.join(', ')}. Set them in ${this.configPath} or the environment.`);
    }

    return {
      org,
      clientId,
      clientSecret,
      domain: pick('domain'),
      project: pick('project'),
      timeoutMs: config.timeoutMs,
    };
  }
}
