import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { VoiceKitConfigSchema, type VoiceKitConfig } from './types.js';
import { ConfigError, toError } from './errors.js';

export class ConfigManager {
  private config: VoiceKitConfig | null = null;
  private globalDir: string;
  private projectDir: string;

  constructor(projectDir?: string, globalDir?: string) {
    this.globalDir = globalDir || join(homedir(), '.voicekit');
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: Record<string, unknown>, env: NodeJS.ProcessEnv = process.env): VoiceKitConfig {
    let raw: Record<string, unknown> = {};

    raw = this.mergeFile(raw, join(this.globalDir, 'config.yaml'), 'global');
    raw = this.mergeFile(raw, join(this.projectDir, '.voicekit.yaml'), 'project');
    raw = this.applyEnvVars(raw, env);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const result = VoiceKitConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(`Invalid configuration: ${result.error.message}`, result.error);
    }
    this.config = result.data;
    return this.config;
  }

  get(): VoiceKitConfig {
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

  /**
   * Create default global config if it doesn't exist
   */
  createDefaultConfig(): string {
    if (!existsSync(this.globalDir)) {
      mkdirSync(this.globalDir, { recursive: true });
    }
    const configPath = join(this.globalDir, 'config.yaml');
    if (!existsSync(configPath)) {
      const defaultConfig = `# voice-command-kit global configuration
providers:
  # openaiApiKey: set OPENAI_API_KEY instead of committing a key

capture:
  sampleRate: 16000
  loopSeconds: 30
  preRollSeconds: 0.5
  maxRecordSeconds: 10
  minRecordSeconds: 0.25

resolver:
  model: gpt-4o-mini
  cacheHeuristicMatches: true

controller:
  cancelStale: false
`;
      writeFileSync(configPath, defaultConfig, 'utf-8');
    }
    return configPath;
  }

  private mergeFile(raw: Record<string, unknown>, path: string, label: string): Record<string, unknown> {
    if (!existsSync(path)) return raw;
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }
    if (isRecord(parsed)) {
      return this.deepMerge(raw, parsed);
    }
    return raw;
  }

  private applyEnvVars(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
    const providers = isRecord(raw.providers) ? { ...raw.providers } : {};
    const resolver = isRecord(raw.resolver) ? { ...raw.resolver } : {};
    const capture = isRecord(raw.capture) ? { ...raw.capture } : {};

    if (env.OPENAI_API_KEY) {
      providers.openaiApiKey = env.OPENAI_API_KEY;
    }
    if (env.OPENAI_BASE_URL) {
      providers.baseUrl = env.OPENAI_BASE_URL;
    }
    if (env.VOICEKIT_MODEL) {
      resolver.model = env.VOICEKIT_MODEL;
    }
    if (env.VOICEKIT_SAMPLE_RATE) {
      const rate = Number(env.VOICEKIT_SAMPLE_RATE);
      if (Number.isFinite(rate)) {
        capture.sampleRate = rate;
      }
    }

    return { ...raw, providers, resolver, capture };
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const next = source[key];
      const prev = target[key];
      if (isRecord(next) && isRecord(prev)) {
        result[key] = this.deepMerge(prev, next);
      } else {
        result[key] = next;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}
