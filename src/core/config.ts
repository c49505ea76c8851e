import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import { VoxdeskConfigSchema, type VoxdeskConfig } from './types.js';
import { ConfigError, toError } from './errors.js';

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Record<string, unknown> ? DeepPartial<T[K]> : T[K];
};

export type ConfigOverrides = DeepPartial<VoxdeskConfig>;

export interface ConfigManagerOptions {
  /** Directory holding config.yaml and logs. Defaults to ~/.voxdesk */
  globalDir?: string;
  /** Environment to read VOXDESK_* variables from. Defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = raw[key];
  const next = isRecord(existing) ? { ...existing } : {};
  raw[key] = next;
  return next;
}

function parseBool(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function describeZodError(err: ZodError): string {
  return err.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Fully defaulted configuration, no files or environment consulted.
 */
export function defaultConfig(overrides?: ConfigOverrides): VoxdeskConfig {
  return VoxdeskConfigSchema.parse(overrides ?? {});
}

export class ConfigManager {
  private config: VoxdeskConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectDir?: string, options: ConfigManagerOptions = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.voxdesk');
    this.projectDir = projectDir || process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: ConfigOverrides): VoxdeskConfig {
    let raw: Record<string, unknown> = {};

    // 1. Global config
    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));

    // 2. Project config
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.voxdesk.yaml'), 'project'));

    // 3. Environment variables
    raw = this.applyEnvVars(raw);

    // 4. Overrides
    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    // 5. Validate
    const result = VoxdeskConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(`Invalid configuration: ${describeZodError(result.error)}`, result.error);
    }
    this.config = result.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): VoxdeskConfig {
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
   * Create a commented default global config if none exists.
   * Returns the path written, or null when one was already there.
   */
  createDefaultConfig(): string | null {
    const configPath = join(this.globalDir, 'config.yaml');
    if (existsSync(configPath)) return null;

    mkdirSync(this.globalDir, { recursive: true });
    const content = `# voxdesk configuration
asr:
  primary: whisper
  secondary: vosk
  whisperUrl: http://localhost:8080
  voskUrl: ws://localhost:2700

classifier:
  remoteEnabled: false
  # remoteUrl: http://localhost:11434
  # remoteModel: gemma2:2b

context:
  ttlMs: 120000
  maxTurns: 20
`;
    writeFileSync(configPath, content, 'utf-8');
    return configPath;
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
    if (!isRecord(parsed)) {
      throw new ConfigError(`${label} config at ${path} must be a mapping`);
    }
    return parsed;
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const env = this.env;
    const result = { ...raw };

    if (env.VOXDESK_ASR_PRIMARY) section(result, 'asr').primary = env.VOXDESK_ASR_PRIMARY;
    if (env.VOXDESK_ASR_SECONDARY) section(result, 'asr').secondary = env.VOXDESK_ASR_SECONDARY;
    if (env.VOXDESK_WHISPER_URL) section(result, 'asr').whisperUrl = env.VOXDESK_WHISPER_URL;
    if (env.VOXDESK_VOSK_URL) section(result, 'asr').voskUrl = env.VOXDESK_VOSK_URL;
    if (env.VOXDESK_LOCALE) section(result, 'asr').locale = env.VOXDESK_LOCALE;

    const classifierUrl = env.VOXDESK_CLASSIFIER_URL || env.OLLAMA_BASE_URL;
    if (classifierUrl) section(result, 'classifier').remoteUrl = classifierUrl;
    if (env.VOXDESK_CLASSIFIER_MODEL) section(result, 'classifier').remoteModel = env.VOXDESK_CLASSIFIER_MODEL;
    if (env.VOXDESK_REMOTE_CLASSIFIER) {
      section(result, 'classifier').remoteEnabled = parseBool(env.VOXDESK_REMOTE_CLASSIFIER);
    }

    if (env.VOXDESK_LOG_LEVEL) section(result, 'logging').level = env.VOXDESK_LOG_LEVEL;

    return result;
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const current = target[key];
      if (incoming === undefined) continue;
      if (isRecord(incoming) && isRecord(current)) {
        result[key] = this.deepMerge(current, incoming);
      } else {
        result[key] = incoming;
      }
    }
    return result;
  }
}
