import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import {
  ConfigError,
  ManagerConfig,
  ManagerConfigInput,
  ManagerConfigSchema,
} from '@repowarden/shared';

export const REPO_CONFIG_FILENAME = '.repowarden.yaml';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: Partial<ManagerConfigInput>; // CLI flags
  cwd?: string; // Working directory (for the local config file and relative paths)
  env?: NodeJS.ProcessEnv; // Environment variables
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      const parsed = yaml.load(content);
      if (parsed === undefined || parsed === null) {
        return {};
      }
      if (!isRecord(parsed)) {
        throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
      }
      return parsed;
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  /**
   * Loads, merges and validates configuration. Precedence, highest first:
   * CLI flags, `--config` file, `<cwd>/.repowarden.yaml`, `~/.repowarden/config.yaml`.
   * Configuration is read once; it is not reloaded while running.
   */
  static load(options: ConfigOptions = {}): ManagerConfig {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    // 1. User config: ~/.repowarden/config.yaml
    const userConfigPath = path.join(os.homedir(), '.repowarden', 'config.yaml');
    const userConfig = this.loadYaml(userConfigPath);

    // 2. Local config: <cwd>/.repowarden.yaml
    const repoConfig = this.loadYaml(path.join(cwd, REPO_CONFIG_FILENAME));

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. CLI flags
    const flagConfig: ConfigRecord = { ...options.flags };

    let merged = this.mergeConfigs({ rootDir: cwd }, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    const result = ManagerConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    const config = result.data;
    config.rootDir = path.resolve(cwd, config.rootDir);
    config.cacheFile = path.resolve(config.rootDir, config.cacheFile);
    if (config.eventLog) {
      config.eventLog = path.resolve(config.rootDir, config.eventLog);
    }

    this.assertRootDir(config.rootDir);

    // Handle `api_key_env` resolution
    if (config.summarizer.type === 'openai') {
      const { api_key_env: envKey } = config.summarizer;
      const envValue = envKey ? env[envKey] : undefined;
      if (envValue && !config.summarizer.api_key) {
        config.summarizer.api_key = envValue;
      }
    }

    return config;
  }

  private static assertRootDir(rootDir: string): void {
    let isDirectory = false;
    try {
      isDirectory = fs.statSync(rootDir).isDirectory();
    } catch (error) {
      throw new ConfigError(`Root directory does not exist: ${rootDir}`, { cause: error });
    }
    if (!isDirectory) {
      throw new ConfigError(`Root directory is not a directory: ${rootDir}`);
    }
  }
}
