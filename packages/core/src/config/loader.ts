import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import {
  ConfigError,
  SearchConfigSchema,
  formatIssues,
  type SearchConfig,
} from '@ctxgrep/shared';

export const CONFIG_DIRNAME = '.ctxgrep';
export const REPO_CONFIG_FILENAME = '.ctxgrep.yaml';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: Record<string, unknown>; // CLI flags, validated with everything else
  cwd?: string; // Directory searched for a repo config
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static userConfigPath(): string {
    return path.join(os.homedir(), CONFIG_DIRNAME, 'config.yaml');
  }

  static loadYaml(filePath: string): ConfigRecord {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      const content = fs.readFileSync(filePath, 'utf8');
      parsed = yaml.load(content);
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = { ...target };
    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
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
   * Resolves the effective search configuration.
   * Precedence: flags > --config file > repo config > user config > defaults.
   *
   * @throws ConfigError for a missing explicit file, bad YAML or invalid values
   */
  static load(options: ConfigOptions = {}): SearchConfig {
    const cwd = options.cwd || process.cwd();

    // 1. User config: ~/.ctxgrep/config.yaml
    const userConfig = this.loadYaml(this.userConfigPath());

    // 2. Repo config: <cwd>/.ctxgrep.yaml
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

    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    const result = SearchConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error)}`);
    }
    return result.data;
  }
}
