import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import {
  ConfigError,
  DirdigestConfigSchema,
  type DirdigestConfig,
  type DirdigestConfigInput,
} from '@dirdigest/shared';

export const DEFAULT_CONFIG_FILE = '.dirdigest.yaml';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: DirdigestConfigInput; // CLI flags
  cwd?: string; // where the default config file is looked up
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`);
      }
      throw new ConfigError(`Cannot read config file: ${filePath}`, { cause: error });
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file ${filePath} must contain a mapping at the top level`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output = { ...target };
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
   * Resolves the effective configuration: schema defaults, then the YAML file
   * (explicit path, or `.dirdigest.yaml` in `cwd` when present), then CLI flags.
   */
  static load(options: ConfigOptions = {}): DirdigestConfig {
    const cwd = options.cwd ?? process.cwd();

    let fileConfig: ConfigRecord = {};
    if (options.configPath) {
      const configPath = path.resolve(cwd, options.configPath);
      if (!fs.existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${configPath}`);
      }
      fileConfig = this.loadYaml(configPath);
    } else {
      const defaultPath = path.join(cwd, DEFAULT_CONFIG_FILE);
      if (fs.existsSync(defaultPath)) {
        fileConfig = this.loadYaml(defaultPath);
      }
    }

    const merged = this.mergeConfigs(fileConfig, { ...(options.flags ?? {}) });
    const result = DirdigestConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      );
      throw new ConfigError(`Invalid configuration:\n${issues.join('\n')}`, {
        details: { issues },
      });
    }
    return result.data;
  }
}
