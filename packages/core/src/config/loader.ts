import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { Config, ConfigError, ConfigInput, ConfigSchema } from '@repoindex/shared';

type DeepPartial<T> = T extends readonly unknown[]
  ? T
  : T extends object
    ? { [K in keyof T]?: DeepPartial<T[K]> }
    : T;

export type ConfigFlags = DeepPartial<ConfigInput>;

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: ConfigFlags; // CLI flags
  cwd?: string; // Base for the repo config and relative storage paths
  env?: NodeJS.ProcessEnv; // REPOINDEX_HOME relocates the user config
}

export const USER_CONFIG_DIR = '.repoindex';
export const REPO_CONFIG_FILE = '.repoindex.yaml';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): Record<string, unknown> {
    let parsed: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
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
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: Record<string, unknown>, source: object): Record<string, unknown> {
    const output = { ...target };
    const entries: [string, unknown][] = Object.entries(source);

    for (const [key, sourceValue] of entries) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static userConfigPath(env: NodeJS.ProcessEnv = process.env): string {
    const home = env.REPOINDEX_HOME ?? path.join(os.homedir(), USER_CONFIG_DIR);
    return path.join(home, 'config.yaml');
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    // 1. User config: ~/.repoindex/config.yaml
    const userConfig = this.loadYaml(this.userConfigPath(env));

    // 2. Repo config: <cwd>/.repoindex.yaml
    const repoConfig = this.loadYaml(path.join(cwd, REPO_CONFIG_FILE));

    // 3. Explicit --config file (if provided)
    let explicitConfig: Record<string, unknown> = {};
    if (options.configPath) {
      const explicitPath = path.resolve(cwd, options.configPath);
      if (!fs.existsSync(explicitPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(explicitPath);
    }

    // 4. CLI flags
    const flagConfig = options.flags || {};

    // flags > explicit > repo > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return this.resolvePaths(result.data, cwd);
  }

  /** Storage and log paths relative to `cwd` become absolute. */
  static resolvePaths(config: Config, cwd: string): Config {
    const resolve = (p: string) => path.resolve(cwd, p);
    return {
      ...config,
      storage: {
        ...config.storage,
        statePath: resolve(config.storage.statePath),
        reposDir: resolve(config.storage.reposDir),
        vectors: {
          ...config.storage.vectors,
          path: resolve(config.storage.vectors.path),
        },
      },
      logging: {
        ...config.logging,
        jsonlPath: config.logging.jsonlPath ? resolve(config.logging.jsonlPath) : undefined,
      },
    };
  }
}
