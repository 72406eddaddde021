import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, isRecord, type Config, type ConfigInput } from '@taskplanner/shared';

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: ConfigInput; // CLI flags
  cwd?: string; // directory holding .taskplanner.yaml
  env?: NodeJS.ProcessEnv;
  homeDir?: string; // directory holding .taskplanner/config.yaml
}

type ConfigRecord = Record<string, unknown>;

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    if (!fs.existsSync(filePath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
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

  /** Maps `TASKPLANNER_*` variables onto config keys. */
  static fromEnv(env: NodeJS.ProcessEnv): ConfigRecord {
    const llm: ConfigRecord = {};
    const store: ConfigRecord = {};
    const server: ConfigRecord = {};

    if (env.TASKPLANNER_LLM_URL) llm.baseUrl = env.TASKPLANNER_LLM_URL;
    if (env.TASKPLANNER_LLM_MODEL) llm.model = env.TASKPLANNER_LLM_MODEL;
    if (env.TASKPLANNER_LLM_DISABLED) {
      llm.enabled = !['1', 'true', 'yes'].includes(env.TASKPLANNER_LLM_DISABLED.toLowerCase());
    }
    if (env.TASKPLANNER_DB_PATH) store.path = env.TASKPLANNER_DB_PATH;
    // Non-numeric ports become NaN and fail validation.
    if (env.TASKPLANNER_PORT) server.port = Number(env.TASKPLANNER_PORT);

    const result: ConfigRecord = {};
    if (Object.keys(llm).length > 0) result.llm = llm;
    if (Object.keys(store).length > 0) result.store = store;
    if (Object.keys(server).length > 0) result.server = server;
    return result;
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;
    const homeDir = options.homeDir || os.homedir();

    // 1. User config: ~/.taskplanner/config.yaml
    const userConfig = this.loadYaml(path.join(homeDir, '.taskplanner', 'config.yaml'));

    // 2. Project config: <cwd>/.taskplanner.yaml
    const projectConfig = this.loadYaml(path.join(cwd, '.taskplanner.yaml'));

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. Environment, 5. CLI flags
    const envConfig = this.fromEnv(env);
    const flagConfig: ConfigRecord = { ...options.flags };

    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, projectConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, envConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return result.data;
  }
}
