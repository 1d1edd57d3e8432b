/**
 * Configuration loader with hierarchy support
 * Priority: overrides > env vars > project config > global config > defaults
 */

import {
  Config,
  ConfigOverrides,
  ConfigOverridesSchema,
  ConfigSchema,
  LoggingConfig,
} from './schemas.js';
import type { IFileSystem } from '../../platform/IFileSystem.js';
import yaml from 'yaml';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import { logger } from '../utils/logger.js';
import { ConfigurationError } from '../utils/errors.js';

export const CONFIG_DIR = '.switchboard';
export const CONFIG_FILE = 'config.yml';

export interface ConfigLoadOptions {
  projectRoot?: string;
  overrides?: ConfigOverrides;
}

export interface ConfigLoaderOptions {
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

type Env = Record<string, string | undefined>;

export class ConfigLoader {
  private readonly homeDir: string;
  private readonly env: Env;

  constructor(
    private fs: IFileSystem,
    options: ConfigLoaderOptions = {}
  ) {
    this.homeDir = options.homeDir ?? os.homedir();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration with full hierarchy:
   * 1. Defaults
   * 2. Global (~/.switchboard/config.yml)
   * 3. Project (.switchboard/config.yml)
   * 4. Environment variables (process env over the project's .env file)
   * 5. Explicit overrides
   */
  async load(options: ConfigLoadOptions = {}): Promise<Config> {
    let config: ConfigOverrides = {};

    const globalConfig = await this.loadYamlConfig(
      path.join(this.homeDir, CONFIG_DIR, CONFIG_FILE),
      'global'
    );
    if (globalConfig) {
      config = this.merge(config, globalConfig);
    }

    if (options.projectRoot) {
      const projectConfig = await this.loadYamlConfig(
        path.join(options.projectRoot, CONFIG_DIR, CONFIG_FILE),
        'project'
      );
      if (projectConfig) {
        config = this.merge(config, projectConfig);
      }
    }

    const envConfig = await this.loadEnvConfig(options.projectRoot);
    if (envConfig) {
      config = this.merge(config, envConfig);
    }

    if (options.overrides) {
      config = this.merge(config, options.overrides);
    }

    const validated = ConfigSchema.safeParse(config);
    if (!validated.success) {
      throw new ConfigurationError(
        `Invalid configuration: ${validated.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ')}`
      );
    }

    return validated.data;
  }

  private async loadYamlConfig(
    configPath: string,
    scope: 'global' | 'project'
  ): Promise<ConfigOverrides | null> {
    try {
      if (!(await this.fs.exists(configPath))) {
        return null;
      }
      const content = await this.fs.readFile(configPath);
      const parsed: unknown = yaml.parse(content);
      if (parsed === null || parsed === undefined) {
        return null;
      }

      const result = ConfigOverridesSchema.safeParse(parsed);
      if (!result.success) {
        logger.warn(`Ignoring invalid ${scope} config`, {
          path: configPath,
          issues: result.error.issues.map((issue) => issue.message),
        });
        return null;
      }
      return result.data;
    } catch (error) {
      logger.warn(`Failed to load ${scope} config`, { path: configPath, error });
      return null;
    }
  }

  private async loadEnvConfig(projectRoot?: string): Promise<ConfigOverrides | null> {
    const env: Env = { ...(await this.loadDotEnv(projectRoot)), ...this.env };

    const llm: NonNullable<ConfigOverrides['llm']> = {};
    const endpoint = env.LLM_ENDPOINT ?? env.DIAL_ENDPOINT;
    if (endpoint) llm.endpoint = endpoint;
    if (env.DEPLOYMENT_NAME) llm.deployment = env.DEPLOYMENT_NAME;
    if (env.LLM_API_VERSION) llm.apiVersion = env.LLM_API_VERSION;
    const apiKey = env.LLM_API_KEY ?? env.DIAL_API_KEY;
    if (apiKey) llm.apiKey = apiKey;

    const gpa: NonNullable<NonNullable<ConfigOverrides['agents']>['gpa']> = {};
    if (env.GPA_ENDPOINT) gpa.endpoint = env.GPA_ENDPOINT;
    if (env.GPA_DEPLOYMENT_NAME) gpa.deployment = env.GPA_DEPLOYMENT_NAME;
    if (apiKey) gpa.apiKey = apiKey;

    const ums: NonNullable<NonNullable<ConfigOverrides['agents']>['ums']> = {};
    if (env.UMS_AGENT_ENDPOINT) ums.endpoint = env.UMS_AGENT_ENDPOINT;

    const logging: Partial<LoggingConfig> = {};
    const level = env.LOG_LEVEL?.toLowerCase();
    if (level === 'error' || level === 'warn' || level === 'info' || level === 'debug') {
      logging.level = level;
    }
    if (env.SWITCHBOARD_LOG_DIR) logging.dir = env.SWITCHBOARD_LOG_DIR;

    const envConfig: ConfigOverrides = {
      ...(Object.keys(llm).length > 0 && { llm }),
      ...((Object.keys(gpa).length > 0 || Object.keys(ums).length > 0) && {
        agents: {
          ...(Object.keys(gpa).length > 0 && { gpa }),
          ...(Object.keys(ums).length > 0 && { ums }),
        },
      }),
      ...(Object.keys(logging).length > 0 && { logging }),
    };

    return Object.keys(envConfig).length > 0 ? envConfig : null;
  }

  private async loadDotEnv(projectRoot?: string): Promise<Env> {
    const envPath = path.join(projectRoot ?? process.cwd(), '.env');
    try {
      if (!(await this.fs.exists(envPath))) {
        return {};
      }
      return dotenv.parse(await this.fs.readFile(envPath));
    } catch (error) {
      logger.warn('Failed to load .env config', { path: envPath, error });
      return {};
    }
  }

  private merge(base: ConfigOverrides, override: ConfigOverrides): ConfigOverrides {
    return {
      llm: { ...base.llm, ...override.llm },
      agents: {
        gpa: { ...base.agents?.gpa, ...override.agents?.gpa },
        ums: { ...base.agents?.ums, ...override.agents?.ums },
      },
      logging: { ...base.logging, ...override.logging },
    };
  }
}
