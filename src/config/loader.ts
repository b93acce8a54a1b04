// Configuration loading logic
import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { existsSync } from 'fs';
import { AllocatorConfig } from '../types';
import { ConfigLoader, ConfigValidationResult } from './types';
import { validateAndNormalizeConfig, validateConfig } from './validator';

export const DEFAULT_CONFIG_PATHS = ['./allocator.yml', './allocator.yaml', './allocator.json'];

type ConfigObject = Record<string, unknown>;

function isConfigObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration loader that supports YAML and JSON files with environment variable substitution
 */
export class AllocatorConfigLoader implements ConfigLoader {

  /**
   * Load and parse configuration from a file
   * @param path - Path to the configuration file (YAML or JSON)
   */
  async load(path: string): Promise<AllocatorConfig> {
    try {
      if (!existsSync(path)) {
        throw new Error(`Configuration file not found: ${path}`);
      }

      const content = await readFile(path, 'utf-8');

      const rawConfig = this.parse(path, content);
      const configWithEnvVars = this.resolveEnvironmentVariables(rawConfig);
      const prepared = this.fillTemplateNames(configWithEnvVars);

      return validateAndNormalizeConfig(prepared);
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to load configuration from ${path}: ${error.message}`);
      }
      throw new Error(`Failed to load configuration from ${path}: ${String(error)}`);
    }
  }

  /**
   * Validate configuration without loading from file
   */
  validate(config: unknown): ConfigValidationResult {
    return validateConfig(this.fillTemplateNames(config));
  }

  /**
   * Load configuration from the first path that yields a valid file
   */
  async loadFromPaths(searchPaths: string[]): Promise<AllocatorConfig> {
    const errors: string[] = [];

    for (const path of searchPaths) {
      try {
        return await this.load(path);
      } catch (error) {
        errors.push(`${path}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    throw new Error(`Could not load configuration from any of the specified paths:\n${errors.join('\n')}`);
  }

  private parse(path: string, content: string): unknown {
    if (path.endsWith('.json')) {
      return JSON.parse(content);
    }
    if (path.endsWith('.yml') || path.endsWith('.yaml')) {
      return parseYaml(content) ?? {};
    }
    throw new Error('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
  }

  /**
   * Recursively resolve environment variables in configuration object
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
   */
  private resolveEnvironmentVariables(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }

    if (isConfigObject(value)) {
      const result: ConfigObject = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(entry);
      }
      return result;
    }

    return value;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (_match: string, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = process.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      throw new Error(`Environment variable ${varName} is not set`);
    });
  }

  /**
   * Templates are keyed by name in the file; copy the key into `name` unless set.
   */
  private fillTemplateNames(config: unknown): unknown {
    if (!isConfigObject(config) || !isConfigObject(config.templates)) {
      return config;
    }

    const templates: ConfigObject = {};
    for (const [name, template] of Object.entries(config.templates)) {
      templates[name] = isConfigObject(template) ? this.deepMerge({ name }, template) : template;
    }
    return { ...config, templates };
  }

  /**
   * Deep merge two objects, with the second object taking precedence
   */
  private deepMerge(target: ConfigObject, source: ConfigObject): ConfigObject {
    const result: ConfigObject = { ...target };

    for (const [key, value] of Object.entries(source)) {
      const current = result[key];
      if (isConfigObject(value) && isConfigObject(current)) {
        result[key] = this.deepMerge(current, value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }
}

/**
 * Convenience function to create a new configuration loader
 */
export function createConfigLoader(): AllocatorConfigLoader {
  return new AllocatorConfigLoader();
}

/**
 * Load configuration from standard locations
 * Searches for allocator.yml, allocator.yaml, allocator.json in current directory
 */
export async function loadDefaultConfig(): Promise<AllocatorConfig> {
  return createConfigLoader().loadFromPaths(DEFAULT_CONFIG_PATHS);
}
