import { existsSync, readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { isPlainObject } from '../expression/filters.ts';
import { type Config, ConfigSchema } from '../parser/config-schema.ts';
import { formatZodError } from '../parser/workflow-validator.ts';
import { ConsoleLogger, type Logger } from './logger.ts';
import { deepMerge } from './merge.ts';
import { PathResolver } from './paths.ts';

export class ConfigLoader {
  private static instance: Config | undefined;
  private static logger: Logger = new ConsoleLogger();

  /**
   * Replace `${VAR}` and `$VAR` with environment values; unset variables become empty
   */
  static interpolateEnv(content: string, env: NodeJS.ProcessEnv = process.env): string {
    return content.replace(
      /\$\{([^}]+)\}|\$([a-zA-Z_][a-zA-Z0-9_]*)/g,
      (_match: string, braced: string | undefined, bare: string | undefined) =>
        env[braced ?? bare ?? ''] ?? ''
    );
  }

  static load(logger: Logger = ConfigLoader.logger): Config {
    if (ConfigLoader.instance) return ConfigLoader.instance;

    let merged: Record<string, unknown> = {};
    // Lowest precedence first: user, then project, then $RUNBOOK_CONFIG
    for (const path of [...PathResolver.getConfigPaths()].reverse()) {
      if (!existsSync(path)) continue;
      try {
        const content = ConfigLoader.interpolateEnv(readFileSync(path, 'utf8'));
        const parsed: unknown = yaml.load(content);
        if (parsed === undefined || parsed === null) continue;
        if (!isPlainObject(parsed)) {
          logger.warn(`Warning: Ignoring config ${path}: expected a mapping at the top level`);
          continue;
        }
        merged = deepMerge(merged, parsed);
      } catch (error) {
        logger.warn(
          `Warning: Failed to load config from ${path}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    const result = ConfigSchema.safeParse(merged);
    if (result.success) {
      ConfigLoader.instance = result.data;
    } else {
      logger.warn(`Warning: Invalid configuration, using defaults:\n${formatZodError(result.error)}`);
      ConfigLoader.instance = ConfigSchema.parse({});
    }
    return ConfigLoader.instance;
  }

  /**
   * For testing purposes, manually set the configuration
   */
  static setConfig(config: Config): void {
    ConfigLoader.instance = config;
  }

  static setLogger(logger: Logger): void {
    ConfigLoader.logger = logger;
  }

  /**
   * For testing purposes, clear the cached configuration
   */
  static clear(): void {
    ConfigLoader.instance = undefined;
  }
}
