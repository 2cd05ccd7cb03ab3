import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { basename, dirname } from 'node:path';
import yaml from 'js-yaml';
import { ConfigurationDataSchema } from './schema.js';
import { Configuration, createDefaultConfiguration } from './configuration.js';
import { ConfigParseError, formatError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Loads and persists a Configuration at a given path.
 * Implementations do not cache; the resolver owns the loaded instance.
 */
export interface ConfigStore {
  /** Parse the file at fullPath, or write and return the defaults when it is missing. */
  loadOrCreate(fullPath: string): Configuration;
  /** Write the configuration back to its filePath. */
  save(config: Configuration): void;
}

/**
 * YAML-backed ConfigStore. Validation goes through Zod; any failure to read
 * an existing file is fatal and surfaces as ConfigParseError.
 */
export class YamlConfigStore implements ConfigStore {
  constructor(private readonly logger: Logger = silentLogger) {}

  loadOrCreate(fullPath: string): Configuration {
    if (existsSync(fullPath)) {
      return this.load(fullPath);
    }

    this.logger.info(`No ${basename(fullPath)} found. Creating default at ${fullPath}`);
    const config = createDefaultConfiguration(fullPath);
    this.save(config);
    return config;
  }

  save(config: Configuration): void {
    const content = yaml.dump(config.toData(), {
      indent: 2,
      lineWidth: 100,
      noRefs: true,
    });
    mkdirSync(dirname(config.filePath), { recursive: true });
    writeFileSync(config.filePath, content, 'utf-8');
    this.logger.verbose(`Saved ${config.filePath}`);
  }

  private load(fullPath: string): Configuration {
    const raw = readFileSync(fullPath, 'utf-8');

    let parsed: unknown;
    try {
      parsed = yaml.load(raw);
    } catch (err) {
      throw new ConfigParseError(fullPath, formatError(err), { cause: err });
    }

    // An empty file loads as undefined; treat it like an empty mapping.
    const result = ConfigurationDataSchema.safeParse(parsed ?? {});
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new ConfigParseError(fullPath, `${where}${issue?.message ?? 'invalid configuration'}`, {
        cause: result.error,
      });
    }

    this.logger.verbose(`Loaded ${fullPath}`);
    return new Configuration(fullPath, result.data);
  }
}
