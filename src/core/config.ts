/**
 * @fileoverview Configuration providers.
 *
 * {@link FileConfigProvider} reads `toolwright.config.json`, validates it
 * against {@link configSchema} with Ajv, and lets environment variables
 * override single keys: `git.statusTimeoutMs` is overridden by
 * `TOOLWRIGHT_GIT_STATUS_TIMEOUT_MS`, `logging.debug.git` by
 * `TOOLWRIGHT_LOGGING_DEBUG_GIT`. Environment values are parsed as JSON when
 * they parse, and kept as strings otherwise.
 *
 * @module core/config
 */

import * as path from 'path';
import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import type { IConfigProvider } from '../interfaces/IConfigProvider';
import type { IFileSystem } from '../interfaces/IFileSystem';
import { ConfigurationError } from './errors';
import { configSchema } from './configSchema';

/** File name looked up in the working directory when no path is given. */
export const DEFAULT_CONFIG_FILE = 'toolwright.config.json';

/** Prefix of environment variables that override configuration keys. */
export const ENV_PREFIX = 'TOOLWRIGHT_';

const ajv = new Ajv({
  allErrors: true,
  strict: true,
  removeAdditional: false,
  useDefaults: false,
  coerceTypes: false,
});

let validateConfig: ValidateFunction | undefined;

function getValidator(): ValidateFunction {
  if (!validateConfig) {
    validateConfig = ajv.compile(configSchema);
  }
  return validateConfig;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return ['Validation failed (no details available)'];
  }
  return errors.map(err => {
    const where = err.instancePath || '(root)';
    if (err.keyword === 'additionalProperties') {
      return `${where}: unknown property '${String(err.params.additionalProperty)}'`;
    }
    return `${where}: ${err.message ?? 'is invalid'}`;
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True when a stored value has the same runtime shape as the default it
 * stands in for.
 */
function sameKind<T>(value: unknown, defaultValue: T): value is T {
  if (value === undefined) {
    return false;
  }
  if (Array.isArray(defaultValue)) {
    return Array.isArray(value);
  }
  if (defaultValue === null) {
    return value === null;
  }
  return typeof value === typeof defaultValue && (typeof value !== 'object' || isRecord(value));
}

/**
 * Convert a configuration path to its environment variable name.
 *
 * @example envVarName('git', 'statusTimeoutMs') === 'TOOLWRIGHT_GIT_STATUS_TIMEOUT_MS'
 */
export function envVarName(section: string, key: string): string {
  const parts = [...section.split('.'), key].filter(part => part.length > 0);
  return ENV_PREFIX + parts
    .map(part => part.replace(/([a-z0-9])([A-Z])/g, '$1_$2').replace(/[^A-Za-z0-9]/g, '_').toUpperCase())
    .join('_');
}

function parseEnvValue(raw: string): unknown {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}

/**
 * Options for {@link FileConfigProvider.load}.
 */
export interface FileConfigOptions {
  /** Explicit config file; a missing explicit file is an error. */
  filePath?: string;
  /** Directory searched for {@link DEFAULT_CONFIG_FILE} when no path is given. */
  cwd: string;
  /** Environment consulted for overrides. */
  env: Record<string, string | undefined>;
  fileSystem: IFileSystem;
}

/**
 * Configuration backed by an optional JSON file plus environment overrides.
 */
export class FileConfigProvider implements IConfigProvider {
  private constructor(
    private readonly values: Record<string, unknown>,
    private readonly env: Record<string, string | undefined>,
    readonly source: string | undefined,
  ) {}

  /**
   * Load and validate the configuration file.
   *
   * @throws ConfigurationError when the file is unreadable, is not JSON, or
   *   fails schema validation
   */
  static load(options: FileConfigOptions): FileConfigProvider {
    const explicit = options.filePath !== undefined;
    const filePath = options.filePath ?? path.join(options.cwd, DEFAULT_CONFIG_FILE);

    if (!options.fileSystem.existsSync(filePath)) {
      if (explicit) {
        throw new ConfigurationError(`Configuration file not found: ${filePath}`);
      }
      return new FileConfigProvider({}, options.env, undefined);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(options.fileSystem.readFileSync(filePath));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Cannot read configuration file ${filePath}: ${reason}`);
    }

    return FileConfigProvider.fromObject(parsed, options.env, filePath);
  }

  /**
   * Validate an already-parsed configuration object.
   */
  static fromObject(
    value: unknown,
    env: Record<string, string | undefined> = {},
    source?: string,
  ): FileConfigProvider {
    const validate = getValidator();
    if (!validate(value) || !isRecord(value)) {
      throw new ConfigurationError(
        `Invalid configuration${source ? ` in ${source}` : ''}`,
        formatErrors(validate.errors),
      );
    }
    return new FileConfigProvider(value, env, source);
  }

  getConfig<T>(section: string, key: string, defaultValue: T): T {
    const raw = this.env[envVarName(section, key)];
    if (raw !== undefined) {
      const override = parseEnvValue(raw);
      if (sameKind(override, defaultValue)) {
        return override;
      }
      // A string default accepts the raw text even when it parses as JSON.
      if (sameKind(raw, defaultValue)) {
        return raw;
      }
    }

    const stored = this.lookup(section, key);
    return sameKind(stored, defaultValue) ? stored : defaultValue;
  }

  private lookup(section: string, key: string): unknown {
    let node: unknown = this.values;
    for (const part of [...section.split('.'), key]) {
      if (part.length === 0) {
        continue;
      }
      if (!isRecord(node)) {
        return undefined;
      }
      node = node[part];
    }
    return node;
  }
}

/**
 * Configuration held in memory, keyed by `section.key`.
 *
 * @example
 * ```typescript
 * const config = new InMemoryConfigProvider({ 'git.statusTimeoutMs': 100 });
 * config.getConfig('git', 'statusTimeoutMs', 5000); // 100
 * ```
 */
export class InMemoryConfigProvider implements IConfigProvider {
  private readonly values: Map<string, unknown>;

  constructor(values: Record<string, unknown> = {}) {
    this.values = new Map(Object.entries(values));
  }

  set(section: string, key: string, value: unknown): void {
    this.values.set(`${section}.${key}`, value);
  }

  getConfig<T>(section: string, key: string, defaultValue: T): T {
    const value = this.values.get(`${section}.${key}`);
    return sameKind(value, defaultValue) ? value : defaultValue;
  }
}
