/**
 * MEPS Reader CLI Configuration Management
 *
 * Loads configuration from .meps-readerrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (MEPS_READER_*)
 * 3. Config file (.meps-readerrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_DOWNLOAD_DIR, DEFAULT_MEPS_BASE_URL } from '../../providers/meps-remote-source.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PathsConfig {
  /** Local directory searched for `.ssp` files */
  readonly data: string;
  /** Where remote fetches are written */
  readonly downloads: string;
}

export interface MepsServiceConfig {
  readonly baseUrl: string;
  readonly timeout: number;
  readonly retries: number;
}

export interface NamesConfig {
  /** Remote name table URL, consulted with --web */
  readonly url?: string;
  /** Local name table path (default: bundled table) */
  readonly table?: string;
}

export interface CLIConfig {
  readonly version: number;
  readonly paths: PathsConfig;
  readonly services: {
    readonly meps: MepsServiceConfig;
    readonly names: NamesConfig;
  };

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Prefer the MEPS website over the local directory */
  readonly web: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure
 */
const ConfigFileSchema = z
  .object({
    version: z.number().int().optional(),
    paths: z
      .object({
        data: z.string().optional(),
        downloads: z.string().optional(),
      })
      .optional(),
    services: z
      .object({
        meps: z
          .object({
            base_url: z.string().optional(),
            timeout: z.number().int().optional(),
            retries: z.number().int().optional(),
          })
          .optional(),
        names: z
          .object({
            url: z.string().optional(),
            table: z.string().optional(),
          })
          .optional(),
      })
      .optional(),
    web: z.boolean().optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'web' | 'configPath'> = {
  version: 1,

  paths: {
    data: '.',
    downloads: DEFAULT_DOWNLOAD_DIR,
  },

  services: {
    meps: {
      baseUrl: DEFAULT_MEPS_BASE_URL,
      timeout: 120000,
      retries: 3,
    },
    names: {},
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.meps-readerrc',
  '.meps-readerrc.yaml',
  '.meps-readerrc.yml',
  '.meps-readerrc.json',
];

const ENV_PREFIX = 'MEPS_READER_';

/**
 * Find config file in the start directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    if (dir === root) {
      return null;
    }
    dir = resolve(dir, '..');
  }
}

/**
 * Parse and validate config file content
 */
function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');
  // YAML is a superset of JSON, so one parser covers both
  const raw: unknown = parseYaml(content) ?? {};
  const result = ConfigFileSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config file ${filePath}: ${issues}`);
  }

  return result.data;
}

class EnvReader {
  constructor(private readonly env: NodeJS.ProcessEnv) {}

  string(name: string): string | undefined {
    const value = this.env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === '' ? undefined : value;
  }

  bool(name: string): boolean | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  }

  number(name: string): number | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    const num = parseInt(value, 10);
    return isNaN(num) ? undefined : num;
  }
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** Environment (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    web?: boolean;
    timeout?: number;
    dir?: string;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws Error if an explicit config path does not exist or a file is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = new EnvReader(options.env ?? process.env);
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? env.string('CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  // Relative paths in a config file are relative to that file
  const fileBase = configPath ? resolve(configPath, '..') : cwd;
  const fromFile = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : resolve(fileBase, path);

  const namesUrl = env.string('NAMES_URL') ?? fileConfig.services?.names?.url;
  const namesTable = env.string('NAMES_TABLE') ?? fromFile(fileConfig.services?.names?.table);

  return {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    paths: {
      data:
        overrides.dir ??
        env.string('DATA_DIR') ??
        fromFile(fileConfig.paths?.data) ??
        DEFAULT_CONFIG.paths.data,
      downloads:
        env.string('DOWNLOAD_DIR') ??
        fromFile(fileConfig.paths?.downloads) ??
        DEFAULT_CONFIG.paths.downloads,
    },

    services: {
      meps: {
        baseUrl:
          env.string('BASE_URL') ??
          fileConfig.services?.meps?.base_url ??
          DEFAULT_CONFIG.services.meps.baseUrl,
        timeout:
          overrides.timeout ??
          env.number('TIMEOUT') ??
          fileConfig.services?.meps?.timeout ??
          DEFAULT_CONFIG.services.meps.timeout,
        retries:
          env.number('RETRIES') ??
          fileConfig.services?.meps?.retries ??
          DEFAULT_CONFIG.services.meps.retries,
      },
      names: {
        ...(namesUrl !== undefined && { url: namesUrl }),
        ...(namesTable !== undefined && { table: namesTable }),
      },
    },

    verbose: overrides.verbose ?? env.bool('VERBOSE') ?? false,
    json: overrides.json ?? env.bool('JSON') ?? false,
    web: overrides.web ?? env.bool('WEB') ?? fileConfig.web ?? false,
    configPath,
  };
}

function isValidUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Validate configuration
 *
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new Error(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  if (config.services.meps.timeout <= 0) {
    throw new Error('Timeout must be a positive number');
  }

  if (config.services.meps.retries < 0 || config.services.meps.retries > 10) {
    throw new Error('Retries must be between 0 and 10');
  }

  for (const [label, url] of [
    ['services.meps.base_url', config.services.meps.baseUrl],
    ['services.names.url', config.services.names.url],
  ] as const) {
    if (url !== undefined && !isValidUrl(url)) {
      throw new Error(`Invalid URL for ${label}: ${url}`);
    }
  }
}
