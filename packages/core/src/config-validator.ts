import JSON5 from 'json5';
import { readFileSync } from 'node:fs';
import { isAbsolute } from 'node:path';
import { DEFAULT_CONFIG, type VagrantMcpConfig } from './config.js';
import { applyEnvOverrides, applyVagrantEnv } from './config-env-overlay.js';
import { isLogLevel } from './logger.js';
import { deepMerge, isRecord } from './utils.js';

/** Sections accepted at the top level of a config file. */
const VALID_TOP_LEVEL_KEYS = new Set<string>(['server', 'vagrant', 'logging']);

/** Environment variable naming an optional JSON5 config file. */
export const CONFIG_PATH_ENV = 'VAGRANT_MCP_CONFIG';

export interface ConfigValidationError {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  config?: VagrantMcpConfig;
}

export interface LoadConfigOptions {
  /** Environment to read; defaults to `process.env`. */
  env?: Record<string, string | undefined>;
  /** File reader; defaults to `readFileSync(path, 'utf-8')`. */
  readFile?: (filePath: string) => string;
}

/**
 * Parse a JSON5 config file body, merge it over the defaults, apply the
 * environment layers from `env` and validate the result.
 * Rejects unknown top-level keys (strict mode).
 */
export function validateConfig(
  json5String: string,
  env: Record<string, string | undefined> = {},
): ConfigValidationResult {
  const parsed = parseConfigFile(json5String);
  if (!parsed.ok) {
    return { valid: false, errors: parsed.errors };
  }

  const merged = deepMerge(cloneDefaults(), parsed.value);
  applyEnvOverrides(merged, env);
  applyVagrantEnv(merged, env);

  return checkConfig(merged);
}

/**
 * Resolve the effective configuration: defaults, then the optional JSON5
 * file named by `VAGRANT_MCP_CONFIG`, then `VAGRANT_MCP_*` overrides, then
 * `VAGRANT_PROJECTS_DIR` / `VAGRANT_HOME`.
 */
export function loadConfig(options: LoadConfigOptions = {}): ConfigValidationResult {
  const env = options.env ?? process.env;
  const readFile = options.readFile ?? ((filePath: string) => readFileSync(filePath, 'utf-8'));

  const filePath = env[CONFIG_PATH_ENV];
  let content = '{}';
  if (filePath) {
    try {
      content = readFile(filePath);
    } catch (err) {
      return {
        valid: false,
        errors: [{ path: '', message: `Cannot read config file: ${String(err)}` }],
      };
    }
  }

  return validateConfig(content, env);
}

type ParseOutcome =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; errors: ConfigValidationError[] };

function parseConfigFile(json5String: string): ParseOutcome {
  let parsed: unknown;
  try {
    parsed = JSON5.parse(json5String);
  } catch (err) {
    return {
      ok: false,
      errors: [{ path: '', message: `Invalid JSON5: ${String(err)}` }],
    };
  }

  if (!isRecord(parsed)) {
    return {
      ok: false,
      errors: [{ path: '', message: 'Config must be an object' }],
    };
  }

  const errors: ConfigValidationError[] = [];
  for (const key of Object.keys(parsed)) {
    if (!VALID_TOP_LEVEL_KEYS.has(key)) {
      errors.push({ path: key, message: `Unknown top-level key: "${key}"` });
    }
  }
  for (const key of VALID_TOP_LEVEL_KEYS) {
    if (key in parsed && !isRecord(parsed[key])) {
      errors.push({ path: key, message: `Section "${key}" must be an object` });
    }
  }

  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: parsed };
}

function cloneDefaults(): Record<string, unknown> {
  const clone: unknown = JSON.parse(JSON.stringify(DEFAULT_CONFIG));
  return isRecord(clone) ? clone : {};
}

/**
 * Validate a merged config object and build the typed configuration from it.
 */
export function checkConfig(candidate: Record<string, unknown>): ConfigValidationResult {
  const errors: ConfigValidationError[] = [];
  const reader = new SectionReader(errors);

  const server = reader.section(candidate, 'server');
  const vagrant = reader.section(candidate, 'vagrant');
  const timeouts = reader.section(vagrant, 'timeouts', 'vagrant.timeouts');
  const logging = reader.section(candidate, 'logging');

  const projectsDir = reader.string(vagrant, 'projectsDir', 'vagrant.projectsDir');
  if (projectsDir && !isAbsolute(projectsDir)) {
    errors.push({ path: 'vagrant.projectsDir', message: 'Must be an absolute path' });
  }

  const level = logging['level'];
  if (!isLogLevel(level)) {
    errors.push({
      path: 'logging.level',
      message: `Must be one of debug, info, warn, error (got ${JSON.stringify(level)})`,
    });
  }

  const config: VagrantMcpConfig = {
    server: {
      name: reader.string(server, 'name', 'server.name'),
      version: reader.string(server, 'version', 'server.version'),
    },
    vagrant: {
      binary: reader.string(vagrant, 'binary', 'vagrant.binary'),
      projectsDir,
      home: reader.optionalString(vagrant, 'home', 'vagrant.home'),
      passthroughEnv: reader.stringList(vagrant, 'passthroughEnv', 'vagrant.passthroughEnv'),
      timeouts: {
        defaultMs: reader.duration(timeouts, 'defaultMs', 'vagrant.timeouts.defaultMs'),
        healthCheckMs: reader.duration(timeouts, 'healthCheckMs', 'vagrant.timeouts.healthCheckMs'),
        tools: reader.durationMap(timeouts, 'tools', 'vagrant.timeouts.tools'),
      },
    },
    logging: {
      level: isLogLevel(level) ? level : 'info',
    },
  };

  return errors.length === 0
    ? { valid: true, errors, config }
    : { valid: false, errors };
}

/** Reads typed values out of loosely-typed sections, collecting errors. */
class SectionReader {
  constructor(private readonly errors: ConfigValidationError[]) {}

  section(parent: Record<string, unknown>, key: string, path = key): Record<string, unknown> {
    const value = parent[key];
    if (isRecord(value)) return value;
    this.errors.push({ path, message: `Section "${path}" must be an object` });
    return {};
  }

  string(section: Record<string, unknown>, key: string, path: string): string {
    const value = section[key];
    if (typeof value === 'string' && value.trim() !== '') return value;
    this.errors.push({ path, message: 'Must be a non-empty string' });
    return '';
  }

  optionalString(section: Record<string, unknown>, key: string, path: string): string | undefined {
    if (section[key] === undefined) return undefined;
    return this.string(section, key, path);
  }

  /** Accepts an array of strings or a comma-separated string (env overrides). */
  stringList(section: Record<string, unknown>, key: string, path: string): string[] {
    const value = section[key];
    if (value === undefined) return [];
    if (typeof value === 'string') {
      return value
        .split(',')
        .map((s) => s.trim())
        .filter((s) => s !== '');
    }
    if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
      return [...value];
    }
    this.errors.push({ path, message: 'Must be an array of strings' });
    return [];
  }

  duration(section: Record<string, unknown>, key: string, path: string): number {
    const value = section[key];
    if (typeof value === 'number' && Number.isFinite(value) && value > 0) return value;
    this.errors.push({ path, message: 'Must be a positive number of milliseconds' });
    return 0;
  }

  durationMap(section: Record<string, unknown>, key: string, path: string): Record<string, number> {
    const value = section[key];
    if (value === undefined) return {};
    if (!isRecord(value)) {
      this.errors.push({ path, message: `Section "${path}" must be an object` });
      return {};
    }
    const result: Record<string, number> = {};
    for (const name of Object.keys(value)) {
      result[name] = this.duration(value, name, `${path}.${name}`);
    }
    return result;
  }
}
