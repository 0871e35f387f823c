const PREFIX = 'VAGRANT_MCP_';
const SEPARATOR = '__';

/** Variables consumed by the loader itself, never treated as overrides. */
const RESERVED = new Set(['VAGRANT_MCP_CONFIG']);

/**
 * Coerce a string value to a number, boolean, or leave as string.
 */
function coerce(value: string): string | number | boolean {
  // Boolean
  if (value === 'true') return true;
  if (value === 'false') return false;

  // Number (integer or float)
  if (/^-?\d+(\.\d+)?$/.test(value)) {
    const num = Number(value);
    if (Number.isFinite(num)) return num;
  }

  return value;
}

/**
 * Apply environment variable overrides to a config object.
 *
 * Variables must be prefixed with `VAGRANT_MCP_`. Nesting is expressed
 * with double-underscore (`__`). Segments match existing keys
 * case-insensitively, so camelCase keys can be addressed from upper-case
 * variable names. Values are coerced to numbers/booleans where possible,
 * except where the key already holds a string.
 *
 * Example: `VAGRANT_MCP_VAGRANT__TIMEOUTS__DEFAULTMS=5000`
 *   → `config.vagrant.timeouts.defaultMs = 5000`
 *
 * @param config The config object to mutate in-place.
 * @param env    Optional env map (defaults to `process.env`).
 * @returns The mutated config (same reference).
 */
export function applyEnvOverrides<T extends object>(
  config: T,
  env: Record<string, string | undefined> = process.env,
): T {
  for (const [key, rawValue] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || RESERVED.has(key) || rawValue === undefined) continue;

    const path = key
      .slice(PREFIX.length)
      .toLowerCase()
      .split(SEPARATOR);

    if (path.length === 0 || path.some((segment) => segment === '')) continue;

    // Keys whose current value is a string keep the raw text ("1.0" stays "1.0").
    setNested(config, path, (current) => (typeof current === 'string' ? rawValue : coerce(rawValue)));
  }

  return config;
}

/**
 * Apply the two canonical settings shared with the container image:
 * `VAGRANT_PROJECTS_DIR` and `VAGRANT_HOME`. They take precedence over
 * prefixed overrides.
 */
export function applyVagrantEnv<T extends object>(
  config: T,
  env: Record<string, string | undefined> = process.env,
): T {
  const projectsDir = env['VAGRANT_PROJECTS_DIR'];
  if (projectsDir) setNested(config, ['vagrant', 'projectsdir'], () => projectsDir);

  const home = env['VAGRANT_HOME'];
  if (home) setNested(config, ['vagrant', 'home'], () => home);

  return config;
}

/** Walk (creating as needed) to `path` and replace the leaf with `update(leaf)`. */
function setNested(obj: object, path: string[], update: (current: unknown) => unknown): void {
  let current: Record<string, unknown> = asRecord(obj);

  for (let i = 0; i < path.length - 1; i++) {
    const segment = matchKey(current, path[i] ?? '');
    const next = current[segment];

    if (next !== null && typeof next === 'object' && !Array.isArray(next)) {
      current = asRecord(next);
    } else {
      // Create intermediate object
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }

  const leaf = matchKey(current, path[path.length - 1] ?? '');
  current[leaf] = update(current[leaf]);
}

/** Find an existing key equal to `segment` ignoring case, else use `segment`. */
function matchKey(obj: Record<string, unknown>, segment: string): string {
  return Object.keys(obj).find((k) => k.toLowerCase() === segment) ?? segment;
}

function asRecord(obj: object): Record<string, unknown> {
  return obj as Record<string, unknown>;
}
