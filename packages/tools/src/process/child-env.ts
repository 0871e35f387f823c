/** Parent variables every Vagrant child needs to find binaries, keys and locale. */
const BASE_VARIABLES = [
  'PATH',
  'HOME',
  'USER',
  'LOGNAME',
  'SHELL',
  'LANG',
  'LC_ALL',
  'TMPDIR',
  'SSH_AUTH_SOCK',
  // Windows hosts
  'SystemRoot',
  'USERPROFILE',
  'APPDATA',
  'LOCALAPPDATA',
] as const;

export interface ChildEnvOptions {
  /** Exported as `VAGRANT_HOME` when set. */
  vagrantHome?: string;
  /** Extra parent variable names to copy through. */
  passthrough?: readonly string[];
}

/**
 * Build the explicit environment for a Vagrant child process.
 *
 * Only the listed parent variables are copied; the rest of the server's
 * environment (tokens, unrelated config) never reaches the child.
 * Colour output is disabled so responses carry plain text.
 */
export function buildChildEnv(
  options: ChildEnvOptions = {},
  parentEnv: Record<string, string | undefined> = process.env,
): Record<string, string> {
  const env: Record<string, string> = {};

  for (const name of [...BASE_VARIABLES, ...(options.passthrough ?? [])]) {
    const value = parentEnv[name];
    if (value !== undefined) env[name] = value;
  }

  if (options.vagrantHome) {
    env['VAGRANT_HOME'] = options.vagrantHome;
  }
  env['VAGRANT_NO_COLOR'] = '1';

  return env;
}
