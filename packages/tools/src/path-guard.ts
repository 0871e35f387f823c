import { realpath, stat } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';
import { PathViolationError, ProjectNotFoundError } from './errors.js';

/**
 * Resolve the working directory for a call. `requested` is relative to
 * the projects root (an absolute path is accepted only when it lies inside
 * the root). Any parent-directory segment is rejected outright, before the
 * path is even normalized.
 */
export function resolveProjectDirectory(projectsRoot: string, requested?: string): string {
  const root = resolve(projectsRoot);
  if (requested === undefined || requested.trim() === '' || requested === '.') {
    return root;
  }

  if (requested.includes('\0')) {
    throw new PathViolationError(requested, 'contains a NUL byte');
  }

  const segments = requested.split(/[\\/]+/);
  if (segments.includes('..')) {
    throw new PathViolationError(requested, 'parent-directory segments are not allowed');
  }

  const target = isAbsolute(requested) ? resolve(requested) : resolve(root, requested);
  const rel = relative(root, target);
  if (rel === '') {
    return root;
  }
  if (rel.startsWith(`..${sep}`) || rel === '..' || isAbsolute(rel)) {
    throw new PathViolationError(requested, `resolves outside the projects root ${root}`);
  }

  return target;
}

/**
 * Follow symlinks on both sides and reject a directory whose real location
 * lies outside the real projects root. Missing paths are left to
 * {@link assertProjectReady}.
 */
export async function assertRealPathWithinRoot(projectsRoot: string, directory: string): Promise<void> {
  const [realRoot, realDirectory] = await Promise.all([
    realpathIfExists(projectsRoot),
    realpathIfExists(directory),
  ]);
  if (realRoot === undefined || realDirectory === undefined) {
    return;
  }

  const rel = relative(realRoot, realDirectory);
  if (rel.startsWith(`..${sep}`) || rel === '..' || isAbsolute(rel)) {
    throw new PathViolationError(
      directory,
      `links to ${realDirectory}, outside the projects root ${realRoot}`,
    );
  }
}

/**
 * Check that `directory` exists and, when required, holds a Vagrantfile.
 */
export async function assertProjectReady(
  directory: string,
  requireVagrantfile: boolean,
): Promise<void> {
  if (!(await isDirectory(directory))) {
    throw new ProjectNotFoundError(`Directory does not exist: ${directory}`);
  }
  if (requireVagrantfile && !(await isFile(join(directory, 'Vagrantfile')))) {
    throw new ProjectNotFoundError(`No Vagrantfile found in: ${directory}`);
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function realpathIfExists(path: string): Promise<string | undefined> {
  try {
    return await realpath(path);
  } catch (err) {
    if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      return undefined;
    }
    throw err;
  }
}
