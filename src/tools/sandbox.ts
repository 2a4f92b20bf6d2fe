import * as path from 'path';

/**
 * Resolve a model-supplied path against the scoped directory.
 * Returns null when the result would land outside of it.
 */
export function resolveScopedPath(workingDirectory: string, target?: string): string | null {
  const root = path.resolve(workingDirectory);
  const resolved = target ? path.resolve(root, target) : root;
  return isWithin(root, resolved) ? resolved : null;
}

export function isWithin(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === '') {
    return true;
  }
  if (path.isAbsolute(relative)) {
    return false;
  }
  return relative !== '..' && !relative.startsWith(`..${path.sep}`);
}

export function outsideDirectoryMessage(action: string, target: string): string {
  return `Error: Cannot ${action} "${target}" as it is outside the permitted working directory`;
}
