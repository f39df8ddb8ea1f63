import * as path from 'node:path';
import * as fs from 'node:fs';
import { minimatch } from 'minimatch';

export type PathAccess = 'read' | 'write';

export interface PathGuardResult {
  allowed: boolean;
  resolved?: string;
  relative?: string;
  reason?: string;
}

export interface PathRules {
  /** Never readable or writable through the file tools. */
  denyGlobs: string[];
  /** Readable, but only the engine itself may write them. */
  protectedGlobs: string[];
}

/**
 * Resolve a path through symlinks, walking up to the nearest existing ancestor
 * if the path itself doesn't exist yet (e.g., for create/write operations).
 */
export function resolveWithAncestors(targetPath: string): string {
  const absPath = path.resolve(targetPath);
  try {
    return fs.realpathSync(absPath);
  } catch {
    let current = absPath;
    const tail: string[] = [];
    while (true) {
      const parent = path.dirname(current);
      tail.unshift(path.basename(current));
      if (parent === current) {
        return absPath;
      }
      current = parent;
      try {
        const resolvedParent = fs.realpathSync(current);
        return path.join(resolvedParent, ...tail);
      } catch {
        // Keep walking up
      }
    }
  }
}

function isUnderRoot(resolved: string, resolvedRoot: string): boolean {
  if (resolved === resolvedRoot) return true;
  const prefix = resolvedRoot.endsWith(path.sep) ? resolvedRoot : resolvedRoot + path.sep;
  return resolved.startsWith(prefix);
}

/**
 * Project-relative, forward-slash form of `targetPath` (resolved against
 * `projectRoot` when relative), or null when it lands outside the project.
 */
export function projectRelative(targetPath: string, projectRoot: string): string | null {
  const root = resolveWithAncestors(projectRoot);
  const resolved = resolveWithAncestors(path.resolve(root, targetPath));
  if (!isUnderRoot(resolved, root)) return null;
  return path.relative(root, resolved).split(path.sep).join('/');
}

export function matchingGlob(relative: string, globs: string[]): string | null {
  for (const glob of globs) {
    if (minimatch(relative, glob, { dot: true })) return glob;
  }
  return null;
}

export function validatePath(
  targetPath: string,
  projectRoot: string,
  rules: PathRules,
  access: PathAccess,
): PathGuardResult {
  if (!targetPath || targetPath.includes('\0')) {
    return { allowed: false, reason: 'Invalid path: empty or contains null byte' };
  }

  const root = resolveWithAncestors(projectRoot);
  const resolved = resolveWithAncestors(path.resolve(root, targetPath));

  if (!isUnderRoot(resolved, root)) {
    return { allowed: false, resolved, reason: 'Path is outside the project root' };
  }

  const relative = path.relative(root, resolved).split(path.sep).join('/');

  const denied = matchingGlob(relative, rules.denyGlobs);
  if (denied) {
    return { allowed: false, resolved, relative, reason: `Path matches deny glob: ${denied}` };
  }

  if (access === 'write') {
    const guarded = matchingGlob(relative, rules.protectedGlobs);
    if (guarded) {
      return { allowed: false, resolved, relative, reason: `Path is protected: ${guarded}` };
    }
  }

  return { allowed: true, resolved, relative };
}
