import { realpath } from "node:fs/promises";
import * as path from "node:path";

/**
 * True when the path contains a `..` segment or starts with `~`.
 */
export function hasPathTraversal(target: string): boolean {
  if (target.startsWith("~")) {
    return true;
  }
  return target.split(/[\\/]+/).includes("..");
}

function isMissingPathError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/**
 * Resolve symlinks in the longest prefix of `absolute` that exists, then
 * re-attach the part that does not exist yet.
 */
export async function resolveExistingPrefix(absolute: string): Promise<string> {
  const missing: string[] = [];
  let current = absolute;

  while (true) {
    try {
      const real = await realpath(current);
      return path.join(real, ...missing.reverse());
    } catch (error) {
      if (!isMissingPathError(error)) {
        throw error;
      }
      const parent = path.dirname(current);
      if (parent === current) {
        return absolute;
      }
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

/**
 * Whether `target` lies inside `root` (or is `root`) once both are resolved
 * through symlinks.
 *
 * @example
 * ```typescript
 * await isPathWithin("/work/src/a.ts", "/work");  // true
 * await isPathWithin("/work-old/a.ts", "/work");  // false
 * ```
 */
export async function isPathWithin(target: string, root: string): Promise<boolean> {
  const resolvedRoot = await resolveExistingPrefix(path.resolve(root));
  const resolvedTarget = await resolveExistingPrefix(path.resolve(target));

  if (resolvedTarget === resolvedRoot) {
    return true;
  }
  const prefix = resolvedRoot.endsWith(path.sep) ? resolvedRoot : `${resolvedRoot}${path.sep}`;
  return resolvedTarget.startsWith(prefix);
}
