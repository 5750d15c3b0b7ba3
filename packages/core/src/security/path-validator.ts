// ============================================
// Path Validator
// ============================================
// Containment check gating every file read. Both the root and the
// requested path are canonicalized (symlinks and `..` resolved) before
// comparing, so a link planted inside the root cannot reach outside it.

import * as fs from "node:fs";
import * as path from "node:path";
import { NotFoundError, SecurityError } from "../errors/index.js";

/** Upper bound on symlink hops while canonicalizing (matches Linux ELOOP) */
const MAX_SYMLINK_DEPTH = 40;

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Resolve an absolute path to its canonical form.
 *
 * Existing paths go through `realpath`. For a path that does not exist, the
 * parent is canonicalized recursively and the last segment re-attached; if
 * that segment is a dangling symlink its link text is followed instead.
 */
export function canonicalizePath(target: string, depth = 0): string {
  try {
    return fs.realpathSync.native(target);
  } catch (error) {
    const code = errnoCode(error);
    if (code === "ELOOP") {
      throw new SecurityError("Access denied: too many symbolic links");
    }
    if (code !== "ENOENT" && code !== "ENOTDIR") {
      throw error;
    }
  }

  const parent = path.dirname(target);
  if (parent === target) {
    return target;
  }

  const candidate = path.join(canonicalizePath(parent, depth), path.basename(target));

  let stats: fs.Stats | undefined;
  try {
    stats = fs.lstatSync(candidate);
  } catch {
    stats = undefined;
  }

  if (stats?.isSymbolicLink()) {
    if (depth >= MAX_SYMLINK_DEPTH) {
      throw new SecurityError("Access denied: too many symbolic links");
    }
    const linkText = fs.readlinkSync(candidate);
    return canonicalizePath(path.resolve(path.dirname(candidate), linkText), depth + 1);
  }

  return candidate;
}

/**
 * Whether `child` equals `root` or lies beneath it. Both must be canonical.
 */
export function isContained(child: string, root: string): boolean {
  const relative = path.relative(root, child);
  if (relative === "") {
    return true;
  }
  return relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

/**
 * Validate that a requested path resolves inside the root directory.
 *
 * @param requested - Path as received from the client, relative to root (absolute paths are
 *   taken as-is and must still land inside root)
 * @param root - Directory being served
 * @returns Canonical absolute path of the requested file or directory
 * @throws SecurityError when the canonical path is outside root, for existing and missing targets alike
 * @throws NotFoundError when the path is inside root but does not exist
 *
 * @example
 * ```typescript
 * validatePath("guide/intro.md", "/srv/docs"); // "/srv/docs/guide/intro.md"
 * validatePath("../etc/passwd", "/srv/docs");  // throws SecurityError
 * ```
 */
export function validatePath(requested: string, root: string): string {
  if (requested.includes("\0")) {
    throw new SecurityError("Access denied: invalid path");
  }

  const canonicalRoot = canonicalizePath(path.resolve(root));
  // Lexical: "link/../x" names root/x, not the parent of the link's target
  const nominal = path.resolve(canonicalRoot, requested);
  const canonical = canonicalizePath(nominal);

  if (!isContained(canonical, canonicalRoot)) {
    throw new SecurityError(undefined, { context: { requested } });
  }

  if (!fs.existsSync(canonical)) {
    throw new NotFoundError(`Path not found: ${requested}`);
  }

  return canonical;
}

/**
 * Non-throwing variant of {@link validatePath}.
 */
export function isSafePath(requested: string, root: string): boolean {
  try {
    validatePath(requested, root);
    return true;
  } catch (error) {
    if (error instanceof SecurityError || error instanceof NotFoundError) {
      return false;
    }
    throw error;
  }
}
