import * as path from "path";

/* ==================== PATH RESOLVER ==================== */

// Only `resolveTarget` builds one, so `absolutePath` is always the root or
// lies beneath it. It is a byte string: one latin1 char per filesystem byte.
export type ResolvedTarget = { readonly absolutePath: string };

// Filesystem paths are bytes. Carrying them as latin1 strings keeps names
// that are not valid UTF-8 intact through `path` arithmetic.
export function toByteString(utf8Path: string): string {
  return Buffer.from(utf8Path, "utf8").toString("latin1");
}

export function fsPath(byteString: string): Buffer {
  return Buffer.from(byteString, "latin1");
}

export class PathTraversalError extends Error {
  constructor(requestPath: string) {
    super(`path escapes root: ${JSON.stringify(requestPath)}`);
    this.name = "PathTraversalError";
  }
}

export function isWithinRoot(root: string, candidate: string): boolean {
  if (candidate === root) return true;
  const prefix = root.endsWith(path.sep) ? root : root + path.sep;
  return candidate.startsWith(prefix);
}

// Joins a decoded request path onto `root` (canonical, absolute), folding
// `.`, `..` and repeated separators without touching the filesystem.
export function resolveTarget(root: string, requestPath: string): ResolvedTarget {
  if (requestPath.includes("\0")) throw new PathTraversalError(requestPath);
  const absolutePath = path.resolve(root, "." + path.sep + requestPath);
  if (!isWithinRoot(root, absolutePath)) throw new PathTraversalError(requestPath);
  return { absolutePath };
}
