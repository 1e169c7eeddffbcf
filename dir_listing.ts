import * as fs from "fs/promises";
import * as path from "path";
import { percentEncode } from "./path_decoder";

/* ==================== DIRECTORY LISTER ==================== */

// `name` holds the raw bytes the filesystem returned.
export type DirectoryEntry = { name: Buffer; isDirectory: boolean };

const kHtmlEscapes: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(s: string): string {
  return s.replace(/[&<>"']/g, c => kHtmlEscapes[c] ?? c);
}

// Directories first, then byte-wise by name within each group.
export function compareEntries(a: DirectoryEntry, b: DirectoryEntry): number {
  if (a.isDirectory !== b.isDirectory) return a.isDirectory ? -1 : 1;
  return Buffer.compare(a.name, b.name);
}

// Immediate children only. Each child is classified with lstat, so a
// symlink to a directory is listed as a file. A child that vanishes
// between readdir and lstat is left out.
export async function readEntries(dirPath: string | Buffer): Promise<DirectoryEntry[]> {
  const dir = typeof dirPath === "string" ? Buffer.from(dirPath) : dirPath;
  const names = await fs.readdir(dir, { encoding: "buffer" });
  const entries: DirectoryEntry[] = [];
  for (const name of names) {
    try {
      const st = await fs.lstat(Buffer.concat([dir, Buffer.from(path.sep), name]));
      entries.push({ name, isDirectory: st.isDirectory() });
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") continue;
      throw err;
    }
  }
  return entries.sort(compareEntries);
}

// The href carries the exact bytes; the text is the name read as UTF-8.
function renderEntry(entry: DirectoryEntry): string {
  const suffix = entry.isDirectory ? "/" : "";
  const href = escapeHtml(percentEncode(entry.name) + suffix);
  return `<li><a href="${href}">${escapeHtml(entry.name.toString("utf8") + suffix)}</a></li>`;
}

// `displayPath` is the decoded request path, `baseHref` the raw one; the
// <base> keeps relative links right when the trailing '/' was left off.
export function renderListing(displayPath: string, baseHref: string, entries: DirectoryEntry[]): string {
  const title = escapeHtml(displayPath);
  const base = escapeHtml(baseHref.endsWith("/") ? baseHref : baseHref + "/");
  return [
    "<!DOCTYPE html>",
    "<html>",
    `<head><meta charset="utf-8"><base href="${base}"><title>Index of ${title}</title></head>`,
    "<body>",
    `<h1>Index of ${title}</h1>`,
    "<ul>",
    ...entries.map(renderEntry),
    "</ul></body></html>",
    "",
  ].join("\n");
}

export async function generateDirectoryListing(
  dirPath: string | Buffer,
  displayPath: string,
  baseHref: string,
): Promise<Buffer> {
  const entries = await readEntries(dirPath);
  return Buffer.from(renderListing(displayPath, baseHref, entries), "utf8");
}
