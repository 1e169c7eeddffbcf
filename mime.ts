import * as path from "path";

/* ==================== MIME CLASSIFIER ==================== */

export const kDefaultMimeType = "application/octet-stream";

// Built once at load time, shared read-only by every connection.
export const kMimeTable: ReadonlyMap<string, string> = new Map([
  [".html", "text/html"],
  [".htm", "text/html"],
  [".css", "text/css"],
  [".js", "application/javascript"],
  [".mjs", "application/javascript"],
  [".json", "application/json"],
  [".map", "application/json"],
  [".txt", "text/plain"],
  [".xml", "application/xml"],
  [".png", "image/png"],
  [".jpg", "image/jpeg"],
  [".jpeg", "image/jpeg"],
  [".gif", "image/gif"],
  [".webp", "image/webp"],
  [".svg", "image/svg+xml"],
  [".ico", "image/x-icon"],
  [".wasm", "application/wasm"],
  [".pdf", "application/pdf"],
]);

// Lookup is case-sensitive: "A.HTML" is not text/html.
export function mimeTypeFor(filePath: string): string {
  const ext = path.extname(filePath);
  return kMimeTable.get(ext) ?? kDefaultMimeType;
}
