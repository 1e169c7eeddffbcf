import type { Stats } from "fs";
import * as fs from "fs/promises";
import * as path from "path";
import type { ServerConfig } from "./config";
import { generateDirectoryListing } from "./dir_listing";
import type { HTTPRes } from "./http_message";
import { mimeTypeFor } from "./mime";
import { percentDecode, targetPath } from "./path_decoder";
import { PathTraversalError, ResolvedTarget, fsPath, resolveTarget, toByteString } from "./path_resolver";
import { fileResponse, htmlResponse, methodNotAllowed, notFound, serverError } from "./responder";

/* ==================== REQUEST HANDLER ==================== */

// What the protocol layer hands over for each request.
export type Request = Readonly<{ method: string; target: string }>;

export const kIndexFile = "index.html";

const kAbsentCodes: ReadonlySet<string> = new Set(["ENOENT", "ENOTDIR", "ENAMETOOLONG"]);

function errnoCode(err: unknown): string | undefined {
  if (!(err instanceof Error) || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export function isAbsent(err: unknown): boolean {
  const code = errnoCode(err);
  return code !== undefined && kAbsentCodes.has(code);
}

// Serves <dir>/index.html when it opens as a regular file.
async function serveIndex(dir: ResolvedTarget): Promise<HTTPRes | null> {
  let handle: fs.FileHandle;
  try {
    handle = await fs.open(fsPath(path.join(dir.absolutePath, kIndexFile)), "r");
  } catch {
    return null;
  }
  try {
    const st = await handle.stat();
    if (st.isFile()) return fileResponse(handle, st.size, "text/html");
  } catch (err) {
    await handle.close();
    throw err;
  }
  await handle.close();
  return null;
}

async function serveListing(dir: ResolvedTarget, displayPath: string, rawPath: string): Promise<HTTPRes | null> {
  try {
    return htmlResponse(await generateDirectoryListing(fsPath(dir.absolutePath), displayPath, rawPath));
  } catch (err) {
    if (isAbsent(err)) return null;
    throw err;
  }
}

async function serveDirectory(dir: ResolvedTarget, displayPath: string, rawPath: string): Promise<HTTPRes> {
  return (await serveIndex(dir)) ?? (await serveListing(dir, displayPath, rawPath)) ?? notFound();
}

async function serveTarget(target: ResolvedTarget, displayPath: string, rawPath: string): Promise<HTTPRes> {
  let handle: fs.FileHandle;
  try {
    handle = await fs.open(fsPath(target.absolutePath), "r");
  } catch (err) {
    if (errnoCode(err) !== "EISDIR" && !isAbsent(err)) throw err;
    return await serveDirectory(target, displayPath, rawPath);
  }

  let st: Stats;
  try {
    st = await handle.stat();
  } catch (err) {
    await handle.close();
    throw err;
  }
  if (st.isFile()) return fileResponse(handle, st.size, mimeTypeFor(target.absolutePath));

  await handle.close();
  if (st.isDirectory()) return await serveDirectory(target, displayPath, rawPath);
  return notFound(); // fifo, socket, device
}

// Every branch ends in exactly one response; nothing here throws.
export async function handleRequest(config: ServerConfig, req: Request): Promise<HTTPRes> {
  if (req.method !== "GET") return methodNotAllowed();

  const rawPath = targetPath(req.target);
  // bytes stay bytes up to the filesystem; UTF-8 is only for display
  const decoded = percentDecode(rawPath);
  const displayPath = decoded.toString("utf8");

  let target: ResolvedTarget;
  try {
    target = resolveTarget(toByteString(config.root), decoded.toString("latin1"));
  } catch (err) {
    if (err instanceof PathTraversalError) return notFound();
    console.error(`${req.method} ${req.target}:`, err);
    return serverError();
  }

  try {
    return await serveTarget(target, displayPath, rawPath);
  } catch (err) {
    console.error(`${req.method} ${req.target}:`, err);
    return serverError();
  }
}
