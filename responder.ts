import type { FileHandle } from "fs/promises";
import { BodyReader, HTTPRes, field, readerFromMemory, reasonPhrase, writeHTTPResp } from "./http_message";
import { TCPConn } from "./tcp_conn";

/* ==================== RESPONDER ==================== */

const kChunkSize = 64 * 1024;

export const kTextType = "text/plain; charset=utf-8";
export const kHtmlType = "text/html; charset=utf-8";

export function bufferResponse(code: number, contentType: string, body: Buffer, extra: Buffer[] = []): HTTPRes {
  return { code, headers: [field("Content-Type", contentType), ...extra], body: readerFromMemory(body) };
}

export function htmlResponse(body: Buffer): HTTPRes {
  return bufferResponse(200, kHtmlType, body);
}

// Error bodies are the reason phrase on one line.
export function errorResponse(code: number, extra: Buffer[] = []): HTTPRes {
  return bufferResponse(code, kTextType, Buffer.from(`${reasonPhrase(code)}\n`), extra);
}

export const notFound = (): HTTPRes => errorResponse(404);
export const methodNotAllowed = (): HTTPRes => errorResponse(405, [field("Allow", "GET")]);
export const serverError = (): HTTPRes => errorResponse(500);

// Streams `size` bytes of an open file in fixed-size chunks. The handle is
// owned by the reader from here on.
export function readerFromFile(handle: FileHandle, size: number): BodyReader {
  let offset = 0;
  return {
    length: size,
    read: async (): Promise<Buffer> => {
      if (offset >= size) return Buffer.from("");
      const want = Math.min(kChunkSize, size - offset);
      const chunk = Buffer.alloc(want);
      const { bytesRead } = await handle.read(chunk, 0, want, offset);
      offset += bytesRead;
      return chunk.subarray(0, bytesRead);
    },
    close: () => handle.close(),
  };
}

export function fileResponse(handle: FileHandle, size: number, contentType: string): HTTPRes {
  return { code: 200, headers: [field("Content-Type", contentType)], body: readerFromFile(handle, size) };
}

// Releases whatever the body holds even when the write fails.
export async function respond(conn: TCPConn, res: HTTPRes): Promise<void> {
  try {
    await writeHTTPResp(conn, res);
  } finally {
    await res.body.close?.();
  }
}
