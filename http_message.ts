import { DynBuf, bufPop, bufPush } from "./dyn_buf";
import { TCPConn, soRead, soWrite } from "./tcp_conn";

/* ==================== TYPES ==================== */

export type HTTPReq = { method: string; uri: Buffer; version: string; headers: Buffer[] };
export type HTTPRes = { code: number; headers: Buffer[]; body: BodyReader };

// `length` is always known up front: responses are never chunked.
export type BodyReader = {
  length: number;
  read: () => Promise<Buffer>;
  close?: () => Promise<void>;
};

export class HTTPError extends Error {
  readonly code: number;

  constructor(code: number, message: string) {
    super(message);
    this.name = "HTTPError";
    this.code = code;
  }
}

export const kReasons: Readonly<Record<number, string>> = {
  200: "OK",
  400: "Bad Request",
  404: "Not Found",
  405: "Method Not Allowed",
  413: "Payload Too Large",
  500: "Internal Server Error",
  501: "Not Implemented",
  503: "Service Unavailable",
};

export function reasonPhrase(code: number): string {
  return kReasons[code] ?? "Unknown";
}

/* ==================== HEADER PARSING ==================== */

const kMaxHeaderLen = 8 * 1024; // 8 KB

// Splits one complete request head off the front of `buf`, or returns null
// when more bytes are needed.
export function cutMessage(buf: DynBuf): HTTPReq | null {
  const view = buf.data.subarray(0, buf.length);
  const idx = view.indexOf("\r\n\r\n");
  if (idx < 0) {
    if (buf.length >= kMaxHeaderLen) throw new HTTPError(413, "header too large");
    return null;
  }
  if (idx + 4 > kMaxHeaderLen) throw new HTTPError(413, "header too large");
  const msg = parseHTTPReq(Buffer.from(view.subarray(0, idx)));
  bufPop(buf, idx + 4);
  return msg;
}

function splitLines(data: Buffer): Buffer[] {
  return data
    .toString("latin1")
    .split("\r\n")
    .map(s => Buffer.from(s, "latin1"));
}

// RFC 9110 token characters: method names and header field names.
const kToken = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

function parseRequestLine(line: Buffer): [string, Buffer, string] {
  const parts = line.toString("latin1").split(" ");
  if (parts.length !== 3) throw new HTTPError(400, "bad request line");
  const [method, uriStr, version] = parts;
  if (!kToken.test(method)) throw new HTTPError(400, "bad method");
  if (!/^HTTP\/\d\.\d$/.test(version)) throw new HTTPError(400, "bad version");
  if (uriStr.length === 0) throw new HTTPError(400, "bad target");
  return [method, Buffer.from(uriStr, "latin1"), version.slice(5)];
}

function validateHeader(line: Buffer): boolean {
  const str = line.toString("latin1");
  const idx = str.indexOf(":");
  if (idx <= 0) return false;
  const name = str.slice(0, idx);
  return kToken.test(name);
}

// `data` is the head without its terminating blank line.
export function parseHTTPReq(data: Buffer): HTTPReq {
  const lines = splitLines(data);
  const [method, uri, version] = parseRequestLine(lines[0]);
  const headers: Buffer[] = [];
  for (const h of lines.slice(1)) {
    if (!validateHeader(h)) throw new HTTPError(400, "bad field");
    headers.push(h);
  }
  return { method, uri, version, headers };
}

/* ==================== HEADER LOOKUP ==================== */

export function fieldGet(headers: Buffer[], key: string): Buffer | null {
  const lower = key.toLowerCase();
  for (const h of headers) {
    const str = h.toString("latin1");
    const colon = str.indexOf(":");
    if (colon <= 0) continue;
    const name = str.slice(0, colon).trim().toLowerCase();
    if (name === lower) return Buffer.from(str.slice(colon + 1).trim(), "latin1");
  }
  return null;
}

export function field(name: string, value: string): Buffer {
  return Buffer.from(`${name}: ${value}`, "latin1");
}

// HTTP/1.1 defaults to a persistent connection, HTTP/1.0 does not.
export function wantsClose(req: HTTPReq): boolean {
  const tokens = (fieldGet(req.headers, "Connection")?.toString("latin1") ?? "")
    .toLowerCase()
    .split(",")
    .map(s => s.trim());
  if (req.version === "1.0") return !tokens.includes("keep-alive");
  return tokens.includes("close");
}

function parseDec(str: string): number {
  return /^\d+$/.test(str) ? parseInt(str, 10) : NaN;
}

/* ==================== BODY READERS ==================== */

function readerFromConnLength(conn: TCPConn, buf: DynBuf, remain: number): BodyReader {
  return {
    length: remain,
    read: async (): Promise<Buffer> => {
      if (remain === 0) return Buffer.from("");
      if (buf.length === 0) {
        const data = await soRead(conn);
        bufPush(buf, data);
        if (data.length === 0) throw new Error("Unexpected EOF in body");
      }
      const consume = Math.min(buf.length, remain);
      remain -= consume;
      const chunk = Buffer.from(buf.data.subarray(0, consume));
      bufPop(buf, consume);
      return chunk;
    },
  };
}

export function readerFromReq(conn: TCPConn, buf: DynBuf, req: HTTPReq): BodyReader {
  let bodyLen = -1;
  const cl = fieldGet(req.headers, "Content-Length");
  if (cl) {
    bodyLen = parseDec(cl.toString("latin1"));
    if (isNaN(bodyLen)) throw new HTTPError(400, "bad Content-Length");
  }

  const bodyAllowed = !(req.method === "GET" || req.method === "HEAD");
  const chunked =
    fieldGet(req.headers, "Transfer-Encoding")?.equals(Buffer.from("chunked")) ?? false;

  if (!bodyAllowed && (bodyLen > 0 || chunked)) {
    throw new HTTPError(400, "HTTP body not allowed");
  }
  if (!bodyAllowed) bodyLen = 0;

  if (bodyLen >= 0) {
    return readerFromConnLength(conn, buf, bodyLen);
  } else if (chunked) {
    throw new HTTPError(501, "chunked not implemented");
  } else {
    // no framing on a request means no body
    return readerFromConnLength(conn, buf, 0);
  }
}

export function readerFromMemory(data: Buffer): BodyReader {
  let done = false;
  return {
    length: data.length,
    read: async (): Promise<Buffer> => {
      if (done) return Buffer.from("");
      done = true;
      return data;
    },
  };
}

/* ==================== RESPONSE ==================== */

export function encodeHTTPResp(resp: HTTPRes): Buffer {
  const lines: Buffer[] = [Buffer.from(`HTTP/1.1 ${resp.code} ${reasonPhrase(resp.code)}\r\n`, "latin1")];
  for (const h of resp.headers) {
    lines.push(h, Buffer.from("\r\n"));
  }
  lines.push(Buffer.from("\r\n"));
  return Buffer.concat(lines);
}

// Writes the head with a Content-Length, then pulls exactly that many body
// bytes from the reader.
export async function writeHTTPResp(conn: TCPConn, resp: HTTPRes): Promise<void> {
  const headers = [...resp.headers, field("Content-Length", String(resp.body.length))];
  await soWrite(conn, encodeHTTPResp({ ...resp, headers }));
  let remain = resp.body.length;
  while (remain > 0) {
    const data = await resp.body.read();
    if (data.length === 0) throw new Error("body ended before Content-Length");
    if (data.length > remain) throw new Error("body longer than Content-Length");
    remain -= data.length;
    await soWrite(conn, data);
  }
}

// Consumes what is left of a request body so the next head can be parsed.
export async function drainBody(body: BodyReader): Promise<void> {
  let remain = body.length;
  while (remain > 0) {
    const data = await body.read();
    if (data.length === 0) throw new Error("Unexpected EOF in body");
    remain -= data.length;
  }
}
