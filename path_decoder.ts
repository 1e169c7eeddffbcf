/* ==================== PATH DECODER ==================== */

function hexVal(c: number): number {
  if (c >= 0x30 && c <= 0x39) return c - 0x30; // 0-9
  if (c >= 0x41 && c <= 0x46) return c - 0x41 + 10; // A-F
  if (c >= 0x61 && c <= 0x66) return c - 0x61 + 10; // a-f
  return -1;
}

// Decodes %XX escapes. `path` holds one char per wire byte (latin1).
// A '%' that does not start a valid escape is kept as a literal '%'.
// Dot segments are left alone: containment is the resolver's job.
export function percentDecode(path: string): Buffer {
  const src = Buffer.from(path, "latin1");
  const out = Buffer.alloc(src.length);
  let n = 0;
  let i = 0;
  while (i < src.length) {
    if (src[i] === 0x25 && i + 2 < src.length) {
      const hi = hexVal(src[i + 1]);
      const lo = hexVal(src[i + 2]);
      if (hi >= 0 && lo >= 0) {
        out[n++] = hi * 16 + lo;
        i += 3;
        continue;
      }
    }
    out[n++] = src[i];
    i += 1;
  }
  return out.subarray(0, n);
}

function isUnreserved(c: number): boolean {
  return (
    (c >= 0x30 && c <= 0x39) ||
    (c >= 0x41 && c <= 0x5a) ||
    (c >= 0x61 && c <= 0x7a) ||
    c === 0x2d || // -
    c === 0x2e || // .
    c === 0x5f || // _
    c === 0x7e // ~
  );
}

// Inverse of percentDecode for one path segment: every byte outside the
// unreserved set becomes %XX, so names that are not UTF-8 survive a round trip.
export function percentEncode(bytes: Buffer): string {
  let out = "";
  for (const c of bytes) {
    out += isUnreserved(c) ? String.fromCharCode(c) : "%" + c.toString(16).toUpperCase().padStart(2, "0");
  }
  return out;
}

// The path component of a request target, still percent-encoded.
export function targetPath(target: string): string {
  if (/^[A-Za-z][A-Za-z0-9+.-]*:\/\//.test(target)) {
    // absolute-form: scheme://authority/path?query
    const rest = target.slice(target.indexOf("//") + 2);
    const slash = rest.search(/[/?#]/);
    if (slash < 0 || rest[slash] !== "/") return "/";
    return targetPath(rest.slice(slash));
  }
  const end = target.search(/[?#]/);
  return end < 0 ? target : target.slice(0, end);
}
