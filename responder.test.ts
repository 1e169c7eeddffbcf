import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { fieldGet } from "./http_message";
import { errorResponse, fileResponse, methodNotAllowed, notFound, readerFromFile } from "./responder";

describe("error responses", () => {
  it("carry the reason phrase as a plain-text body", async () => {
    const res = notFound();
    expect(res.code).toBe(404);
    expect(fieldGet(res.headers, "Content-Type")?.toString()).toBe("text/plain; charset=utf-8");
    expect(res.body.length).toBe(10);
    expect((await res.body.read()).toString()).toBe("Not Found\n");
  });

  it("advertise GET on 405", () => {
    expect(fieldGet(methodNotAllowed().headers, "Allow")?.toString()).toBe("GET");
  });

  it("name unknown codes", async () => {
    expect((await errorResponse(418).body.read()).toString()).toBe("Unknown\n");
  });
});

describe("readerFromFile", () => {
  let dir = "";
  const data = Buffer.alloc(150 * 1024, 7);

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "responder-"));
    await fs.writeFile(path.join(dir, "blob.bin"), data);
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads the file in 64 KiB chunks, then EOF", async () => {
    const handle = await fs.open(path.join(dir, "blob.bin"), "r");
    const reader = readerFromFile(handle, data.length);
    try {
      const sizes: number[] = [];
      for (let chunk = await reader.read(); chunk.length > 0; chunk = await reader.read()) {
        sizes.push(chunk.length);
      }
      expect(sizes).toEqual([65536, 65536, 22528]);
    } finally {
      await reader.close?.();
    }
  });

  it("stops at the declared size", async () => {
    const handle = await fs.open(path.join(dir, "blob.bin"), "r");
    const res = fileResponse(handle, 10, "application/octet-stream");
    try {
      expect(res.body.length).toBe(10);
      expect((await res.body.read()).length).toBe(10);
      expect((await res.body.read()).length).toBe(0);
    } finally {
      await res.body.close?.();
    }
  });

  it("returns a short read when the file shrank", async () => {
    const handle = await fs.open(path.join(dir, "blob.bin"), "r");
    const reader = readerFromFile(handle, data.length + 5);
    try {
      let total = 0;
      for (let chunk = await reader.read(); chunk.length > 0; chunk = await reader.read()) {
        total += chunk.length;
      }
      expect(total).toBe(data.length);
    } finally {
      await reader.close?.();
    }
  });
});
