import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { describe, expect, it } from "vitest";
import { ConfigError, kDefaultPort, loadConfig, parsePort } from "./config";

describe("parsePort", () => {
  it("defaults to 8080", () => {
    expect(parsePort([])).toBe(kDefaultPort);
    expect(kDefaultPort).toBe(8080);
  });

  it("reads --port and -p", () => {
    expect(parsePort(["--port", "3000"])).toBe(3000);
    expect(parsePort(["-p", "65535"])).toBe(65535);
  });

  it("ignores unrelated arguments", () => {
    expect(parsePort(["--verbose", "x", "-p", "9000", "extra"])).toBe(9000);
  });

  it("lets the last flag win", () => {
    expect(parsePort(["-p", "1", "--port", "2"])).toBe(2);
  });

  it("rejects a flag without a value", () => {
    expect(() => parsePort(["--port"])).toThrow(ConfigError);
    expect(() => parsePort(["-p"])).toThrow("missing value for -p");
  });

  it("rejects values that are not a 16-bit port", () => {
    for (const value of ["abc", "-1", "65536", "80.5", "", " 80"]) {
      expect(() => parsePort(["--port", value])).toThrow(ConfigError);
    }
  });
});

describe("loadConfig", () => {
  it("canonicalises the root and freezes the result", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "config-"));
    try {
      const config = await loadConfig(["-p", "8081"], path.join(dir, ".", "..", path.basename(dir)));
      expect(config).toEqual({ port: 8081, root: await fs.realpath(dir) });
      expect(Object.isFrozen(config)).toBe(true);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it("fails when the root does not exist", async () => {
    await expect(loadConfig([], path.join(os.tmpdir(), "no-such-root-for-config-test"))).rejects.toMatchObject({
      code: "ENOENT",
    });
  });
});
