import * as fs from "fs/promises";

/* ==================== CONFIG ==================== */

export type ServerConfig = Readonly<{ port: number; root: string }>;

export const kDefaultPort = 8080;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function parsePortValue(value: string): number {
  if (!/^\d+$/.test(value)) throw new ConfigError(`invalid port: ${value}`);
  const port = parseInt(value, 10);
  if (port > 65535) throw new ConfigError(`port out of range: ${value}`);
  return port;
}

// `args` excludes the node binary and script path. Unknown arguments are
// ignored; the last --port/-p wins.
export function parsePort(args: readonly string[]): number {
  let port = kDefaultPort;
  for (let i = 0; i < args.length; i++) {
    if (args[i] !== "--port" && args[i] !== "-p") continue;
    if (i + 1 >= args.length) throw new ConfigError(`missing value for ${args[i]}`);
    port = parsePortValue(args[i + 1]);
    i++;
  }
  return port;
}

// The root is canonicalised once here and never re-read.
export async function loadConfig(args: readonly string[], cwd: string): Promise<ServerConfig> {
  const port = parsePort(args);
  const root = await fs.realpath(cwd);
  return Object.freeze({ port, root });
}
