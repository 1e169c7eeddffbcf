// Static file server over a hand-rolled HTTP/1.1 layer on top of `net`.

import * as net from "net";
import { ServerConfig, loadConfig } from "./config";
import { newConn, rejectConn } from "./connection";
import { WorkerPool } from "./worker_pool";

/* ==================== SERVER LOOP ==================== */

export const kMaxWorkers = 64;
export const kMaxQueued = 256;

export type PoolLimits = { maxWorkers: number; maxQueued: number };

export function createStaticServer(
  config: ServerConfig,
  limits: PoolLimits = { maxWorkers: kMaxWorkers, maxQueued: kMaxQueued },
): net.Server {
  const pool = new WorkerPool(limits.maxWorkers, limits.maxQueued);
  // sockets stay paused, so a queued connection is not read from
  const server = net.createServer({ pauseOnConnect: true });

  server.on("connection", (socket: net.Socket) => {
    const accepted = pool.submit(
      () => newConn(socket, config),
      () => socket.destroy(),
    );
    if (!accepted) {
      rejectConn(socket).catch((err: unknown) => console.error("reject failed:", err));
    }
  });
  server.on("close", () => pool.destroy());

  return server;
}

/* ==================== SERVER STARTUP ==================== */

export async function main(args: readonly string[]): Promise<net.Server> {
  const config = await loadConfig(args, process.cwd());
  const server = createStaticServer(config);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen({ host: "0.0.0.0", port: config.port }, () => {
      server.off("error", reject);
      resolve();
    });
  });
  server.on("error", err => console.error("Server error:", err));

  console.log(`Server listening on 0.0.0.0:${config.port}`);
  return server;
}
