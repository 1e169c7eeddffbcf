import * as net from "net";
import type { ServerConfig } from "./config";
import { bufNew, bufPush } from "./dyn_buf";
import { HTTPError, HTTPRes, cutMessage, drainBody, field, readerFromReq, wantsClose } from "./http_message";
import { Request, handleRequest } from "./request_handler";
import { errorResponse, respond } from "./responder";
import { TCPConn, soInit, soRead } from "./tcp_conn";

/* ==================== CONNECTION LOOP ==================== */

function withClose(res: HTTPRes): HTTPRes {
  return { ...res, headers: [...res.headers, field("Connection", "close")] };
}

// Serves requests off one connection until the peer closes it, asks for it
// to be closed, or a transport error ends it.
export async function serveClient(conn: TCPConn, config: ServerConfig): Promise<void> {
  const buf = bufNew();
  while (true) {
    const msg = cutMessage(buf);
    if (!msg) {
      const data = await soRead(conn);
      bufPush(buf, data);
      if (data.length === 0 && buf.length === 0) return;
      if (data.length === 0) throw new HTTPError(400, "Unexpected EOF");
      continue;
    }

    const reqBody = readerFromReq(conn, buf, msg);
    const req: Request = { method: msg.method, target: msg.uri.toString("latin1") };
    console.log(`${req.method} ${req.target}`);

    const res = await handleRequest(config, req);
    const close = wantsClose(msg);
    await respond(conn, close ? withClose(res) : res);
    if (close) return;

    // leftover body bytes would be misread as the next head
    await drainBody(reqBody);
  }
}

export async function newConn(socket: net.Socket, config: ServerConfig): Promise<void> {
  const conn = soInit(socket);
  try {
    await serveClient(conn, config);
  } catch (exc) {
    console.error("exception:", exc);
    if (exc instanceof HTTPError) {
      // the peer may already be gone
      await respond(conn, withClose(errorResponse(exc.code))).catch((err: unknown) =>
        console.error("error response failed:", err),
      );
    }
  } finally {
    socket.destroy();
  }
}

// Answers a connection the server has no room for, then half-closes it.
// Whatever the peer sent is read and dropped until it closes its side.
export async function rejectConn(socket: net.Socket): Promise<void> {
  const conn = soInit(socket);
  try {
    await respond(conn, withClose(errorResponse(503)));
  } catch (err) {
    socket.destroy();
    throw err;
  }
  socket.removeAllListeners("data");
  socket.end();
  socket.resume();
}
