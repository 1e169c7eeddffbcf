import * as net from "net";

/* ==================== TYPES ==================== */

// Wraps a socket and stores the callbacks of the one pending read.
export type TCPConn = {
  socket: net.Socket;
  err: null | Error;
  ended: boolean;
  reader: null | {
    resolve: (value: Buffer) => void;
    reject: (reason: Error) => void;
  };
};

// A connection that sends nothing for this long is dropped.
export const kIdleTimeoutMs = 30 * 1000;

/* ==================== TCP WRAPPER ==================== */

export function soInit(socket: net.Socket, idleTimeoutMs: number = kIdleTimeoutMs): TCPConn {
  const conn: TCPConn = { socket, err: null, ended: false, reader: null };

  socket.on("data", (data: Buffer) => {
    const reader = conn.reader;
    if (!reader) {
      // 'data' is paused between reads
      socket.destroy(new Error("data without a pending read"));
      return;
    }
    conn.socket.pause();
    conn.reader = null;
    reader.resolve(data);
  });

  socket.on("end", () => {
    conn.ended = true;
    if (conn.reader) {
      conn.reader.resolve(Buffer.alloc(0)); // EOF
      conn.reader = null;
    }
  });

  socket.on("error", (err: Error) => {
    conn.err = err;
    if (conn.reader) {
      conn.reader.reject(err);
      conn.reader = null;
    }
  });

  socket.setTimeout(idleTimeoutMs);
  socket.on("timeout", () => {
    socket.destroy(new Error("idle timeout"));
  });

  return conn;
}

export function soRead(conn: TCPConn): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    if (conn.reader) {
      reject(new Error("concurrent read on one connection"));
      return;
    }
    if (conn.err) {
      reject(conn.err);
      return;
    }
    if (conn.ended) {
      resolve(Buffer.alloc(0));
      return;
    }
    conn.reader = { resolve, reject };
    conn.socket.resume();
  });
}

export function soWrite(conn: TCPConn, data: Buffer): Promise<void> {
  console.assert(data.length > 0);
  return new Promise((resolve, reject) => {
    if (conn.err) {
      reject(conn.err);
      return;
    }
    conn.socket.write(data, (err?: Error | null) => (err ? reject(err) : resolve()));
  });
}
