import type { IncomingMessage, Server } from "node:http";
import type { Duplex } from "node:stream";
import type { Logger } from "pino";
import WebSocket, { WebSocketServer, type RawData } from "ws";
import type { GameCoordinator } from "./coordinator";
import { parseConnectParams, roomIdFromPath } from "./protocol";

const MAX_PAYLOAD_BYTES = 16 * 1024;

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString();
  if (Array.isArray(data)) return Buffer.concat(data).toString();
  return Buffer.from(data).toString();
}

function requestUrl(req: IncomingMessage): URL {
  return new URL(req.url ?? "/", "http://localhost");
}

function refuse(socket: Duplex, status: string) {
  socket.write(`HTTP/1.1 ${status}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

/** Serves `/ws/:roomId` on the given HTTP server. */
export function attachGameSocket(server: Server, coordinator: GameCoordinator, logger: Logger): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true, maxPayload: MAX_PAYLOAD_BYTES });

  server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const { pathname } = requestUrl(req);
    if (!roomIdFromPath(pathname)) {
      logger.warn({ path: pathname }, "refusing websocket upgrade without a room id");
      refuse(socket, "400 Bad Request");
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  });

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    const url = requestUrl(req);
    const roomId = roomIdFromPath(url.pathname);
    if (!roomId) {
      ws.close(1008, "Missing room id");
      return;
    }
    const joined = coordinator.connect(roomId, ws, parseConnectParams(url.searchParams));

    const fail = (what: string) => (err: unknown) => {
      logger.error({ err, roomId }, what);
    };

    ws.on("message", (data) => {
      const text = rawDataToString(data);
      joined.then((info) => coordinator.receive(info.id, text)).catch(fail("failed to handle message"));
    });

    ws.on("close", () => {
      joined.then((info) => coordinator.disconnect(info.id)).catch(fail("failed to release connection"));
    });

    ws.on("error", (err) => {
      logger.warn({ err, roomId }, "websocket error");
    });

    joined.catch(fail("failed to join room"));
  });

  return wss;
}
