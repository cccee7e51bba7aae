/**
 * WebSocket処理
 *
 * HTTP upgrade を受けて ws のチャネルを PresenceSession に接続する
 */

import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import type { Duplex } from "node:stream";
import { Either } from "effect";
import WebSocket, { WebSocketServer } from "ws";
import { CLOSE_CODES } from "./errors";
import { HeartbeatMonitor } from "./heartbeat";
import {
  logChannelError,
  logSendError,
  logUnexpectedError,
  logUpgradeRejected,
} from "./logger";
import type { OpenedSession, SignalingSupervisor } from "./supervisor";
import type { ConnectRequest, SignalChannel } from "./types";

const MEETING_PATH = /^\/ws\/meetings\/([^/]+)\/?$/;

/** 1フレームの最大サイズ（ws の maxPayload） */
export const DEFAULT_MAX_PAYLOAD_BYTES = 64 * 1024;

/**
 * ハンドラが使う ws.WebSocket の部分
 */
export interface SignalSocket {
  readonly readyState: number;
  send(data: string, cb?: (error?: Error) => void): void;
  close(code: number, reason: string): void;
  ping(): void;
  terminate(): void;
  on(event: "message", listener: (data: WebSocket.RawData) => void): unknown;
  on(event: "pong", listener: () => void): unknown;
  on(
    event: "close",
    listener: (code: number, reason: Buffer) => void
  ): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export interface SignalingServerOptions {
  supervisor: SignalingSupervisor;
  heartbeatIntervalMs: number;
  idleTimeoutMs: number;
  maxPayloadBytes?: number;
  /** シャットダウン時、close ハンドシェイクを待つ最大時間 */
  closeGraceMs?: number;
}

export interface SignalingServer {
  server: Server;
  heartbeat: HeartbeatMonitor;
  close(): Promise<void>;
}

/**
 * アップグレード要求のURLから接続パラメータを取り出す
 */
export function parseConnectRequest(
  rawUrl: string | undefined
): ConnectRequest | null {
  const url = new URL(rawUrl ?? "/", "http://localhost");
  const match = MEETING_PATH.exec(url.pathname);
  if (!match) {
    return null;
  }

  const meetingId = Either.getOrNull(
    Either.try({
      try: () => decodeURIComponent(match[1]),
      catch: () => null,
    })
  );
  if (!meetingId) {
    return null;
  }

  return { meetingId, token: url.searchParams.get("token") };
}

/**
 * ws の生データを文字列に変換
 */
export function rawDataToText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

/**
 * ws.WebSocket を SignalChannel として扱うアダプタ
 */
export function createWebSocketChannel(
  ws: SignalSocket,
  label: () => string
): SignalChannel {
  return {
    isOpen: () => ws.readyState === WebSocket.OPEN,
    send: (data) => {
      ws.send(data, (error) => {
        if (error) logSendError(label(), "frame", error);
      });
    },
    close: (code, reason) => {
      ws.close(code, reason);
    },
  };
}

/**
 * WebSocketイベントハンドラを設定
 */
export function setupWebSocketHandlers(
  ws: SignalSocket,
  request: ConnectRequest,
  supervisor: SignalingSupervisor,
  heartbeat: HeartbeatMonitor
): OpenedSession {
  let memberId = "pending";
  const channel = createWebSocketChannel(ws, () => memberId);
  const opened = supervisor.open(channel, request);
  const { session, admitted } = opened;
  memberId = session.memberId;

  heartbeat.track(session.memberId, {
    ping: () => ws.ping(),
    terminate: () => {
      // terminate 後の close イベントでは leave-notify は重複しない
      session.leave("heartbeat");
      ws.terminate();
    },
  });

  ws.on("message", (data) => {
    heartbeat.markAlive(session.memberId);
    session.receive(rawDataToText(data));
  });

  ws.on("pong", () => {
    heartbeat.markAlive(session.memberId);
  });

  ws.on("close", (code, reason) => {
    heartbeat.untrack(session.memberId);
    session.handleChannelClosed(code, reason.toString("utf8"));
  });

  ws.on("error", (error) => {
    logChannelError(session.memberId, error);
    session.handleChannelError();
  });

  void admitted.catch((error: unknown) => {
    logUnexpectedError(`admission of ${session.memberId}`, error);
    session.terminate(null, CLOSE_CODES.internalError, "Internal error");
  });

  return opened;
}

function rejectUpgrade(
  socket: Duplex,
  status: number,
  statusText: string
): void {
  socket.write(
    `HTTP/1.1 ${status} ${statusText}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`
  );
  socket.destroy();
}

function handleHttpRequest(
  supervisor: SignalingSupervisor,
  req: IncomingMessage,
  res: ServerResponse
): void {
  const url = new URL(req.url ?? "/", "http://localhost");
  if (req.method === "GET" && url.pathname === "/health") {
    const body = JSON.stringify({
      status: supervisor.isShuttingDown ? "shutting-down" : "ok",
      rooms: supervisor.registry.roomCount(),
      members: supervisor.registry.memberCount(),
    });
    res.writeHead(200, { "Content-Type": "application/json" });
    res.end(body);
    return;
  }

  if (url.pathname.startsWith("/ws/")) {
    res.writeHead(426, { "Content-Type": "text/plain" });
    res.end("Expected WebSocket upgrade");
    return;
  }

  res.writeHead(404, { "Content-Type": "text/plain" });
  res.end("Not found");
}

/**
 * HTTPサーバーとWebSocketサーバーを組み立てる（listen は呼び出し側）
 */
export function createSignalingServer(
  options: SignalingServerOptions
): SignalingServer {
  const { supervisor } = options;
  const wss = new WebSocketServer({
    noServer: true,
    maxPayload: options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES,
  });
  const heartbeat = new HeartbeatMonitor({
    intervalMs: options.heartbeatIntervalMs,
    idleTimeoutMs: options.idleTimeoutMs,
  });

  const server = createServer((req, res) =>
    handleHttpRequest(supervisor, req, res)
  );

  server.on(
    "upgrade",
    (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      const request = parseConnectRequest(req.url);
      if (!request) {
        logUpgradeRejected(req.url ?? "", 404);
        rejectUpgrade(socket, 404, "Not Found");
        return;
      }

      wss.handleUpgrade(req, socket, head, (ws) => {
        setupWebSocketHandlers(ws, request, supervisor, heartbeat);
      });
    }
  );

  heartbeat.start();

  const close = () =>
    new Promise<void>((resolve, reject) => {
      heartbeat.stop();
      supervisor.shutdown();
      wss.close();

      const forceTimer = setTimeout(() => {
        for (const client of wss.clients) {
          client.terminate();
        }
      }, options.closeGraceMs ?? 1000);
      forceTimer.unref();

      server.close((error) => {
        clearTimeout(forceTimer);
        if (error) reject(error);
        else resolve();
      });
    });

  return { server, heartbeat, close };
}
