/**
 * テスト用の ws.WebSocket
 * close と terminate は実物と同じく close イベントを発火する
 */

import { EventEmitter } from "node:events";
import WebSocket from "ws";
import type { SignalSocket } from "../../src/signaling/websocket-handler";
import type { ReceivedMessage } from "./fake-channel";

export class FakeSocket extends EventEmitter implements SignalSocket {
  readyState: number = WebSocket.OPEN;
  readonly sent: string[] = [];
  closedWith: { code: number; reason: string } | null = null;
  pings = 0;
  terminated = false;

  send(data: string, cb?: (error?: Error) => void): void {
    this.sent.push(data);
    cb?.();
  }

  close(code: number, reason: string): void {
    if (this.readyState !== WebSocket.OPEN) return;
    this.readyState = WebSocket.CLOSED;
    this.closedWith = { code, reason };
    this.emit("close", code, Buffer.from(reason));
  }

  ping(): void {
    this.pings++;
  }

  terminate(): void {
    if (this.readyState !== WebSocket.OPEN) return;
    this.readyState = WebSocket.CLOSED;
    this.terminated = true;
    this.emit("close", 1006, Buffer.alloc(0));
  }

  /** クライアントからのフレーム */
  receive(data: string): void {
    this.emit("message", Buffer.from(data));
  }

  messages(): ReceivedMessage[] {
    return this.sent.map((data) => {
      const message: ReceivedMessage = JSON.parse(data);
      return message;
    });
  }

  types(): string[] {
    return this.messages().map((message) => message.type);
  }
}
