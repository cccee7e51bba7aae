/**
 * テスト用の SignalChannel
 * 送信したフレームとcloseの引数を記録する
 */

import type { SignalChannel } from "../../src/signaling/types";

export interface ReceivedMessage {
  type: string;
  from: string;
  to?: string;
  payload: unknown;
  timestamp: string;
}

export class FakeChannel implements SignalChannel {
  readonly sent: string[] = [];
  closedWith: { code: number; reason: string } | null = null;
  failSends = false;
  private open = true;

  isOpen(): boolean {
    return this.open;
  }

  send(data: string): void {
    if (this.failSends) {
      throw new Error("socket write failed");
    }
    this.sent.push(data);
  }

  close(code: number, reason: string): void {
    this.open = false;
    this.closedWith = { code, reason };
  }

  /** ネットワーク断（closeハンドシェイクなし） */
  drop(): void {
    this.open = false;
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

  last(): ReceivedMessage | undefined {
    const all = this.messages();
    return all[all.length - 1];
  }

  clear(): void {
    this.sent.length = 0;
  }
}
