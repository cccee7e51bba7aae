/**
 * 無通信チャネルの死活監視
 *
 * idleTimeoutMs 以上トラフィックがないチャネルへ ping を送り、
 * 次のチェックまでに応答がなければ terminate する
 */

import { logHeartbeatTerminated } from "./logger";

export interface HeartbeatTarget {
  ping(): void;
  terminate(): void;
}

interface Tracked {
  target: HeartbeatTarget;
  lastSeen: number;
  awaitingPong: boolean;
}

export interface HeartbeatOptions {
  intervalMs: number;
  idleTimeoutMs: number;
  now?: () => number;
}

export class HeartbeatMonitor {
  private readonly tracked = new Map<string, Tracked>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly now: () => number;

  constructor(private readonly options: HeartbeatOptions) {
    this.now = options.now ?? Date.now;
  }

  track(id: string, target: HeartbeatTarget): void {
    this.tracked.set(id, { target, lastSeen: this.now(), awaitingPong: false });
  }

  untrack(id: string): void {
    this.tracked.delete(id);
  }

  /**
   * メッセージやpongを受信したとき
   */
  markAlive(id: string): void {
    const entry = this.tracked.get(id);
    if (!entry) return;
    entry.lastSeen = this.now();
    entry.awaitingPong = false;
  }

  size(): number {
    return this.tracked.size;
  }

  /**
   * 1回分のチェック。terminate したチャネル数を返す
   */
  check(): number {
    const now = this.now();
    let terminated = 0;

    for (const [id, entry] of Array.from(this.tracked.entries())) {
      const idleMs = now - entry.lastSeen;
      if (entry.awaitingPong) {
        logHeartbeatTerminated(id, idleMs);
        this.tracked.delete(id);
        entry.target.terminate();
        terminated++;
        continue;
      }
      if (idleMs >= this.options.idleTimeoutMs) {
        entry.awaitingPong = true;
        entry.target.ping();
      }
    }

    return terminated;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.check();
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
