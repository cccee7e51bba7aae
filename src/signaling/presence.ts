/**
 * メンバーごとの入退室ライフサイクル
 *
 * connecting → authorized → joined → leaving → closed
 *
 * 1チャネルにつき1セッション。
 * Member の状態はこのセッションだけが変更する。
 */

import { randomUUID } from "node:crypto";
import { Either, Option } from "effect";
import {
  CLOSE_CODES,
  ChannelClosed,
  closeCodeFor,
  errorCodeOf,
  type RejectionError,
} from "./errors";
import {
  logAdmissionRejected,
  logChannelClosed,
  logMemberJoined,
  logMemberLeft,
  logPendingOverflow,
  logUnexpectedError,
} from "./logger";
import { broadcast, deliver, routeMessage } from "./message-handler";
import { createMessage, encodeMessage, toMemberInfo } from "./protocol";
import type { RoomRegistry } from "./room-registry";
import {
  SERVER_SENDER,
  type Identity,
  type LeaveReason,
  type MediaState,
  type Member,
  type PresenceState,
  type RoomClosingReason,
  type SignalChannel,
} from "./types";

export const DEFAULT_MEDIA_STATE: MediaState = {
  videoEnabled: true,
  audioEnabled: true,
  screenSharing: false,
};

/** 入室前に保留できるフレーム数とバイト数 */
export const MAX_PENDING_FRAMES = 32;
export const MAX_PENDING_BYTES = 64 * 1024;

export interface PresenceSessionOptions {
  registry: RoomRegistry;
  roomId: string;
  channel: SignalChannel;
  memberId?: string;
  now?: () => Date;
  onClosed?: (session: PresenceSession) => void;
  maxPendingFrames?: number;
  maxPendingBytes?: number;
}

export class PresenceSession {
  readonly memberId: string;
  readonly roomId: string;
  readonly channel: SignalChannel;

  private currentState: PresenceState = "connecting";
  private identity: Identity | null = null;
  private member: Member | null = null;
  private pending: string[] = [];
  private pendingBytes = 0;
  private readonly registry: RoomRegistry;
  private readonly now: () => Date;
  private readonly onClosed?: (session: PresenceSession) => void;
  private readonly maxPendingFrames: number;
  private readonly maxPendingBytes: number;

  constructor(options: PresenceSessionOptions) {
    this.registry = options.registry;
    this.roomId = options.roomId;
    this.channel = options.channel;
    this.memberId = options.memberId ?? randomUUID();
    this.now = options.now ?? (() => new Date());
    this.onClosed = options.onClosed;
    this.maxPendingFrames = options.maxPendingFrames ?? MAX_PENDING_FRAMES;
    this.maxPendingBytes = options.maxPendingBytes ?? MAX_PENDING_BYTES;
  }

  get state(): PresenceState {
    return this.currentState;
  }

  get userId(): string | null {
    return this.identity?.userId ?? null;
  }

  /**
   * connecting → authorized
   */
  authorize(identity: Identity): boolean {
    if (this.currentState !== "connecting") return false;
    this.identity = identity;
    this.currentState = "authorized";
    return true;
  }

  /**
   * authorized → joined
   * 参加前のメンバーへ join-notify、本人へ joined（名簿）を送る
   */
  join(): Either.Either<Member, RejectionError | ChannelClosed> {
    if (this.currentState !== "authorized" || !this.identity) {
      return Either.left(
        new ChannelClosed({
          message: `Cannot join from state ${this.currentState}`,
          code: CLOSE_CODES.normal,
        })
      );
    }

    const member: Member = {
      memberId: this.memberId,
      userId: this.identity.userId,
      displayName: this.identity.displayName,
      role: this.identity.role,
      joinedAt: this.now(),
      media: { ...DEFAULT_MEDIA_STATE },
      channel: this.channel,
    };

    const admitted = this.registry.addMember(this.roomId, member);
    if (Either.isLeft(admitted)) {
      this.reject(admitted.left);
      return Either.left(admitted.left);
    }

    this.member = member;
    this.currentState = "joined";
    const existing = admitted.right;
    logMemberJoined(
      this.roomId,
      this.memberId,
      member.userId,
      existing.length + 1
    );

    deliver(
      member,
      createMessage(
        "joined",
        SERVER_SENDER,
        {
          roomId: this.roomId,
          memberId: this.memberId,
          members: existing.map(toMemberInfo),
        },
        this.memberId
      )
    );
    broadcast(
      existing,
      createMessage("join-notify", this.memberId, toMemberInfo(member))
    );

    this.flushPending();
    return Either.right(member);
  }

  /**
   * チャネルから受信したフレームを処理
   * joined 前に届いたものは順序を保ったまま保留する。
   * 保留が上限を超えたらチャネルを閉じる
   */
  receive(data: string): void {
    switch (this.currentState) {
      case "connecting":
      case "authorized":
        this.hold(data);
        return;
      case "joined":
        this.dispatch(data);
        return;
      case "leaving":
      case "closed":
        return;
    }
  }

  /**
   * joined → leaving → closed
   * 明示的な leave でも切断でも同じ経路を通る。
   * 2回目以降は何もしない
   */
  leave(reason: LeaveReason): boolean {
    if (this.currentState !== "joined") {
      this.finishWithoutMember();
      return false;
    }

    this.currentState = "leaving";
    const removal = this.registry.removeMember(this.roomId, this.memberId);
    this.currentState = "closed";

    if (Option.isSome(removal)) {
      const { removed, remaining } = removal.value;
      logMemberLeft(this.roomId, this.memberId, reason, remaining.length);
      broadcast(
        remaining,
        createMessage("leave-notify", this.memberId, {
          memberId: removed.memberId,
          userId: removed.userId,
          reason,
        })
      );
    }

    this.clearPending();
    this.onClosed?.(this);
    return true;
  }

  /**
   * 下位チャネルの close / error を受けたとき
   */
  handleChannelClosed(code: number, reason: string): void {
    logChannelClosed(this.memberId, code, reason);
    this.leave("closed");
  }

  handleChannelError(): void {
    this.leave("error");
  }

  /**
   * 入室前の拒否
   * エラーを1回だけ送ってチャネルを閉じる（registry は変更しない）
   */
  reject(error: RejectionError): void {
    if (this.currentState === "closed") return;

    logAdmissionRejected(this.roomId, this.memberId, error._tag, error.message);
    if (this.channel.isOpen()) {
      const payload = { code: errorCodeOf(error), message: error.message };
      this.sendDirect(
        encodeMessage(
          createMessage("error", SERVER_SENDER, payload, this.memberId)
        )
      );
      this.channel.close(closeCodeFor(error), error._tag);
    }
    this.finishWithoutMember();
  }

  /**
   * supervisor による強制終了
   * シャットダウン、ミーティング終了、保留フレームの超過で使う。
   * leave-notify は送らない
   */
  terminate(
    notice: RoomClosingReason | null,
    closeCode: number,
    closeReason: string
  ): void {
    if (this.currentState === "closed") return;

    if (this.currentState === "joined") {
      this.currentState = "leaving";
      this.registry.removeMember(this.roomId, this.memberId);
    }
    if (notice && this.member) {
      deliver(
        this.member,
        createMessage(
          "room-closing",
          SERVER_SENDER,
          { roomId: this.roomId, reason: notice },
          this.memberId
        )
      );
    }
    this.currentState = "closed";
    this.clearPending();

    if (this.channel.isOpen()) {
      this.channel.close(closeCode, closeReason);
    }
    this.onClosed?.(this);
  }

  private hold(data: string): void {
    this.pending.push(data);
    this.pendingBytes += Buffer.byteLength(data, "utf8");

    if (
      this.pending.length > this.maxPendingFrames ||
      this.pendingBytes > this.maxPendingBytes
    ) {
      logPendingOverflow(this.memberId, this.pending.length, this.pendingBytes);
      this.terminate(
        null,
        CLOSE_CODES.policyViolation,
        "Too many frames before join"
      );
    }
  }

  private dispatch(data: string): void {
    if (!this.member) return;

    const outcome = routeMessage(
      { registry: this.registry, roomId: this.roomId, sender: this.member },
      data
    );
    if (outcome.kind === "leave") {
      this.leave("leave");
      if (this.channel.isOpen()) {
        this.channel.close(CLOSE_CODES.normal, "Left meeting");
      }
    }
  }

  private flushPending(): void {
    const queued = this.pending;
    this.clearPending();
    for (const data of queued) {
      if (this.currentState !== "joined") return;
      this.dispatch(data);
    }
  }

  private clearPending(): void {
    this.pending = [];
    this.pendingBytes = 0;
  }

  private finishWithoutMember(): void {
    if (this.currentState === "closed") return;
    this.currentState = "closed";
    this.clearPending();
    this.onClosed?.(this);
  }

  private sendDirect(data: string): void {
    try {
      this.channel.send(data);
    } catch (error) {
      logUnexpectedError(`reject(${this.memberId})`, error);
    }
  }
}
