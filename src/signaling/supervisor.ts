/**
 * SignalingSupervisor
 *
 * プロセス全体で1つの RoomRegistry を所有し、
 * 接続の受け入れからシャットダウンまでを管理する。
 *
 * precreateRoom / startMeeting / endMeeting / participantsInfo は
 * HTTP では公開しない。このサーバーを同じプロセスに組み込む
 * ミーティング管理サービスが直接呼び出すためのAPI。
 */

import { Effect, Either, Option } from "effect";
import { authenticate, type AuthenticatorOptions } from "./authenticator";
import { CLOSE_CODES, CapacityExceeded } from "./errors";
import {
  logAuthorized,
  logConnectionAccepted,
  logDuplicateReplaced,
  logRoomClosing,
  logShutdown,
} from "./logger";
import { broadcast } from "./message-handler";
import { PresenceSession } from "./presence";
import { createMessage, toMemberInfo } from "./protocol";
import { RoomRegistry } from "./room-registry";
import {
  SERVER_SENDER,
  type ConnectRequest,
  type DuplicateConnectionPolicy,
  type MemberInfo,
  type RegistryLimits,
  type RoomInfo,
  type SignalChannel,
} from "./types";

export interface SupervisorOptions {
  limits: RegistryLimits;
  auth: AuthenticatorOptions;
  duplicatePolicy: DuplicateConnectionPolicy;
  now?: () => Date;
}

export interface OpenedSession {
  session: PresenceSession;
  /** 認証と入室が完了したら true、拒否されたら false */
  admitted: Promise<boolean>;
}

export interface ParticipantsInfo {
  roomId: string;
  participantCount: number;
  participants: MemberInfo[];
}

export class SignalingSupervisor {
  readonly registry: RoomRegistry;
  private readonly sessions = new Map<string, PresenceSession>();
  private closed = false;

  constructor(private readonly options: SupervisorOptions) {
    this.registry = new RoomRegistry(options.limits, options.now);
  }

  get isShuttingDown(): boolean {
    return this.closed;
  }

  sessionCount(): number {
    return this.sessions.size;
  }

  /**
   * 新しいチャネルを受け付ける
   * セッションはすぐに返し、受信フレームは入室完了まで保留される
   */
  open(channel: SignalChannel, request: ConnectRequest): OpenedSession {
    const session = new PresenceSession({
      registry: this.registry,
      roomId: request.meetingId,
      channel,
      now: this.options.now,
      onClosed: (closedSession) => {
        this.sessions.delete(closedSession.memberId);
      },
    });
    this.sessions.set(session.memberId, session);
    logConnectionAccepted(request.meetingId, session.memberId);

    return { session, admitted: this.admit(session, request) };
  }

  private async admit(
    session: PresenceSession,
    request: ConnectRequest
  ): Promise<boolean> {
    if (this.closed) {
      session.reject(
        new CapacityExceeded({ message: "Server is shutting down", limit: 0 })
      );
      return false;
    }

    const result = await Effect.runPromise(
      Effect.either(authenticate(this.options.auth, request))
    );

    // 認証待ちの間にチャネルが閉じた、またはシャットダウンされた
    if (session.state === "closed") {
      return false;
    }
    if (Either.isLeft(result)) {
      session.reject(result.left);
      return false;
    }

    const identity = result.right;
    logAuthorized(request.meetingId, identity.userId, identity.role);
    session.authorize(identity);

    if (this.options.duplicatePolicy === "replace") {
      this.replaceDuplicates(
        request.meetingId,
        identity.userId,
        session.memberId
      );
    }

    return Either.isRight(session.join());
  }

  /**
   * 同一ユーザーの古い接続を閉じる（replace ポリシー）
   */
  private replaceDuplicates(
    roomId: string,
    userId: string,
    keepMemberId: string
  ): void {
    for (const member of this.registry.listMembers(roomId)) {
      if (member.userId !== userId) continue;
      if (member.memberId === keepMemberId) continue;
      const older = this.sessions.get(member.memberId);
      if (!older) continue;
      logDuplicateReplaced(roomId, userId, member.memberId);
      older.leave("replaced");
      if (older.channel.isOpen()) {
        older.channel.close(
          CLOSE_CODES.replaced,
          "Replaced by new connection"
        );
      }
    }
  }

  /**
   * 最初の入室前にルームを用意する
   */
  precreateRoom(
    roomId: string,
    capacity?: number
  ): Either.Either<RoomInfo, CapacityExceeded> {
    return this.registry.precreate(roomId, capacity);
  }

  /**
   * ミーティング開始を通知
   */
  startMeeting(roomId: string): number {
    return broadcast(
      this.registry.listMembers(roomId),
      createMessage("meeting-started", SERVER_SENDER, { roomId })
    );
  }

  /**
   * ミーティング終了: room-closing を送って全チャネルを閉じる
   */
  endMeeting(roomId: string): number {
    const members = this.registry.listMembers(roomId);
    logRoomClosing(roomId, "meeting-ended", members.length);
    for (const member of members) {
      this.sessions
        .get(member.memberId)
        ?.terminate("meeting-ended", CLOSE_CODES.normal, "Meeting ended");
    }
    return members.length;
  }

  participantsInfo(roomId: string): ParticipantsInfo {
    const participants = this.registry.listMembers(roomId).map(toMemberInfo);
    return { roomId, participantCount: participants.length, participants };
  }

  describeRoom(roomId: string): Option.Option<RoomInfo> {
    return this.registry.describe(roomId);
  }

  /**
   * 全チャネルに room-closing を送って閉じ、registry を空にする
   */
  shutdown(): void {
    if (this.closed) return;
    this.closed = true;
    logShutdown(this.registry.roomCount(), this.sessions.size);

    for (const session of Array.from(this.sessions.values())) {
      session.terminate(
        "server-shutdown",
        CLOSE_CODES.goingAway,
        "Server shutting down"
      );
    }
    this.sessions.clear();
    this.registry.clear();
  }
}
