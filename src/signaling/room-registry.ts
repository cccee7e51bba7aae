/**
 * ルーム状態管理
 *
 * meeting ID → メンバー集合のマップを持つ唯一の可変状態。
 * すべての操作は同期的に完結するため、
 * イベントループ上では1ステップで原子的に実行される。
 * 配信はここでは行わず、返したスナップショットを使って呼び出し側が行う。
 */

import { Either, Option } from "effect";
import { CapacityExceeded, RoomFull } from "./errors";
import { logRoomEvicted } from "./logger";
import type { MediaState, Member, RegistryLimits, RoomInfo } from "./types";

interface Room {
  readonly roomId: string;
  readonly capacity: number;
  readonly createdAt: Date;
  readonly precreated: boolean;
  readonly members: Map<string, Member>;
}

export interface Removal {
  removed: Member;
  remaining: ReadonlyArray<Member>;
  evicted: boolean;
}

function describeRoom(room: Room): RoomInfo {
  return {
    roomId: room.roomId,
    capacity: room.capacity,
    createdAt: room.createdAt,
    memberCount: room.members.size,
    precreated: room.precreated,
  };
}

export class RoomRegistry {
  private readonly rooms = new Map<string, Room>();

  constructor(
    private readonly limits: RegistryLimits,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * 既存ルームを返す。なければ空のルームを作成
   */
  getOrCreate(roomId: string): Either.Either<RoomInfo, CapacityExceeded> {
    return Either.map(
      this.ensureRoom(roomId, false, this.limits.maxMembersPerRoom),
      (entry) => describeRoom(entry.room)
    );
  }

  /**
   * ミーティング管理側からの事前作成
   * 最初の入室を待つ間は空のまま保持される
   */
  precreate(
    roomId: string,
    capacity?: number
  ): Either.Either<RoomInfo, CapacityExceeded> {
    return Either.map(
      this.ensureRoom(roomId, true, capacity ?? this.limits.maxMembersPerRoom),
      (entry) => describeRoom(entry.room)
    );
  }

  /**
   * メンバーを追加
   * 成功時は追加前のメンバー一覧（スナップショット）を返す
   */
  addMember(
    roomId: string,
    member: Member
  ): Either.Either<ReadonlyArray<Member>, RoomFull | CapacityExceeded> {
    const ensured = this.ensureRoom(
      roomId,
      false,
      this.limits.maxMembersPerRoom
    );
    if (Either.isLeft(ensured)) {
      return Either.left(ensured.left);
    }

    const { room, created } = ensured.right;
    if (room.members.size >= room.capacity) {
      // この試行のために作ったルームは残さない
      if (created) {
        this.rooms.delete(roomId);
      }
      return Either.left(
        new RoomFull({
          message: `Meeting ${roomId} is full (capacity ${room.capacity})`,
          roomId,
          capacity: room.capacity,
        })
      );
    }

    const existing = Array.from(room.members.values());
    room.members.set(member.memberId, member);
    return Either.right(existing);
  }

  /**
   * メンバーを削除
   * 空になったルームは同じステップで registry から取り除く
   */
  removeMember(roomId: string, memberId: string): Option.Option<Removal> {
    const room = this.rooms.get(roomId);
    if (!room) {
      return Option.none();
    }

    const removed = room.members.get(memberId);
    if (!removed) {
      return Option.none();
    }

    room.members.delete(memberId);
    const evicted = room.members.size === 0;
    if (evicted) {
      this.rooms.delete(roomId);
      logRoomEvicted(roomId);
    }

    return Option.some({
      removed,
      remaining: Array.from(room.members.values()),
      evicted,
    });
  }

  /**
   * メディア状態を更新（Memberは不変なので置き換える）
   */
  updateMember(
    roomId: string,
    memberId: string,
    patch: Partial<MediaState>
  ): Option.Option<Member> {
    const room = this.rooms.get(roomId);
    const current = room?.members.get(memberId);
    if (!room || !current) {
      return Option.none();
    }

    const updated: Member = {
      ...current,
      media: { ...current.media, ...definedOnly(patch) },
    };
    room.members.set(memberId, updated);
    return Option.some(updated);
  }

  /**
   * 現在のメンバー一覧のコピーを返す
   */
  listMembers(roomId: string): ReadonlyArray<Member> {
    const room = this.rooms.get(roomId);
    return room ? Array.from(room.members.values()) : [];
  }

  findMember(roomId: string, memberId: string): Option.Option<Member> {
    return Option.fromNullable(this.rooms.get(roomId)?.members.get(memberId));
  }

  hasRoom(roomId: string): boolean {
    return this.rooms.has(roomId);
  }

  describe(roomId: string): Option.Option<RoomInfo> {
    return Option.map(
      Option.fromNullable(this.rooms.get(roomId)),
      describeRoom
    );
  }

  roomIds(): string[] {
    return Array.from(this.rooms.keys());
  }

  roomCount(): number {
    return this.rooms.size;
  }

  memberCount(): number {
    let total = 0;
    for (const room of this.rooms.values()) {
      total += room.members.size;
    }
    return total;
  }

  clear(): void {
    this.rooms.clear();
  }

  private ensureRoom(
    roomId: string,
    precreated: boolean,
    capacity: number
  ): Either.Either<{ room: Room; created: boolean }, CapacityExceeded> {
    const existing = this.rooms.get(roomId);
    if (existing) {
      return Either.right({ room: existing, created: false });
    }

    if (this.rooms.size >= this.limits.maxRooms) {
      return Either.left(
        new CapacityExceeded({
          message: `Server is at its limit of ${this.limits.maxRooms} active meetings`,
          limit: this.limits.maxRooms,
        })
      );
    }

    const room: Room = {
      roomId,
      capacity,
      createdAt: this.now(),
      precreated,
      members: new Map(),
    };
    this.rooms.set(roomId, room);
    return Either.right({ room, created: true });
  }
}

function definedOnly(patch: Partial<MediaState>): Partial<MediaState> {
  const result: Partial<MediaState> = {};
  const { videoEnabled, audioEnabled, screenSharing } = patch;
  if (videoEnabled !== undefined) result.videoEnabled = videoEnabled;
  if (audioEnabled !== undefined) result.audioEnabled = audioEnabled;
  if (screenSharing !== undefined) result.screenSharing = screenSharing;
  return result;
}
