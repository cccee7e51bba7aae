/**
 * ミーティング管理側（外部コラボレーター）への問い合わせ
 *
 * host / participant の判定はここに閉じ込め、属性名などの実装詳細を仮定しない
 */

import { readFile } from "node:fs/promises";
import * as v from "valibot";

export interface MeetingDirectory {
  isHost(userId: string, meetingId: string): Promise<boolean>;
  isParticipant(userId: string, meetingId: string): Promise<boolean>;
}

const MeetingRecordSchema = v.object({
  meetingId: v.pipe(v.string(), v.minLength(1)),
  hostUserId: v.pipe(v.string(), v.minLength(1)),
  participantUserIds: v.optional(v.array(v.string()), []),
});

export const MeetingSeedSchema = v.object({
  meetings: v.array(MeetingRecordSchema),
});

export type MeetingRecord = v.InferOutput<typeof MeetingRecordSchema>;

/**
 * メモリ上のミーティング一覧
 * 開発環境とテストで使う
 */
export class InMemoryMeetingDirectory implements MeetingDirectory {
  private readonly meetings = new Map<
    string,
    { hostUserId: string; participants: Set<string> }
  >();

  constructor(records: ReadonlyArray<MeetingRecord> = []) {
    for (const record of records) {
      this.upsert(record);
    }
  }

  static async fromFile(path: string): Promise<InMemoryMeetingDirectory> {
    const raw = await readFile(path, "utf8");
    const seed = v.parse(MeetingSeedSchema, JSON.parse(raw));
    return new InMemoryMeetingDirectory(seed.meetings);
  }

  upsert(record: MeetingRecord): void {
    this.meetings.set(record.meetingId, {
      hostUserId: record.hostUserId,
      participants: new Set(record.participantUserIds),
    });
  }

  addParticipant(meetingId: string, userId: string): boolean {
    const meeting = this.meetings.get(meetingId);
    if (!meeting) return false;
    meeting.participants.add(userId);
    return true;
  }

  remove(meetingId: string): void {
    this.meetings.delete(meetingId);
  }

  async isHost(userId: string, meetingId: string): Promise<boolean> {
    return this.meetings.get(meetingId)?.hostUserId === userId;
  }

  async isParticipant(userId: string, meetingId: string): Promise<boolean> {
    return this.meetings.get(meetingId)?.participants.has(userId) ?? false;
  }
}
