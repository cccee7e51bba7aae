/**
 * シグナリング関連の型定義
 */

import * as v from "valibot";

export type Role = "host" | "participant" | "guest";

export type PresenceState =
  | "connecting"
  | "authorized"
  | "joined"
  | "leaving"
  | "closed";

export type DuplicateConnectionPolicy = "allow" | "replace";

export type LeaveReason =
  | "leave"
  | "closed"
  | "error"
  | "replaced"
  | "heartbeat";

/** サーバー発のメッセージに入る送信者ID */
export const SERVER_SENDER = "server";

/**
 * メッセージをpushするための双方向チャネル
 * WebSocketの実装詳細は websocket-handler 側に閉じ込める
 */
export interface SignalChannel {
  isOpen(): boolean;
  send(data: string): void;
  close(code: number, reason: string): void;
}

export interface MediaState {
  videoEnabled: boolean;
  audioEnabled: boolean;
  screenSharing: boolean;
}

export interface Identity {
  userId: string;
  displayName: string;
  role: Role;
}

export interface Member extends Identity {
  readonly memberId: string;
  readonly joinedAt: Date;
  readonly media: MediaState;
  readonly channel: SignalChannel;
}

/** クライアントへ公開するメンバー情報（チャネルを含まない） */
export interface MemberInfo {
  memberId: string;
  userId: string;
  displayName: string;
  role: Role;
  joinedAt: string;
  media: MediaState;
}

export interface RoomInfo {
  roomId: string;
  capacity: number;
  createdAt: Date;
  memberCount: number;
  precreated: boolean;
}

export interface RegistryLimits {
  maxRooms: number;
  maxMembersPerRoom: number;
}

export interface ConnectRequest {
  meetingId: string;
  token: string | null;
}

// ---- inbound (client -> server) ----

const DirectedKindSchema = v.picklist(["offer", "answer", "ice-candidate"]);

export const DirectedMessageSchema = v.object({
  type: DirectedKindSchema,
  to: v.pipe(v.string(), v.minLength(1, "'to' must name a member")),
  payload: v.unknown(),
  timestamp: v.optional(v.string()),
});

export const ChatMessageSchema = v.object({
  type: v.literal("chat"),
  // text 以外のフィールドもそのまま中継する
  payload: v.looseObject({
    text: v.string(),
  }),
  timestamp: v.optional(v.string()),
});

export const MediaStateChangeSchema = v.object({
  type: v.literal("media-state-change"),
  payload: v.object({
    videoEnabled: v.optional(v.boolean()),
    audioEnabled: v.optional(v.boolean()),
    screenSharing: v.optional(v.boolean()),
  }),
  timestamp: v.optional(v.string()),
});

export const LeaveMessageSchema = v.object({
  type: v.literal("leave"),
});

export const PingMessageSchema = v.object({
  type: v.literal("ping"),
});

export const InboundEnvelopeSchema = v.looseObject({
  type: v.string(),
});

export type DirectedMessage = v.InferOutput<typeof DirectedMessageSchema>;
export type ChatMessage = v.InferOutput<typeof ChatMessageSchema>;
export type ChatPayload = ChatMessage["payload"];
export type MediaStateChangeMessage = v.InferOutput<
  typeof MediaStateChangeSchema
>;
export type LeaveMessage = v.InferOutput<typeof LeaveMessageSchema>;
export type PingMessage = v.InferOutput<typeof PingMessageSchema>;

export type InboundMessage =
  | DirectedMessage
  | ChatMessage
  | MediaStateChangeMessage
  | LeaveMessage
  | PingMessage;

// ---- outbound (server -> client) ----

export type ErrorCode =
  | "Unauthenticated"
  | "Forbidden"
  | "RoomFull"
  | "CapacityExceeded"
  | "TargetNotFound"
  | "InvalidMessage";

export type RoomClosingReason = "server-shutdown" | "meeting-ended";

export interface OutboundPayloads {
  "join-notify": MemberInfo;
  "leave-notify": { memberId: string; userId: string; reason: LeaveReason };
  offer: unknown;
  answer: unknown;
  "ice-candidate": unknown;
  chat: ChatPayload;
  "media-state-change": MediaState;
  error: { code: ErrorCode; message: string; target?: string };
  joined: { roomId: string; memberId: string; members: MemberInfo[] };
  pong: Record<string, never>;
  "room-closing": { roomId: string; reason: RoomClosingReason };
  "meeting-started": { roomId: string };
}

export type OutboundKind = keyof OutboundPayloads;

export interface SignalMessageOf<K extends OutboundKind> {
  readonly type: K;
  readonly from: string;
  readonly to?: string;
  readonly payload: OutboundPayloads[K];
  readonly timestamp: string;
}

