/**
 * メッセージ処理の純粋関数
 */

import { Either, Option } from "effect";
import { TargetNotFound, errorCodeOf, type MessageError } from "./errors";
import {
  logChannelNotOpen,
  logInvalidMessage,
  logMessageRelayed,
  logSendError,
  logTargetNotFound,
} from "./logger";
import { createMessage, decodeInbound, encodeMessage } from "./protocol";
import type { RoomRegistry } from "./room-registry";
import {
  SERVER_SENDER,
  type ChatMessage,
  type DirectedMessage,
  type MediaStateChangeMessage,
  type Member,
  type OutboundKind,
  type SignalMessageOf,
} from "./types";

export type RouteOutcome =
  | { kind: "relayed"; recipients: number }
  | { kind: "leave" }
  | { kind: "rejected"; error: MessageError };

export interface RouteContext {
  registry: RoomRegistry;
  roomId: string;
  sender: Member;
}

/**
 * 1メンバーのチャネルへメッセージを送信
 */
export function deliver<K extends OutboundKind>(
  member: Member,
  message: SignalMessageOf<K>
): boolean {
  if (!member.channel.isOpen()) {
    logChannelNotOpen(member.memberId, message.type);
    return false;
  }

  try {
    member.channel.send(encodeMessage(message));
    return true;
  } catch (sendError) {
    logSendError(member.memberId, message.type, sendError);
    return false;
  }
}

/**
 * スナップショット内の全メンバーへ送信
 * excludeMemberId は除く
 */
export function broadcast<K extends OutboundKind>(
  members: ReadonlyArray<Member>,
  message: SignalMessageOf<K>,
  excludeMemberId?: string
): number {
  let delivered = 0;
  for (const member of members) {
    if (member.memberId === excludeMemberId) continue;
    if (deliver(member, message)) delivered++;
  }
  return delivered;
}

/**
 * 送信者へエラーを返す
 */
export function replyError(member: Member, error: MessageError): void {
  const code = errorCodeOf(error);
  const payload =
    error._tag === "TargetNotFound"
      ? { code, message: error.message, target: error.target }
      : { code, message: error.message };
  deliver(
    member,
    createMessage("error", SERVER_SENDER, payload, member.memberId)
  );
}

/**
 * offer/answer/ice-candidate を宛先メンバーへ転送
 */
export function forwardDirected(
  context: RouteContext,
  message: DirectedMessage
): RouteOutcome {
  const { registry, roomId, sender } = context;
  const target = registry.findMember(roomId, message.to);

  if (Option.isNone(target)) {
    logTargetNotFound(message.type, sender.memberId, message.to);
    const error = new TargetNotFound({
      message: `Member ${message.to} is not in this meeting`,
      target: message.to,
    });
    replyError(sender, error);
    return { kind: "rejected", error };
  }

  const outbound = createMessage(
    message.type,
    sender.memberId,
    message.payload,
    message.to
  );
  const recipients = deliver(target.value, outbound) ? 1 : 0;
  logMessageRelayed(message.type, sender.memberId, recipients);
  return { kind: "relayed", recipients };
}

export function broadcastChat(
  context: RouteContext,
  message: ChatMessage
): RouteOutcome {
  const { registry, roomId, sender } = context;
  const outbound = createMessage("chat", sender.memberId, message.payload);
  const recipients = broadcast(
    registry.listMembers(roomId),
    outbound,
    sender.memberId
  );
  logMessageRelayed(message.type, sender.memberId, recipients);
  return { kind: "relayed", recipients };
}

/**
 * 送信者のメディア状態を更新してから他メンバーへ通知
 */
export function broadcastMediaState(
  context: RouteContext,
  message: MediaStateChangeMessage
): RouteOutcome {
  const { registry, roomId, sender } = context;
  const updated = registry.updateMember(
    roomId,
    sender.memberId,
    message.payload
  );
  const media = Option.match(updated, {
    onNone: () => sender.media,
    onSome: (member) => member.media,
  });

  const outbound = createMessage("media-state-change", sender.memberId, {
    videoEnabled: media.videoEnabled,
    audioEnabled: media.audioEnabled,
    screenSharing: media.screenSharing,
  });
  const recipients = broadcast(
    registry.listMembers(roomId),
    outbound,
    sender.memberId
  );
  logMessageRelayed(message.type, sender.memberId, recipients);
  return { kind: "relayed", recipients };
}

/**
 * メッセージ処理のメイン関数
 * 受信順に同期的に処理するため、送信者ごとの順序は保たれる
 */
export function routeMessage(
  context: RouteContext,
  data: string
): RouteOutcome {
  const { sender } = context;
  const decoded = decodeInbound(data);

  if (Either.isLeft(decoded)) {
    logInvalidMessage(sender.memberId, data.length, decoded.left.message);
    replyError(sender, decoded.left);
    return { kind: "rejected", error: decoded.left };
  }

  const message = decoded.right;
  switch (message.type) {
    case "offer":
    case "answer":
    case "ice-candidate":
      return forwardDirected(context, message);
    case "chat":
      return broadcastChat(context, message);
    case "media-state-change":
      return broadcastMediaState(context, message);
    case "ping":
      deliver(
        sender,
        createMessage("pong", SERVER_SENDER, {}, sender.memberId)
      );
      return { kind: "relayed", recipients: 1 };
    case "leave":
      return { kind: "leave" };
  }
}
