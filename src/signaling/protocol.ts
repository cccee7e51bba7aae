/**
 * ワイヤーフォーマットの純粋関数
 */

import { Either } from "effect";
import * as v from "valibot";
import { InvalidMessage } from "./errors";
import {
  ChatMessageSchema,
  DirectedMessageSchema,
  InboundEnvelopeSchema,
  LeaveMessageSchema,
  MediaStateChangeSchema,
  PingMessageSchema,
  type InboundMessage,
  type Member,
  type MemberInfo,
  type OutboundKind,
  type OutboundPayloads,
  type SignalMessageOf,
} from "./types";

/**
 * SignalMessageを作成
 * 作成後は変更されない
 */
export function createMessage<K extends OutboundKind>(
  type: K,
  from: string,
  payload: OutboundPayloads[K],
  to?: string
): SignalMessageOf<K> {
  const timestamp = new Date().toISOString();
  const message: SignalMessageOf<K> =
    to === undefined
      ? { type, from, payload, timestamp }
      : { type, from, to, payload, timestamp };
  return Object.freeze(message);
}

export function encodeMessage<K extends OutboundKind>(
  message: SignalMessageOf<K>
): string {
  return JSON.stringify(message);
}

/**
 * メンバーを公開用の情報に変換
 */
export function toMemberInfo(member: Member): MemberInfo {
  return {
    memberId: member.memberId,
    userId: member.userId,
    displayName: member.displayName,
    role: member.role,
    joinedAt: member.joinedAt.toISOString(),
    media: { ...member.media },
  };
}

function parseJson(data: string): Either.Either<unknown, InvalidMessage> {
  return Either.try({
    try: (): unknown => JSON.parse(data),
    catch: () => new InvalidMessage({ message: "Invalid JSON format" }),
  });
}

function validate<TSchema extends v.GenericSchema>(
  schema: TSchema,
  input: unknown
): Either.Either<v.InferOutput<TSchema>, InvalidMessage> {
  const result = v.safeParse(schema, input);
  if (result.success) {
    return Either.right(result.output);
  }
  return Either.left(
    new InvalidMessage({ message: v.summarize(result.issues) })
  );
}

function validateByType(
  type: string,
  json: unknown
): Either.Either<InboundMessage, InvalidMessage> {
  switch (type) {
    case "offer":
    case "answer":
    case "ice-candidate":
      return validate(DirectedMessageSchema, json);
    case "chat":
      return validate(ChatMessageSchema, json);
    case "media-state-change":
      return validate(MediaStateChangeSchema, json);
    case "leave":
      return validate(LeaveMessageSchema, json);
    case "ping":
      return validate(PingMessageSchema, json);
    default:
      return Either.left(
        new InvalidMessage({ message: `Unknown message type: ${type}` })
      );
  }
}

/**
 * 受信データをInboundMessageにデコード
 */
export function decodeInbound(
  data: string
): Either.Either<InboundMessage, InvalidMessage> {
  return Either.flatMap(parseJson(data), (json) =>
    Either.flatMap(validate(InboundEnvelopeSchema, json), (envelope) =>
      validateByType(envelope.type, json)
    )
  );
}
