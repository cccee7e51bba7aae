import { Data, Deferred, Effect, Queue, Stream } from "effect";
import * as v from "valibot";
import WebSocket from "ws";
import type { InboundMessage } from "../signaling/types";

export class WebSocketError extends Data.TaggedError("WebSocketError")<{
  message: string;
  originalError?: unknown;
}> {}

/** The server refused the channel before it was joined (auth, entitlement or capacity). */
export class ConnectionRejected extends Data.TaggedError("ConnectionRejected")<{
  code: string;
  message: string;
}> {}

const MediaStateSchema = v.object({
  videoEnabled: v.boolean(),
  audioEnabled: v.boolean(),
  screenSharing: v.boolean(),
});

const MemberInfoSchema = v.object({
  memberId: v.string(),
  userId: v.string(),
  displayName: v.string(),
  role: v.picklist(["host", "participant", "guest"]),
  joinedAt: v.string(),
  media: MediaStateSchema,
});

const envelope = {
  from: v.string(),
  to: v.optional(v.string()),
  timestamp: v.string(),
};

const JoinedMessageSchema = v.object({
  ...envelope,
  type: v.literal("joined"),
  payload: v.object({
    roomId: v.string(),
    memberId: v.string(),
    members: v.array(MemberInfoSchema),
  }),
});

export const ServerMessageSchema = v.variant("type", [
  JoinedMessageSchema,
  v.object({ ...envelope, type: v.literal("join-notify"), payload: MemberInfoSchema }),
  v.object({
    ...envelope,
    type: v.literal("leave-notify"),
    payload: v.object({ memberId: v.string(), userId: v.string(), reason: v.string() }),
  }),
  v.object({ ...envelope, type: v.literal("offer"), payload: v.unknown() }),
  v.object({ ...envelope, type: v.literal("answer"), payload: v.unknown() }),
  v.object({ ...envelope, type: v.literal("ice-candidate"), payload: v.unknown() }),
  v.object({
    ...envelope,
    type: v.literal("chat"),
    payload: v.looseObject({ text: v.string() }),
  }),
  v.object({ ...envelope, type: v.literal("media-state-change"), payload: MediaStateSchema }),
  v.object({
    ...envelope,
    type: v.literal("error"),
    payload: v.object({ code: v.string(), message: v.string(), target: v.optional(v.string()) }),
  }),
  v.object({ ...envelope, type: v.literal("pong"), payload: v.unknown() }),
  v.object({
    ...envelope,
    type: v.literal("room-closing"),
    payload: v.object({ roomId: v.string(), reason: v.string() }),
  }),
  v.object({
    ...envelope,
    type: v.literal("meeting-started"),
    payload: v.object({ roomId: v.string() }),
  }),
]);

export type ServerMessage = v.InferOutput<typeof ServerMessageSchema>;
export type JoinedMessage = v.InferOutput<typeof JoinedMessageSchema>;
export type ClientMessage = InboundMessage;

export interface CloseInfo {
  code: number;
  reason: string;
}

export interface SignalingClientOptions {
  createWebSocket?: (url: string) => WebSocket;
  /** Frames that are not JSON or do not match the protocol. */
  onInvalidFrame?: (data: string) => void;
}

const toText = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
};

const decodeFrame = (data: string): ServerMessage | null => {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    return null;
  }
  const result = v.safeParse(ServerMessageSchema, json);
  return result.success ? result.output : null;
};

const settleHandshake = (
  message: ServerMessage,
): Effect.Effect<JoinedMessage, ConnectionRejected | WebSocketError> => {
  switch (message.type) {
    case "joined":
      return Effect.succeed(message);
    case "error":
      return Effect.fail(
        new ConnectionRejected({ code: message.payload.code, message: message.payload.message }),
      );
    default:
      return Effect.fail(new WebSocketError({ message: `Unexpected ${message.type} before join` }));
  }
};

/**
 * Opens a signaling channel for one meeting and waits until the server has
 * admitted it. Fails with ConnectionRejected when the server refuses the
 * channel, so callers can tell auth problems apart from a full room.
 */
export const makeSignalingClient = (url: string, options: SignalingClientOptions = {}) =>
  Effect.gen(function* () {
    const createWebSocket = options.createWebSocket ?? ((u: string) => new WebSocket(u));
    const inbox = yield* Queue.unbounded<ServerMessage>();
    const handshake = yield* Deferred.make<JoinedMessage, ConnectionRejected | WebSocketError>();
    const closed = yield* Deferred.make<CloseInfo>();

    const ws = yield* Effect.acquireRelease(
      Effect.async<WebSocket, WebSocketError>((resume) => {
        const s = createWebSocket(url);
        let lastError: Error | null = null;
        let handshakeSettled = false;

        s.on("message", (raw) => {
          const text = toText(raw);
          const message = decodeFrame(text);
          if (!message) {
            options.onInvalidFrame?.(text);
            return;
          }
          // The first frame settles the handshake; everything after it goes to the inbox.
          if (!handshakeSettled) {
            handshakeSettled = true;
            Deferred.unsafeDone(handshake, settleHandshake(message));
            return;
          }
          Queue.unsafeOffer(inbox, message);
        });

        s.on("error", (error) => {
          lastError = error;
        });

        s.on("close", (code, reason) => {
          const info = { code, reason: reason.toString("utf8") };
          Deferred.unsafeDone(
            handshake,
            Effect.fail(
              new WebSocketError({
                message: `Closed before join (code ${info.code})`,
                originalError: lastError ?? undefined,
              }),
            ),
          );
          Deferred.unsafeDone(closed, Effect.succeed(info));
        });

        const onOpen = () => {
          s.off("error", onError);
          resume(Effect.succeed(s));
        };
        const onError = (error: Error) => {
          s.off("open", onOpen);
          resume(Effect.fail(new WebSocketError({ message: "Open failed", originalError: error })));
        };
        s.once("open", onOpen);
        s.once("error", onError);
      }),
      (ws) =>
        Effect.sync(() => {
          if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
            ws.close(1000, "Client closed");
          }
        }),
    );

    const joined = yield* Deferred.await(handshake);

    const send = (msg: ClientMessage) =>
      Effect.sync(() => {
        if (ws.readyState === WebSocket.OPEN) {
          ws.send(JSON.stringify(msg));
        }
      });

    return {
      ws,
      joined,
      memberId: joined.payload.memberId,
      next: Queue.take(inbox),
      messages: Stream.fromQueue(inbox),
      closed: Deferred.await(closed),
      send,
    };
  });
