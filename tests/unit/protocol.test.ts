/**
 * ワイヤーフォーマットのテスト
 */

import { Either } from "effect";
import { describe, expect, it } from "vitest";
import {
  createMessage,
  decodeInbound,
  encodeMessage,
  toMemberInfo,
} from "../../src/signaling/protocol";
import { makeMember } from "../utils/fixtures";

const decodeError = (data: string): string => {
  const result = decodeInbound(data);
  if (Either.isRight(result)) {
    throw new Error(`expected ${data} to be rejected`);
  }
  return result.left.message;
};

describe("createMessage", () => {
  it("omits 'to' for broadcast messages", () => {
    const message = createMessage("chat", "m-1", { text: "hi" });

    expect(message).not.toHaveProperty("to");
    expect(message.from).toBe("m-1");
    expect(message.payload).toEqual({ text: "hi" });
    expect(Number.isNaN(Date.parse(message.timestamp))).toBe(false);
  });

  it("keeps the recipient for directed messages and freezes the result", () => {
    const message = createMessage("offer", "m-1", { sdp: "v=0" }, "m-2");

    expect(message.to).toBe("m-2");
    expect(Object.isFrozen(message)).toBe(true);
  });

  it("encodes to JSON with the envelope fields", () => {
    const message = createMessage("pong", "server", {}, "m-1");

    expect(JSON.parse(encodeMessage(message))).toEqual({
      type: "pong",
      from: "server",
      to: "m-1",
      payload: {},
      timestamp: message.timestamp,
    });
  });
});

describe("toMemberInfo", () => {
  it("drops the channel and serializes the join time", () => {
    const info = toMemberInfo(makeMember("m-1", "alice", "host"));

    expect(info).toEqual({
      memberId: "m-1",
      userId: "alice",
      displayName: "User alice",
      role: "host",
      joinedAt: "2024-05-01T10:00:00.000Z",
      media: { videoEnabled: true, audioEnabled: true, screenSharing: false },
    });
  });
});

describe("decodeInbound", () => {
  it("decodes directed signaling messages", () => {
    const frame = { type: "ice-candidate", to: "m-2", payload: { candidate: "c" } };
    const result = decodeInbound(JSON.stringify(frame));

    expect(Either.getOrNull(result)).toEqual(frame);
  });

  it("decodes chat, media-state-change, leave and ping", () => {
    expect(Either.getOrNull(decodeInbound('{"type":"chat","payload":{"text":"hello"}}'))).toEqual({
      type: "chat",
      payload: { text: "hello" },
    });
    const frame = '{"type":"media-state-change","payload":{"audioEnabled":false}}';
    expect(Either.getOrNull(decodeInbound(frame))).toEqual({
      type: "media-state-change",
      payload: { audioEnabled: false },
    });
    expect(Either.getOrNull(decodeInbound('{"type":"leave"}'))).toEqual({ type: "leave" });
    expect(Either.getOrNull(decodeInbound('{"type":"ping"}'))).toEqual({ type: "ping" });
  });

  it("keeps chat fields beyond text", () => {
    const frame = '{"type":"chat","payload":{"text":"hi","replyTo":"m-9"}}';

    expect(Either.getOrNull(decodeInbound(frame))).toEqual({
      type: "chat",
      payload: { text: "hi", replyTo: "m-9" },
    });
  });

  it("rejects malformed JSON", () => {
    expect(decodeError("{not json")).toBe("Invalid JSON format");
  });

  it("rejects unknown message types", () => {
    expect(decodeError('{"type":"dance"}')).toBe("Unknown message type: dance");
  });

  it("rejects messages without a type", () => {
    expect(Either.isLeft(decodeInbound('{"payload":{}}'))).toBe(true);
    expect(Either.isLeft(decodeInbound("[]"))).toBe(true);
  });

  it("rejects directed messages without a recipient", () => {
    expect(Either.isLeft(decodeInbound('{"type":"offer","payload":{}}'))).toBe(true);
    expect(decodeError('{"type":"offer","to":"","payload":{}}')).toContain(
      "'to' must name a member",
    );
  });

  it("rejects chat without text", () => {
    expect(Either.isLeft(decodeInbound('{"type":"chat","payload":{}}'))).toBe(true);
  });
});
