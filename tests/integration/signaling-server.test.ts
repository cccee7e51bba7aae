/**
 * 実サーバーを使った結合テスト
 *
 * テストフロー:
 * 1. 127.0.0.1 の空きポートでサーバーを起動
 * 2. クライアントで接続し、入室・転送・退室を確認
 * 3. 認証エラーや未知のパスでの拒否を確認
 */

import type { AddressInfo } from "node:net";
import { Effect, Either } from "effect";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createApp, listen } from "../../src/app";
import { makeSignalingClient } from "../../src/client/signaling";
import { loadConfig } from "../../src/config";
import { InMemoryMeetingDirectory } from "../../src/signaling/meeting-directory";
import type { SignalingSupervisor } from "../../src/signaling/supervisor";
import type { SignalingServer } from "../../src/signaling/websocket-handler";
import { TEST_SECRET, signToken } from "../utils/fixtures";

describe("signaling server", () => {
  let signaling: SignalingServer;
  let supervisor: SignalingSupervisor;
  let baseUrl: string;

  const meetingUrl = (meetingId: string, token?: string) =>
    `ws://${baseUrl}/ws/meetings/${meetingId}${token ? `?token=${token}` : ""}`;

  beforeAll(async () => {
    const config = loadConfig({
      HOST: "127.0.0.1",
      PORT: "0",
      JWT_SECRET: TEST_SECRET,
      LOG_LEVEL: "silent",
    });
    const directory = new InMemoryMeetingDirectory([
      { meetingId: "m1", hostUserId: "u-host", participantUserIds: ["u-alice"] },
      { meetingId: "m2", hostUserId: "u-host", participantUserIds: [] },
      { meetingId: "m3", hostUserId: "u-host", participantUserIds: [] },
    ]);
    const app = await createApp(config, directory);
    signaling = app.signaling;
    supervisor = app.supervisor;
    await listen(signaling, config.host, config.port);

    const address: AddressInfo | string | null = signaling.server.address();
    if (!address || typeof address === "string") {
      throw new Error("server is not listening on a TCP port");
    }
    baseUrl = `127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await signaling.close();
  });

  it("reports health over HTTP", async () => {
    const response = await fetch(`http://${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok", rooms: 0, members: 0 });
  });

  it("relays signaling between two members and announces departures", async () => {
    const hostToken = await signToken("u-host");
    const aliceToken = await signToken("u-alice", { name: "Alice" });

    const result = await Effect.runPromise(
      Effect.scoped(
        Effect.gen(function* () {
          const host = yield* makeSignalingClient(meetingUrl("m1", hostToken));

          const visit = yield* Effect.scoped(
            Effect.gen(function* () {
              const alice = yield* makeSignalingClient(meetingUrl("m1", aliceToken));
              const notify = yield* host.next;
              yield* alice.send({
                type: "offer",
                to: host.memberId,
                payload: { sdp: "v=0", type: "offer" },
              });
              const offer = yield* host.next;
              return { aliceId: alice.memberId, joined: alice.joined, notify, offer };
            }),
          );

          const left = yield* host.next;
          return { hostId: host.memberId, ...visit, left, info: supervisor.participantsInfo("m1") };
        }),
      ),
    );

    expect(result.joined.payload.members.map((m) => m.memberId)).toEqual([result.hostId]);
    expect(result.notify).toMatchObject({
      type: "join-notify",
      from: result.aliceId,
      payload: {
        memberId: result.aliceId,
        userId: "u-alice",
        displayName: "Alice",
        role: "participant",
      },
    });
    expect(result.offer).toMatchObject({
      type: "offer",
      from: result.aliceId,
      to: result.hostId,
      payload: { sdp: "v=0", type: "offer" },
    });
    expect(result.left).toMatchObject({
      type: "leave-notify",
      payload: { memberId: result.aliceId, userId: "u-alice", reason: "closed" },
    });
    expect(result.info.participants.map((p) => p.memberId)).toEqual([result.hostId]);
  });

  it("answers ping with pong", async () => {
    const token = await signToken("u-host");

    const pong = await Effect.runPromise(
      Effect.scoped(
        Effect.gen(function* () {
          const client = yield* makeSignalingClient(meetingUrl("m3", token));
          yield* client.send({ type: "ping" });
          return yield* client.next;
        }),
      ),
    );

    expect(pong).toMatchObject({ type: "pong", from: "server" });
  });

  it("rejects a connection without a token", async () => {
    const result = await Effect.runPromise(
      Effect.either(Effect.scoped(makeSignalingClient(meetingUrl("m1")))),
    );

    const failure = Either.isLeft(result) ? result.left : null;
    expect(failure?._tag).toBe("ConnectionRejected");
    expect(failure?._tag === "ConnectionRejected" && failure.code).toBe("Unauthenticated");
    expect(failure?.message).toBe("Missing token");
  });

  it("rejects users who are not invited", async () => {
    const token = await signToken("u-stranger");

    const result = await Effect.runPromise(
      Effect.either(Effect.scoped(makeSignalingClient(meetingUrl("m1", token)))),
    );

    const failure = Either.isLeft(result) ? result.left : null;
    expect(failure?._tag === "ConnectionRejected" && failure.code).toBe("Forbidden");
  });

  it("refuses upgrades on unknown paths", async () => {
    const result = await Effect.runPromise(
      Effect.either(Effect.scoped(makeSignalingClient(`ws://${baseUrl}/not-signaling`))),
    );

    const failure = Either.isLeft(result) ? result.left : null;
    expect(failure?._tag).toBe("WebSocketError");
    expect(failure?.message).toBe("Open failed");
  });

  it("closes members when their meeting ends", async () => {
    const token = await signToken("u-host");

    const result = await Effect.runPromise(
      Effect.scoped(
        Effect.gen(function* () {
          const client = yield* makeSignalingClient(meetingUrl("m2", token));
          yield* Effect.sync(() => supervisor.endMeeting("m2"));
          const notice = yield* client.next;
          const closed = yield* client.closed;
          return { notice, closed };
        }),
      ),
    );

    expect(result.notice).toMatchObject({
      type: "room-closing",
      payload: { roomId: "m2", reason: "meeting-ended" },
    });
    expect(result.closed).toEqual({ code: 1000, reason: "Meeting ended" });
  });
});
