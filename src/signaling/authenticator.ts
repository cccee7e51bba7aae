/**
 * 接続時の認証・認可
 *
 * トークン検証とミーティングへの参加資格の確認のみを行い、状態は変更しない
 */

import { Duration, Effect } from "effect";
import { errors as joseErrors, jwtVerify } from "jose";
import * as v from "valibot";
import { Forbidden, Unauthenticated } from "./errors";
import type { MeetingDirectory } from "./meeting-directory";
import type { ConnectRequest, Identity } from "./types";

export interface AuthenticatorOptions {
  secret: string;
  issuer?: string;
  timeoutMs: number;
  directory: MeetingDirectory;
}

const AccessClaimsSchema = v.object({
  sub: v.pipe(v.string(), v.minLength(1)),
  type: v.literal("access"),
  name: v.optional(v.string()),
  guest: v.optional(v.boolean()),
});

export type AccessClaims = v.InferOutput<typeof AccessClaimsSchema>;

function describeVerifyError(error: unknown): string {
  if (error instanceof joseErrors.JWTExpired) return "Token expired";
  if (error instanceof joseErrors.JWTClaimValidationFailed) {
    return `Invalid token claim: ${error.claim}`;
  }
  if (error instanceof joseErrors.JOSEError) {
    return `Invalid token (${error.code})`;
  }
  return "Invalid token";
}

/**
 * JWTを検証してアクセストークンのクレームを取り出す
 * exp のないトークンは受け付けない
 */
export const verifyAccessToken = (
  token: string,
  secret: string,
  issuer?: string
) =>
  Effect.gen(function* () {
    const key = new TextEncoder().encode(secret);
    const { payload } = yield* Effect.tryPromise({
      try: () =>
        jwtVerify(token, key, {
          algorithms: ["HS256"],
          requiredClaims: ["exp"],
          ...(issuer ? { issuer } : {}),
        }),
      catch: (error) =>
        new Unauthenticated({
          message: describeVerifyError(error),
          originalError: error,
        }),
    });

    const claims = v.safeParse(AccessClaimsSchema, payload);
    if (!claims.success) {
      return yield* Effect.fail(
        new Unauthenticated({ message: "Token is not an access token" })
      );
    }
    return claims.output;
  });

/**
 * host / participant の判定
 */
export const resolveRole = (
  directory: MeetingDirectory,
  claims: AccessClaims,
  meetingId: string
) =>
  Effect.gen(function* () {
    const [isHost, isParticipant] = yield* Effect.tryPromise({
      try: () =>
        Promise.all([
          directory.isHost(claims.sub, meetingId),
          directory.isParticipant(claims.sub, meetingId),
        ]),
      catch: (error) =>
        new Unauthenticated({
          message: "Meeting access lookup failed",
          originalError: error,
        }),
    });

    if (isHost) return "host" as const;
    if (isParticipant) {
      return claims.guest ? ("guest" as const) : ("participant" as const);
    }

    return yield* Effect.fail(
      new Forbidden({
        message: "Access denied",
        userId: claims.sub,
        meetingId,
      })
    );
  });

/**
 * 認証のメイン関数
 * 全体を timeoutMs で打ち切り、タイムアウトは Unauthenticated として扱う
 */
export const authenticate = (
  options: AuthenticatorOptions,
  request: ConnectRequest
) =>
  Effect.gen(function* () {
    if (!request.token) {
      return yield* Effect.fail(
        new Unauthenticated({ message: "Missing token" })
      );
    }

    const claims = yield* verifyAccessToken(
      request.token,
      options.secret,
      options.issuer
    );
    const role = yield* resolveRole(
      options.directory,
      claims,
      request.meetingId
    );
    const identity: Identity = {
      userId: claims.sub,
      displayName: claims.name ?? claims.sub,
      role,
    };
    return identity;
  }).pipe(
    Effect.timeoutFail({
      duration: Duration.millis(options.timeoutMs),
      onTimeout: () =>
        new Unauthenticated({ message: "Authentication timed out" }),
    })
  );
