import { Data } from "effect";
import type { ErrorCode } from "./types";

export class Unauthenticated extends Data.TaggedError("Unauthenticated")<{
  message: string;
  originalError?: unknown;
}> {}

export class Forbidden extends Data.TaggedError("Forbidden")<{
  message: string;
  userId: string;
  meetingId: string;
}> {}

export class RoomFull extends Data.TaggedError("RoomFull")<{
  message: string;
  roomId: string;
  capacity: number;
}> {}

export class CapacityExceeded extends Data.TaggedError("CapacityExceeded")<{
  message: string;
  limit: number;
}> {}

export class TargetNotFound extends Data.TaggedError("TargetNotFound")<{
  message: string;
  target: string;
}> {}

export class InvalidMessage extends Data.TaggedError("InvalidMessage")<{
  message: string;
}> {}

/**
 * チャネル切断
 * 内部用。他クライアントには leave-notify としてのみ観測される
 */
export class ChannelClosed extends Data.TaggedError("ChannelClosed")<{
  message: string;
  code: number;
}> {}

export type AuthError = Unauthenticated | Forbidden;
export type AdmissionError = RoomFull | CapacityExceeded;
export type RejectionError = AuthError | AdmissionError;
export type MessageError = TargetNotFound | InvalidMessage;

/**
 * 接続拒否時のcloseコード
 * 拒否理由は 4000 番台のアプリケーション領域で区別する
 */
export const CLOSE_CODES = {
  normal: 1000,
  goingAway: 1001,
  policyViolation: 1008,
  internalError: 1011,
  replaced: 4000,
  Unauthenticated: 4401,
  Forbidden: 4403,
  RoomFull: 4409,
  CapacityExceeded: 4429,
} as const;

export function closeCodeFor(error: RejectionError): number {
  switch (error._tag) {
    case "Unauthenticated":
      return CLOSE_CODES.Unauthenticated;
    case "Forbidden":
      return CLOSE_CODES.Forbidden;
    case "RoomFull":
      return CLOSE_CODES.RoomFull;
    case "CapacityExceeded":
      return CLOSE_CODES.CapacityExceeded;
  }
}

export function errorCodeOf(error: RejectionError | MessageError): ErrorCode {
  return error._tag;
}
