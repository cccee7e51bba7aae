/**
 * ログ処理の純粋関数
 */

import type { LeaveReason, Role } from "./types";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function debug(message: string): void {
  if (enabled("debug")) console.debug(`[Signaling] ${message}`);
}

function info(message: string): void {
  if (enabled("info")) console.log(`[Signaling] ${message}`);
}

function warn(message: string): void {
  if (enabled("warn")) console.warn(`[Signaling] ${message}`);
}

function error(message: string, cause?: unknown): void {
  if (!enabled("error")) return;
  if (cause === undefined) {
    console.error(`[Signaling] ${message}`);
    return;
  }
  console.error(`[Signaling] ${message}:`, cause);
  if (cause instanceof Error && cause.stack) {
    console.error(`[Signaling] Error stack: ${cause.stack}`);
  }
}

/**
 * サーバー起動ログを出力
 */
export function logServerListening(host: string, port: number): void {
  info(`Listening on ${host}:${port}`);
}

/**
 * WebSocket接続受け付けログを出力
 */
export function logConnectionAccepted(
  meetingId: string,
  memberId: string
): void {
  info(
    `Connection accepted for meeting ${meetingId}, member_id=${memberId}`
  );
}

/**
 * 不正なアップグレード要求のログを出力
 */
export function logUpgradeRejected(url: string, status: number): void {
  warn(`Upgrade rejected with status ${status}: ${url}`);
}

/**
 * 認証・入室拒否ログを出力
 * トークンの値は出力しない
 */
export function logAdmissionRejected(
  meetingId: string,
  memberId: string,
  tag: string,
  detail: string
): void {
  warn(
    `Admission rejected (${tag}) for meeting ${meetingId}, member_id=${memberId}: ${detail}`
  );
}

export function logAuthorized(
  meetingId: string,
  userId: string,
  role: Role
): void {
  debug(`Authorized user ${userId} as ${role} for meeting ${meetingId}`);
}

/**
 * メンバー入室ログを出力
 */
export function logMemberJoined(
  roomId: string,
  memberId: string,
  userId: string,
  memberCount: number
): void {
  info(
    `User ${userId} joined meeting ${roomId} (member_id=${memberId}, members=${memberCount})`
  );
}

/**
 * メンバー退室ログを出力
 */
export function logMemberLeft(
  roomId: string,
  memberId: string,
  reason: LeaveReason,
  remaining: number
): void {
  info(
    `Member ${memberId} left meeting ${roomId} (reason=${reason}, remaining=${remaining})`
  );
}

export function logRoomEvicted(roomId: string): void {
  debug(`Room ${roomId} evicted from registry`);
}

/**
 * メッセージ転送成功ログを出力
 */
export function logMessageRelayed(
  type: string,
  from: string,
  recipients: number
): void {
  debug(`Relayed ${type} from ${from} to ${recipients} recipient(s)`);
}

/**
 * 転送先が見つからない場合の警告ログを出力
 */
export function logTargetNotFound(
  type: string,
  from: string,
  target: string
): void {
  warn(`Target ${target} not found for ${type} from ${from}`);
}

/**
 * 不正メッセージのログを出力
 */
export function logInvalidMessage(
  from: string,
  dataLength: number,
  reason: string
): void {
  warn(`Invalid message from ${from} (data_length=${dataLength}): ${reason}`);
}

/**
 * 入室前の保留フレームが上限を超えたときのログを出力
 */
export function logPendingOverflow(
  memberId: string,
  frames: number,
  bytes: number
): void {
  warn(
    `Too much traffic before join from ${memberId} (frames=${frames}, bytes=${bytes})`
  );
}

/**
 * メッセージ送信失敗ログを出力
 */
export function logSendError(
  memberId: string,
  type: string,
  cause: unknown
): void {
  error(`Failed to send ${type} to ${memberId}`, cause);
}

/**
 * チャネルが既に閉じている場合のログを出力
 */
export function logChannelNotOpen(memberId: string, type: string): void {
  debug(`Channel for ${memberId} is not open, ${type} not delivered`);
}

/**
 * WebSocketクローズログを出力
 */
export function logChannelClosed(
  memberId: string,
  code: number,
  reason: string
): void {
  debug(
    `Channel closed for ${memberId}, code: ${code}, reason: ${reason || "(none)"}`
  );
}

/**
 * WebSocketエラーログを出力
 */
export function logChannelError(memberId: string, cause: unknown): void {
  error(`Channel error for ${memberId}`, cause);
}

export function logHeartbeatTerminated(
  channelId: string,
  idleMs: number
): void {
  warn(
    `Terminating unresponsive channel ${channelId} after ${idleMs}ms without traffic`
  );
}

export function logDuplicateReplaced(
  roomId: string,
  userId: string,
  memberId: string
): void {
  info(
    `Replacing older connection ${memberId} of user ${userId} in meeting ${roomId}`
  );
}

export function logRoomClosing(
  roomId: string,
  reason: string,
  members: number
): void {
  info(`Closing meeting ${roomId} (reason=${reason}, members=${members})`);
}

export function logShutdown(rooms: number, sessions: number): void {
  info(`Shutting down: rooms=${rooms}, sessions=${sessions}`);
}

/**
 * 想定外の例外ログを出力
 */
export function logUnexpectedError(context: string, cause: unknown): void {
  error(`Unexpected error in ${context}`, cause);
}
