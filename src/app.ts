/**
 * アプリケーションの組み立て
 */

import type { AppConfig } from "./config";
import {
  InMemoryMeetingDirectory,
  type MeetingDirectory,
} from "./signaling/meeting-directory";
import { setLogLevel } from "./signaling/logger";
import { SignalingSupervisor } from "./signaling/supervisor";
import {
  createSignalingServer,
  type SignalingServer,
} from "./signaling/websocket-handler";

export async function createApp(
  config: AppConfig,
  directory?: MeetingDirectory
) {
  setLogLevel(config.logLevel);

  const meetings =
    directory ??
    (config.meetingsFile
      ? await InMemoryMeetingDirectory.fromFile(config.meetingsFile)
      : new InMemoryMeetingDirectory());

  const supervisor = new SignalingSupervisor({
    limits: {
      maxRooms: config.maxRooms,
      maxMembersPerRoom: config.maxParticipantsPerMeeting,
    },
    auth: {
      secret: config.jwtSecret,
      issuer: config.jwtIssuer,
      timeoutMs: config.authTimeoutMs,
      directory: meetings,
    },
    duplicatePolicy: config.duplicatePolicy,
  });

  const signaling = createSignalingServer({
    supervisor,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    idleTimeoutMs: config.idleTimeoutMs,
    maxPayloadBytes: config.maxMessageBytes,
  });

  return { supervisor, signaling, meetings };
}

/**
 * listen が完了するまで待つ
 */
export function listen(
  signaling: SignalingServer,
  host: string,
  port: number
): Promise<void> {
  return new Promise((resolve, reject) => {
    signaling.server.once("error", reject);
    signaling.server.listen(port, host, () => {
      signaling.server.off("error", reject);
      resolve();
    });
  });
}
