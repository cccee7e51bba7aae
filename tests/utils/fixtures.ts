import { SignJWT } from "jose";
import { RoomRegistry } from "../../src/signaling/room-registry";
import type { Member, RegistryLimits, Role } from "../../src/signaling/types";
import { FakeChannel } from "./fake-channel";

export const TEST_SECRET = "test-secret";

export interface TokenOptions {
  name?: string;
  guest?: boolean;
  type?: string;
  /** null なら exp を付けない */
  expiresAt?: number | string | null;
  issuer?: string;
  secret?: string;
}

/**
 * テスト用アクセストークンを発行
 */
export function signToken(
  userId: string,
  options: TokenOptions = {},
): Promise<string> {
  const claims: Record<string, unknown> = { type: options.type ?? "access" };
  if (options.name !== undefined) claims.name = options.name;
  if (options.guest !== undefined) claims.guest = options.guest;

  const jwt = new SignJWT(claims)
    .setProtectedHeader({ alg: "HS256" })
    .setSubject(userId)
    .setIssuedAt();
  if (options.expiresAt !== null) jwt.setExpirationTime(options.expiresAt ?? "1h");
  if (options.issuer) jwt.setIssuer(options.issuer);

  return jwt.sign(new TextEncoder().encode(options.secret ?? TEST_SECRET));
}

export function createRegistry(limits: Partial<RegistryLimits> = {}): RoomRegistry {
  return new RoomRegistry({
    maxRooms: limits.maxRooms ?? 10,
    maxMembersPerRoom: limits.maxMembersPerRoom ?? 10,
  });
}

export function makeMember(
  memberId: string,
  userId: string = memberId,
  role: Role = "participant",
  channel: FakeChannel = new FakeChannel(),
): Member {
  return {
    memberId,
    userId,
    displayName: `User ${userId}`,
    role,
    joinedAt: new Date("2024-05-01T10:00:00.000Z"),
    media: { videoEnabled: true, audioEnabled: true, screenSharing: false },
    channel,
  };
}
