import { z } from "zod";
import type { Seat, SeatPreference } from "./room";
import type { GameResult, TerminalReason } from "./rules";

export type StateMessage = {
  type: "state";
  fen: string;
  color: Seat;
  last_move?: string;
  game_over?: boolean;
  result?: GameResult;
  reason?: TerminalReason;
};

export type ErrorMessage = {
  type: "error";
  message: string;
};

export type ServerMessage = StateMessage | ErrorMessage;

export const clientMessageSchema = z.object({
  type: z.literal("move"),
  move: z.string().min(1).max(16),
});

export type ClientMessage = z.infer<typeof clientMessageSchema>;

// advisory only: nothing here is authenticated
const connectParamsSchema = z.object({
  user_id: z.coerce.number().int().positive().optional().catch(undefined),
  username: z.string().trim().min(1).max(64).optional().catch(undefined),
  preferred: z.enum(["w", "b", "any"]).default("any").catch("any"),
});

export interface ConnectParams {
  userId?: number;
  username?: string;
  preferred: SeatPreference;
}

export const MALFORMED_MESSAGE = "Malformed message";

export function parseClientMessage(raw: string): ClientMessage | undefined {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const parsed = clientMessageSchema.safeParse(data);
  return parsed.success ? parsed.data : undefined;
}

export function parseConnectParams(query: URLSearchParams): ConnectParams {
  const parsed = connectParamsSchema.parse({
    user_id: query.get("user_id") ?? undefined,
    username: query.get("username") ?? undefined,
    preferred: query.get("preferred") ?? undefined,
  });
  return { userId: parsed.user_id, username: parsed.username, preferred: parsed.preferred };
}

const ROOM_PATH = /^\/ws\/([^/]+)\/?$/;
const MAX_ROOM_ID_LENGTH = 64;

/** Extracts the room id from `/ws/:roomId`, or undefined if the path is not a room. */
export function roomIdFromPath(pathname: string): string | undefined {
  const match = ROOM_PATH.exec(pathname);
  if (!match) return undefined;
  let roomId: string;
  try {
    roomId = decodeURIComponent(match[1]);
  } catch {
    return undefined;
  }
  roomId = roomId.trim();
  if (roomId.length === 0 || roomId.length > MAX_ROOM_ID_LENGTH) return undefined;
  return roomId;
}
