import type { Logger } from "pino";
import WebSocket from "ws";
import type { ServerMessage } from "./protocol";
import type { Seat } from "./room";

/** The part of a socket the connection manager uses. */
export interface Peer {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
}

export interface ConnectionInfo {
  id: string;
  roomId: string;
  seat: Seat;
  userId?: number;
  username?: string;
}

interface Entry {
  info: ConnectionInfo;
  peer: Peer;
}

export type DropListener = (info: ConnectionInfo, error: Error) => void;

export class ConnectionManager {
  private readonly byId = new Map<string, Entry>();
  private readonly byRoom = new Map<string, Set<string>>();

  constructor(
    private readonly logger: Logger,
    private readonly onDrop?: DropListener,
  ) {}

  register(info: ConnectionInfo, peer: Peer): void {
    this.byId.set(info.id, { info, peer });
    let members = this.byRoom.get(info.roomId);
    if (!members) {
      members = new Set();
      this.byRoom.set(info.roomId, members);
    }
    members.add(info.id);
  }

  unregister(connectionId: string): ConnectionInfo | undefined {
    const entry = this.byId.get(connectionId);
    if (!entry) return undefined;
    this.byId.delete(connectionId);
    const members = this.byRoom.get(entry.info.roomId);
    members?.delete(connectionId);
    if (members?.size === 0) this.byRoom.delete(entry.info.roomId);
    return entry.info;
  }

  get(connectionId: string): ConnectionInfo | undefined {
    return this.byId.get(connectionId)?.info;
  }

  count(roomId: string): number {
    return this.byRoom.get(roomId)?.size ?? 0;
  }

  send(connectionId: string, message: ServerMessage): boolean {
    const entry = this.byId.get(connectionId);
    if (!entry) return false;
    return this.deliver(entry, JSON.stringify(message));
  }

  /**
   * Sends each connection in the room its own message. A peer that fails is
   * dropped; the rest still get theirs. Returns how many sends were attempted.
   */
  broadcast(roomId: string, build: (seat: Seat) => ServerMessage): number {
    const members = this.byRoom.get(roomId);
    if (!members) return 0;
    let sent = 0;
    for (const connectionId of Array.from(members)) {
      const entry = this.byId.get(connectionId);
      if (entry && this.deliver(entry, JSON.stringify(build(entry.info.seat)))) sent++;
    }
    return sent;
  }

  /** Distinct signed-in users with at least one open connection. */
  onlineUsers(): { user_id: number; username: string }[] {
    const users = new Map<number, string>();
    for (const { info } of this.byId.values()) {
      if (info.userId !== undefined && info.username !== undefined) {
        users.set(info.userId, info.username);
      }
    }
    return Array.from(users, ([user_id, username]) => ({ user_id, username }));
  }

  private deliver(entry: Entry, data: string): boolean {
    if (entry.peer.readyState !== WebSocket.OPEN) {
      this.drop(entry, new Error("socket is not open"));
      return false;
    }
    try {
      entry.peer.send(data, (err) => {
        if (err) this.drop(entry, err);
      });
      return true;
    } catch (err) {
      this.drop(entry, err instanceof Error ? err : new Error(String(err)));
      return false;
    }
  }

  private drop(entry: Entry, error: Error) {
    // already gone via close or an earlier failure
    if (this.byId.get(entry.info.id) !== entry) return;
    this.unregister(entry.info.id);
    this.logger.warn(
      { err: error, connectionId: entry.info.id, roomId: entry.info.roomId },
      "dropping connection after failed send",
    );
    this.onDrop?.(entry.info, error);
  }
}
