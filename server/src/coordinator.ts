import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { ConnectionManager, type ConnectionInfo, type Peer } from "./connections";
import type { GameFinalizer } from "./finalize";
import { MALFORMED_MESSAGE, parseClientMessage, type ConnectParams, type StateMessage } from "./protocol";
import type { Room, Seat } from "./room";
import { RoomQueue } from "./roomQueue";
import { RoomRegistry } from "./rooms";
import type { RulesEngine, Terminal } from "./rules";

export interface CoordinatorOptions {
  rules: RulesEngine;
  finalizer: GameFinalizer;
  logger: Logger;
  clock?: () => Date;
}

/**
 * Ties the registry, rooms, connections and finalizer together. Every read or
 * write of a room happens inside a task on that room's queue.
 */
export class GameCoordinator {
  readonly registry: RoomRegistry;
  readonly connections: ConnectionManager;
  private readonly queue = new RoomQueue();
  private readonly finalizer: GameFinalizer;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor({ rules, finalizer, logger, clock = () => new Date() }: CoordinatorOptions) {
    this.finalizer = finalizer;
    this.logger = logger;
    this.clock = clock;
    this.registry = new RoomRegistry(rules, clock);
    this.connections = new ConnectionManager(logger.child({ component: "connections" }), (info) => {
      this.queue.run(info.roomId, () => this.vacate(info)).catch((err: unknown) => {
        this.logger.error({ err, connectionId: info.id }, "failed to release dropped connection");
      });
    });
  }

  /** Seats a new connection and sends it the current position. */
  connect(roomId: string, peer: Peer, params: ConnectParams): Promise<ConnectionInfo> {
    const room = this.registry.getOrCreate(roomId);
    const connectionId = randomUUID();

    return this.queue.run(roomId, () => {
      const seat = room.join({ connectionId, preferred: params.preferred, userId: params.userId });
      const info: ConnectionInfo = {
        id: connectionId,
        roomId,
        seat,
        userId: params.userId,
        username: params.username,
      };
      this.connections.register(info, peer);
      this.connections.send(connectionId, { type: "state", fen: room.fen, color: seat });

      this.logger.info(
        { roomId, connectionId, seat, userId: params.userId, connections: this.connections.count(roomId) },
        "connection joined room",
      );
      return info;
    });
  }

  /** Handles one inbound frame from a connection. */
  async receive(connectionId: string, raw: string): Promise<void> {
    const info = this.connections.get(connectionId);
    if (!info) return;

    const message = parseClientMessage(raw);
    if (!message) {
      this.connections.send(connectionId, { type: "error", message: MALFORMED_MESSAGE });
      return;
    }

    const room = this.registry.get(info.roomId);
    if (!room) return;
    await this.queue.run(room.id, () => this.move(room, connectionId, message.move));
  }

  async disconnect(connectionId: string): Promise<void> {
    const info = this.connections.unregister(connectionId);
    if (!info) return;
    await this.queue.run(info.roomId, () => this.vacate(info));
  }

  private move(room: Room, connectionId: string, text: string) {
    const outcome = room.applyMove(connectionId, text);
    if (!outcome.ok) {
      this.logger.debug({ roomId: room.id, connectionId, move: text, reason: outcome.message }, "move rejected");
      this.connections.send(connectionId, { type: "error", message: outcome.message });
      return;
    }

    const { move, fen, terminal } = outcome;
    this.logger.debug({ roomId: room.id, connectionId, move, ply: room.moves.length }, "move applied");
    this.connections.broadcast(room.id, (color) => stateMessage(fen, color, move, terminal));

    if (terminal) this.finish(room, terminal);
  }

  private finish(room: Room, terminal: Terminal) {
    const outcome = room.conclude(terminal, this.finalizer, this.clock());
    if (!outcome) return;
    this.logger.info(
      { roomId: room.id, result: terminal.result, reason: terminal.reason, persisted: outcome.persisted },
      "game finished",
    );
  }

  private vacate(info: ConnectionInfo) {
    const room = this.registry.get(info.roomId);
    const seat = room?.leave(info.id);
    this.logger.info({ roomId: info.roomId, connectionId: info.id, seat }, "connection left room");
  }
}

function stateMessage(fen: string, color: Seat, lastMove: string, terminal?: Terminal): StateMessage {
  const message: StateMessage = { type: "state", fen, color, last_move: lastMove };
  if (terminal) {
    message.game_over = true;
    message.result = terminal.result;
    message.reason = terminal.reason;
  }
  return message;
}
