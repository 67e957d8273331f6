import { Room, type RoomPhase } from "./room";
import type { RulesEngine } from "./rules";

export interface RoomSummary {
  id: string;
  phase: RoomPhase;
  white: boolean;
  black: boolean;
  connections: number;
  moves: number;
  createdAt: string;
}

/** The only shared map of rooms. Rooms are never removed. */
export class RoomRegistry {
  private readonly rooms = new Map<string, Room>();

  constructor(
    private readonly rules: RulesEngine,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  getOrCreate(roomId: string): Room {
    let room = this.rooms.get(roomId);
    if (!room) {
      room = new Room(roomId, this.rules, this.clock());
      this.rooms.set(roomId, room);
    }
    return room;
  }

  get(roomId: string): Room | undefined {
    return this.rooms.get(roomId);
  }

  get size(): number {
    return this.rooms.size;
  }

  list(): RoomSummary[] {
    return Array.from(this.rooms.values(), (room) => {
      const taken = room.occupiedSeats();
      return {
        id: room.id,
        phase: room.phase,
        white: taken.has("w"),
        black: taken.has("b"),
        connections: room.connectionCount,
        moves: room.moves.length,
        createdAt: room.createdAt.toISOString(),
      };
    });
  }
}
