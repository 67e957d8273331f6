import type { FinalizeOutcome, FinishedGame, GameFinalizer } from "./finalize";
import type { ChessBoard, RulesEngine, Side, Terminal } from "./rules";

export type Seat = Side | "spectator";
export type SeatPreference = Side | "any";
export type RoomPhase = "waiting" | "active" | "finished";

export interface JoinRequest {
  connectionId: string;
  preferred: SeatPreference;
  userId?: number;
}

export type MoveOutcome =
  | { ok: true; move: string; fen: string; terminal?: Terminal }
  | { ok: false; message: string };

const rejected = (message: string): MoveOutcome => ({ ok: false, message });

/**
 * One game's session state. Callers serialize access per room; nothing in
 * here awaits, so each method runs as a single step.
 */
export class Room {
  private readonly board: ChessBoard;
  private readonly seats = new Map<string, Seat>();
  private readonly history: string[] = [];
  private white?: number;
  private black?: number;
  private concluded = false;
  private isFinished = false;

  constructor(
    readonly id: string,
    private readonly rules: RulesEngine,
    readonly createdAt: Date = new Date(),
    board?: ChessBoard,
  ) {
    this.board = board ?? rules.startingBoard();
  }

  get fen(): string {
    return this.rules.serialize(this.board);
  }

  get moves(): readonly string[] {
    return this.history;
  }

  get finished(): boolean {
    return this.isFinished;
  }

  get whiteUserId(): number | undefined {
    return this.white;
  }

  get blackUserId(): number | undefined {
    return this.black;
  }

  get phase(): RoomPhase {
    if (this.isFinished) return "finished";
    const occupied = this.occupiedSeats();
    return occupied.has("w") && occupied.has("b") ? "active" : "waiting";
  }

  get connectionCount(): number {
    return this.seats.size;
  }

  seatOf(connectionId: string): Seat | undefined {
    return this.seats.get(connectionId);
  }

  occupiedSeats(): Set<Side> {
    const taken = new Set<Side>();
    for (const seat of this.seats.values()) {
      if (seat !== "spectator") taken.add(seat);
    }
    return taken;
  }

  join({ connectionId, preferred, userId }: JoinRequest): Seat {
    const existing = this.seats.get(connectionId);
    if (existing) return existing;

    const taken = this.occupiedSeats();
    let seat: Seat = "spectator";
    if (preferred === "w" && !taken.has("w")) seat = "w";
    else if (preferred === "b" && !taken.has("b")) seat = "b";
    else if (!taken.has("w")) seat = "w";
    else if (!taken.has("b")) seat = "b";
    this.seats.set(connectionId, seat);

    // first account to sit in a seat keeps it for rating purposes
    if (userId !== undefined) {
      if (seat === "w" && this.white === undefined) this.white = userId;
      else if (seat === "b" && this.black === undefined) this.black = userId;
    }
    return seat;
  }

  leave(connectionId: string): Seat | undefined {
    const seat = this.seats.get(connectionId);
    this.seats.delete(connectionId);
    return seat;
  }

  /** Validates and applies one move. Nothing changes unless `ok` is true. */
  applyMove(connectionId: string, text: string): MoveOutcome {
    if (this.isFinished || this.concluded) return rejected("Game is already over");

    const seat = this.seats.get(connectionId);
    if (seat !== "w" && seat !== "b") return rejected("Spectators cannot make moves");
    if (seat !== this.rules.sideToMove(this.board)) return rejected("It is not your turn");

    const parsed = this.rules.parseMove(text);
    if (!parsed.ok || !this.rules.isLegal(this.board, parsed.move)) return rejected("Invalid move");

    this.rules.apply(this.board, parsed.move);
    const move = this.rules.formatMove(parsed.move);
    this.history.push(move);

    return { ok: true, move, fen: this.fen, terminal: this.rules.classifyTerminal(this.board) };
  }

  /**
   * Hands the finished game to the finalizer and marks the room finished.
   * Returns undefined if the room was already concluded.
   */
  conclude(terminal: Terminal, finalizer: GameFinalizer, finishedAt: Date = new Date()): FinalizeOutcome | undefined {
    if (this.concluded) return undefined;
    this.concluded = true;

    const game: FinishedGame = {
      roomId: this.id,
      whiteUserId: this.white,
      blackUserId: this.black,
      result: terminal.result,
      reason: terminal.reason,
      moves: [...this.history],
      createdAt: this.createdAt,
      finishedAt,
    };
    try {
      return finalizer.finalize(game);
    } finally {
      this.isFinished = true;
    }
  }
}
