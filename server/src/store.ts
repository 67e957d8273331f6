import Database from "better-sqlite3";
import { DEFAULT_RATING, type UserRating } from "./rating";
import type { GameResult, TerminalReason } from "./rules";

export interface UserRow extends UserRating {
  id: number;
  username: string;
  passwordHash: string;
  createdAt: string;
}

export type PublicUser = Omit<UserRow, "passwordHash">;

export interface GameRecord {
  roomId: string;
  whiteUserId: number | null;
  blackUserId: number | null;
  result: GameResult;
  reason: TerminalReason;
  moves: string;
  createdAt: string;
  finishedAt: string;
}

export interface StoredGame extends GameRecord {
  id: number;
}

export interface AccountStore {
  getUser(id: number): UserRating | undefined;
  updateUser(id: number, rating: UserRating): void;
}

export interface RecordStore {
  insertGame(record: GameRecord): number;
}

/** Account and record stores that can commit together. */
export interface GameStore extends AccountStore, RecordStore {
  transaction<T>(fn: () => T): T;
}

export class UsernameTakenError extends Error {
  constructor(username: string) {
    super(`Username already taken: ${username}`);
    this.name = "UsernameTakenError";
  }
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT UNIQUE NOT NULL,
    password_hash TEXT NOT NULL,
    rating INTEGER NOT NULL DEFAULT ${DEFAULT_RATING},
    wins INTEGER NOT NULL DEFAULT 0,
    losses INTEGER NOT NULL DEFAULT 0,
    draws INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS games (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    room_id TEXT NOT NULL,
    white_id INTEGER REFERENCES users(id),
    black_id INTEGER REFERENCES users(id),
    result TEXT NOT NULL,
    reason TEXT,
    moves TEXT NOT NULL,
    created_at TEXT NOT NULL,
    finished_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS games_white_id ON games(white_id);
  CREATE INDEX IF NOT EXISTS games_black_id ON games(black_id);
`;

const USER_COLUMNS = `id, username, password_hash AS passwordHash, rating, wins, losses, draws, created_at AS createdAt`;
const PUBLIC_USER_COLUMNS = `id, username, rating, wins, losses, draws, created_at AS createdAt`;
const GAME_COLUMNS = `id, room_id AS roomId, white_id AS whiteUserId, black_id AS blackUserId, result, reason,
  moves, created_at AS createdAt, finished_at AS finishedAt`;

export function isUniqueViolation(err: unknown): boolean {
  // SqliteError can belong to another realm, where instanceof Error fails
  return typeof err === "object" && err !== null && "code" in err && err.code === "SQLITE_CONSTRAINT_UNIQUE";
}

/** SQLite-backed users and finished games. */
export class SqliteStore implements GameStore {
  private readonly db: Database.Database;

  constructor(path: string) {
    this.db = new Database(path);
    if (path !== ":memory:") this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA);
  }

  createUser(username: string, passwordHash: string, now = new Date()): number {
    try {
      const info = this.db
        .prepare<[string, string, string]>(
          "INSERT INTO users (username, password_hash, created_at) VALUES (?, ?, ?)",
        )
        .run(username, passwordHash, now.toISOString());
      return Number(info.lastInsertRowid);
    } catch (err) {
      if (isUniqueViolation(err)) throw new UsernameTakenError(username);
      throw err;
    }
  }

  findUserByUsername(username: string): UserRow | undefined {
    return this.db
      .prepare<[string], UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE username = ?`)
      .get(username);
  }

  findUser(id: number): PublicUser | undefined {
    return this.db
      .prepare<[number], PublicUser>(`SELECT ${PUBLIC_USER_COLUMNS} FROM users WHERE id = ?`)
      .get(id);
  }

  getUser(id: number): UserRating | undefined {
    return this.db
      .prepare<[number], UserRating>("SELECT rating, wins, losses, draws FROM users WHERE id = ?")
      .get(id);
  }

  updateUser(id: number, { rating, wins, losses, draws }: UserRating): void {
    this.db
      .prepare<[number, number, number, number, number]>(
        "UPDATE users SET rating = ?, wins = ?, losses = ?, draws = ? WHERE id = ?",
      )
      .run(rating, wins, losses, draws, id);
  }

  insertGame(record: GameRecord): number {
    const info = this.db
      .prepare<[string, number | null, number | null, string, string, string, string, string]>(
        `INSERT INTO games (room_id, white_id, black_id, result, reason, moves, created_at, finished_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        record.roomId,
        record.whiteUserId,
        record.blackUserId,
        record.result,
        record.reason,
        record.moves,
        record.createdAt,
        record.finishedAt,
      );
    return Number(info.lastInsertRowid);
  }

  gamesForUser(userId: number, limit = 50): StoredGame[] {
    return this.db
      .prepare<[number, number, number], StoredGame>(
        `SELECT ${GAME_COLUMNS} FROM games WHERE white_id = ? OR black_id = ? ORDER BY id DESC LIMIT ?`,
      )
      .all(userId, userId, limit);
  }

  gamesForRoom(roomId: string): StoredGame[] {
    return this.db
      .prepare<[string], StoredGame>(`SELECT ${GAME_COLUMNS} FROM games WHERE room_id = ? ORDER BY id`)
      .all(roomId);
  }

  leaderboard(limit = 20): PublicUser[] {
    return this.db
      .prepare<[number], PublicUser>(
        `SELECT ${PUBLIC_USER_COLUMNS} FROM users ORDER BY rating DESC, id ASC LIMIT ?`,
      )
      .all(limit);
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }
}
