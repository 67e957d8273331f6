import type { Logger } from "pino";
import { rateGame, type RatedGame, type UserRating } from "./rating";
import type { GameResult, TerminalReason } from "./rules";
import type { GameStore } from "./store";

export interface FinishedGame {
  roomId: string;
  whiteUserId?: number;
  blackUserId?: number;
  result: GameResult;
  reason: TerminalReason;
  moves: readonly string[];
  createdAt: Date;
  finishedAt: Date;
}

interface KnownAccount {
  id: number;
  rating: UserRating;
}

export type FinalizeOutcome =
  | { persisted: true; gameId: number; ratings?: RatedGame }
  | { persisted: false; error: Error };

export interface GameFinalizer {
  finalize(game: FinishedGame): FinalizeOutcome;
}

/**
 * Writes the game record and, when both seats belong to known accounts, the
 * new ratings, in one transaction. Failures are reported, never thrown: the
 * game-over state has already gone out to the room by the time this runs.
 */
export class StoreFinalizer implements GameFinalizer {
  constructor(
    private readonly store: GameStore,
    private readonly logger: Logger,
  ) {}

  finalize(game: FinishedGame): FinalizeOutcome {
    try {
      const outcome = this.store.transaction(() => {
        // seat ids are advisory; ones with no account are stored as anonymous
        const white = this.account(game.whiteUserId);
        const black = this.account(game.blackUserId);
        const gameId = this.store.insertGame({
          roomId: game.roomId,
          whiteUserId: white?.id ?? null,
          blackUserId: black?.id ?? null,
          result: game.result,
          reason: game.reason,
          moves: game.moves.join(" "),
          createdAt: game.createdAt.toISOString(),
          finishedAt: game.finishedAt.toISOString(),
        });
        return { persisted: true as const, gameId, ratings: this.updateRatings(white, black, game.result) };
      });
      this.logger.info(
        { roomId: game.roomId, gameId: outcome.gameId, result: game.result, reason: game.reason, rated: !!outcome.ratings },
        "game recorded",
      );
      return outcome;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error({ err: error, roomId: game.roomId }, "failed to record finished game");
      return { persisted: false, error };
    }
  }

  private account(userId: number | undefined): KnownAccount | undefined {
    if (userId === undefined) return undefined;
    const rating = this.store.getUser(userId);
    return rating && { id: userId, rating };
  }

  private updateRatings(
    white: KnownAccount | undefined,
    black: KnownAccount | undefined,
    result: GameResult,
  ): RatedGame | undefined {
    if (!white || !black) return undefined;
    // one account on both seats is not a rated game
    if (white.id === black.id) return undefined;

    const rated = rateGame(white.rating, black.rating, result);
    this.store.updateUser(white.id, rated.white);
    this.store.updateUser(black.id, rated.black);
    return rated;
  }
}
