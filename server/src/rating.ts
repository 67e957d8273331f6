import type { GameResult } from "./rules";

export const K_FACTOR = 32;
export const RATING_FLOOR = 100;
export const DEFAULT_RATING = 1200;

export interface UserRating {
  rating: number;
  wins: number;
  losses: number;
  draws: number;
}

export interface RatedGame {
  white: UserRating;
  black: UserRating;
}

export function expectedScore(rating: number, opponent: number): number {
  return 1 / (1 + Math.pow(10, (opponent - rating) / 400));
}

function actualScores(result: GameResult): [number, number] {
  switch (result) {
    case "white":
      return [1, 0];
    case "black":
      return [0, 1];
    case "draw":
      return [0.5, 0.5];
  }
}

function nextRating(rating: number, score: number, expected: number): number {
  return Math.max(RATING_FLOOR, Math.round(rating + K_FACTOR * (score - expected)));
}

/** Elo update for both players plus their win/loss/draw counters. */
export function rateGame(white: UserRating, black: UserRating, result: GameResult): RatedGame {
  const [sw, sb] = actualScores(result);
  const draw = result === "draw" ? 1 : 0;

  return {
    white: {
      rating: nextRating(white.rating, sw, expectedScore(white.rating, black.rating)),
      wins: white.wins + (result === "white" ? 1 : 0),
      losses: white.losses + (result === "black" ? 1 : 0),
      draws: white.draws + draw,
    },
    black: {
      rating: nextRating(black.rating, sb, expectedScore(black.rating, white.rating)),
      wins: black.wins + (result === "black" ? 1 : 0),
      losses: black.losses + (result === "white" ? 1 : 0),
      draws: black.draws + draw,
    },
  };
}
