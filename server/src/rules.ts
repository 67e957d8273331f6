import { Chess, normalizeMove } from "chessops/chess";
import { makeFen, parseFen } from "chessops/fen";
import { isNormal, type NormalMove, type Role } from "chessops/types";
import { makeUci, parseUci, squareFile, squareRank } from "chessops/util";

export const START_FEN = "rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1";

export type Side = "w" | "b";
export type GameResult = "white" | "black" | "draw";
export type TerminalReason =
  | "checkmate"
  | "stalemate"
  | "insufficient_material"
  | "threefold_repetition"
  | "fifty_move_rule"
  | "draw";

export interface Terminal {
  result: GameResult;
  reason: TerminalReason;
}

/** Mutable chess state: the position plus how often each position has occurred. */
export interface ChessBoard {
  position: Chess;
  repetitions: Map<string, number>;
}

export type ParsedMove = { ok: true; move: NormalMove } | { ok: false; error: string };

/**
 * Everything the rooms need to know about chess. The board passed in is the
 * only state an implementation may touch.
 */
export interface RulesEngine {
  startingBoard(): ChessBoard;
  sideToMove(board: ChessBoard): Side;
  legalMoves(board: ChessBoard): Set<string>;
  parseMove(text: string): ParsedMove;
  isLegal(board: ChessBoard, move: NormalMove): boolean;
  apply(board: ChessBoard, move: NormalMove): void;
  classifyTerminal(board: ChessBoard): Terminal | undefined;
  serialize(board: ChessBoard): string;
  formatMove(move: NormalMove): string;
}

const PROMOTION_ROLES: Role[] = ["queen", "rook", "bishop", "knight"];

// automatic end of game, beyond which the draw is no longer merely claimable
const FIVEFOLD = 5;
const SEVENTY_FIVE_MOVE_PLIES = 150;
const THREEFOLD = 3;
const FIFTY_MOVE_PLIES = 100;

// placement, turn, castling rights and en passant square
function positionKey(position: Chess): string {
  return makeFen(position.toSetup()).split(" ").slice(0, 4).join(" ");
}

function record(board: ChessBoard) {
  const key = positionKey(board.position);
  board.repetitions.set(key, (board.repetitions.get(key) ?? 0) + 1);
}

export function loadBoard(fen: string): ChessBoard {
  const setup = parseFen(fen);
  if (setup.isErr) throw new Error(`Invalid FEN: ${fen}`);
  const position = Chess.fromSetup(setup.unwrap());
  if (position.isErr) throw new Error(`Illegal position: ${fen}`);
  const board: ChessBoard = { position: position.unwrap(), repetitions: new Map() };
  record(board);
  return board;
}

export const chessRules: RulesEngine = {
  startingBoard() {
    return loadBoard(START_FEN);
  },

  sideToMove(board) {
    return board.position.turn === "white" ? "w" : "b";
  },

  legalMoves(board) {
    const pos = board.position;
    const moves = new Set<string>();
    for (const [from, dests] of pos.allDests()) {
      const piece = pos.board.get(from);
      if (!piece) continue;
      for (const to of dests) {
        const target = pos.board.get(to);
        if (piece.role === "king" && target?.role === "rook" && target.color === piece.color) {
          // chessops encodes castling as king takes own rook
          const file = squareFile(to) > squareFile(from) ? 6 : 2;
          moves.add(makeUci({ from, to: squareRank(from) * 8 + file }));
        } else if (piece.role === "pawn" && (squareRank(to) === 0 || squareRank(to) === 7)) {
          for (const promotion of PROMOTION_ROLES) moves.add(makeUci({ from, to, promotion }));
        } else {
          moves.add(makeUci({ from, to }));
        }
      }
    }
    return moves;
  },

  parseMove(text) {
    const move = parseUci(text.trim());
    if (!move || !isNormal(move)) return { ok: false, error: `Not a coordinate move: ${text}` };
    return { ok: true, move };
  },

  isLegal(board, move) {
    return board.position.isLegal(normalizeMove(board.position, move));
  },

  apply(board, move) {
    board.position.play(normalizeMove(board.position, move));
    record(board);
  },

  classifyTerminal(board) {
    const pos = board.position;
    const repetitions = board.repetitions.get(positionKey(pos)) ?? 0;
    const over =
      pos.isCheckmate() ||
      pos.isStalemate() ||
      pos.isInsufficientMaterial() ||
      repetitions >= FIVEFOLD ||
      pos.halfmoves >= SEVENTY_FIVE_MOVE_PLIES;
    if (!over) return undefined;

    if (pos.isCheckmate()) {
      // the side to move is the side that got mated
      return { result: pos.turn === "white" ? "black" : "white", reason: "checkmate" };
    }
    if (pos.isStalemate()) return { result: "draw", reason: "stalemate" };
    if (pos.isInsufficientMaterial()) return { result: "draw", reason: "insufficient_material" };
    if (repetitions >= THREEFOLD) return { result: "draw", reason: "threefold_repetition" };
    if (pos.halfmoves >= FIFTY_MOVE_PLIES) return { result: "draw", reason: "fifty_move_rule" };
    return { result: "draw", reason: "draw" };
  },

  serialize(board) {
    return makeFen(board.position.toSetup());
  },

  formatMove(move) {
    return makeUci(move);
  },
};
