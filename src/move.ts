import { Role, ROLES, Square, SQUARES } from './types.js';
import { defined, neighbour, squareRank } from './util.js';

/**
 * A move of one piece, as stored in 32 bits by {@link encodeMove}.
 */
export interface ChessMove {
  role: Role;
  from: Square;
  to: Square;
  captured?: Role;
  promotion?: Role;
}

export const EMPTY_MOVE = 0;
export const INVALID_MOVE = 0x8000_0000;

// Layout, from the least significant bit:
//
// 0-2   moved role (king 0 ... pawn 5)
// 3-5   captured role, 6 if none
// 6-8   promotion role, 6 if none
// 9-11  unused
// 12-17 from square
// 18-23 to square
// 24-30 en passant square, 64 if none
// 31    invalid flag
const CAPTURED_OFFSET = 3;
const PROMOTION_OFFSET = 6;
const FROM_OFFSET = 12;
const TO_OFFSET = 18;
const EN_PASSANT_OFFSET = 24;

const ROLE_MASK = 0x7;
const SQUARE_MASK = 0x3f;
const EN_PASSANT_MASK = 0x7f;

const NO_ROLE = 6;
const NO_SQUARE = 64;

/**
 * Gets the square skipped by a pawn double step from the 2nd or 7th rank, or
 * `undefined` for any other move.
 */
export const enPassantSquare = (role: Role, from: Square, to: Square): Square | undefined => {
  if (role !== 'pawn') return;
  const rank = squareRank(from);
  if (rank === 1 && to === from + 16) return neighbour(from, 'n');
  if (rank === 6 && to === from - 16) return neighbour(from, 's');
  return;
};

const encodeRole = (role: Role | undefined): number => (defined(role) ? ROLES.indexOf(role) : NO_ROLE);

export const encodeMove = (move: ChessMove): number => {
  const ep = enPassantSquare(move.role, move.from, move.to);
  return (
    ROLES.indexOf(move.role) |
    (encodeRole(move.captured) << CAPTURED_OFFSET) |
    (encodeRole(move.promotion) << PROMOTION_OFFSET) |
    (move.from << FROM_OFFSET) |
    (move.to << TO_OFFSET) |
    ((defined(ep) ? ep : NO_SQUARE) << EN_PASSANT_OFFSET)
  );
};

/**
 * Unpacks a move produced by {@link encodeMove}. Returns `undefined` if the
 * invalid flag is set or a field holds a value no move can have.
 */
export const decodeMove = (encoded: number): ChessMove | undefined => {
  if ((encoded & INVALID_MOVE) !== 0) return;
  const role = encoded & ROLE_MASK;
  const captured = (encoded >>> CAPTURED_OFFSET) & ROLE_MASK;
  const promotion = (encoded >>> PROMOTION_OFFSET) & ROLE_MASK;
  if (role >= ROLES.length || captured > NO_ROLE || promotion > NO_ROLE) return;
  const move: ChessMove = {
    role: ROLES[role],
    from: SQUARES[(encoded >>> FROM_OFFSET) & SQUARE_MASK],
    to: SQUARES[(encoded >>> TO_OFFSET) & SQUARE_MASK],
  };
  if (captured !== NO_ROLE) move.captured = ROLES[captured];
  if (promotion !== NO_ROLE) move.promotion = ROLES[promotion];
  const ep = enPassantSquare(move.role, move.from, move.to);
  return ((encoded >>> EN_PASSANT_OFFSET) & EN_PASSANT_MASK) === (defined(ep) ? ep : NO_SQUARE) ? move : undefined;
};
