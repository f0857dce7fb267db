/**
 * Compute attacks and rays.
 *
 * These are low-level functions that can be used to implement chess rules.
 *
 * Implementation notes: King, knight and pawn attacks are looked up in tables
 * built once from the coordinate model. Sliding attacks are computed by
 * stepping along each ray one cell at a time until the edge of the board or
 * the first occupied cell, which is included. Queen rays are the union of
 * the bishop and rook rays.
 *
 * @packageDocumentation
 */

import { BitBoard } from './bitBoard.js';
import { BySquare, Color, Direction, Square, SQUARES } from './types.js';
import { defined, neighbour, squareAfterSteps } from './util.js';

const KING_DIRECTIONS: Direction[] = ['n', 'ne', 'e', 'se', 's', 'sw', 'w', 'nw'];
const BISHOP_DIRECTIONS: Direction[] = ['ne', 'nw', 'se', 'sw'];
const ROOK_DIRECTIONS: Direction[] = ['n', 's', 'e', 'w'];

const KNIGHT_STEPS: [deltaRank: number, deltaFile: number][] = [
  [2, 1],
  [1, 2],
  [-1, 2],
  [-2, 1],
  [-2, -1],
  [-1, -2],
  [1, -2],
  [2, -1],
];

const tabulate = <T>(f: (square: Square) => T): BySquare<T> => SQUARES.map(f);

const neighbours = (square: Square, directions: Direction[]): BitBoard => {
  let range = BitBoard.empty();
  for (const direction of directions) {
    const sq = neighbour(square, direction);
    if (defined(sq)) range = range.withCell(sq);
  }
  return range;
};

const KING_ATTACKS = tabulate(sq => neighbours(sq, KING_DIRECTIONS));
const KNIGHT_ATTACKS = tabulate(sq => {
  let range = BitBoard.empty();
  for (const [deltaRank, deltaFile] of KNIGHT_STEPS) {
    const to = squareAfterSteps(sq, deltaRank, deltaFile);
    if (defined(to)) range = range.withCell(to);
  }
  return range;
});
const PAWN_ATTACKS = {
  white: tabulate(sq => neighbours(sq, ['nw', 'ne'])),
  black: tabulate(sq => neighbours(sq, ['sw', 'se'])),
};

/**
 * Gets squares attacked or defended by a king on `square`.
 */
export const kingAttacks = (square: Square): BitBoard => KING_ATTACKS[square];

/**
 * Gets squares attacked or defended by a knight on `square`.
 */
export const knightAttacks = (square: Square): BitBoard => KNIGHT_ATTACKS[square];

/**
 * Gets squares attacked or defended by a pawn of the given `color`
 * on `square`.
 */
export const pawnAttacks = (color: Color, square: Square): BitBoard => PAWN_ATTACKS[color][square];

/**
 * Casts a ray from `square` towards `direction`. Every cell reached is
 * included; the ray stops after the first cell in `occupied`.
 */
export const rayAttacks = (square: Square, direction: Direction, occupied: BitBoard): BitBoard => {
  let range = BitBoard.empty();
  let sq = neighbour(square, direction);
  while (defined(sq)) {
    range = range.withCell(sq);
    if (occupied.has(sq)) break;
    sq = neighbour(sq, direction);
  }
  return range;
};

const slidingAttacks = (square: Square, directions: Direction[], occupied: BitBoard): BitBoard => {
  let range = BitBoard.empty();
  for (const direction of directions) range = range.union(rayAttacks(square, direction, occupied));
  return range;
};

/**
 * Gets squares attacked or defended by a bishop on `square`, given `occupied`
 * squares.
 */
export const bishopAttacks = (square: Square, occupied: BitBoard): BitBoard =>
  slidingAttacks(square, BISHOP_DIRECTIONS, occupied);

/**
 * Gets squares attacked or defended by a rook on `square`, given `occupied`
 * squares.
 */
export const rookAttacks = (square: Square, occupied: BitBoard): BitBoard =>
  slidingAttacks(square, ROOK_DIRECTIONS, occupied);

/**
 * Gets squares attacked or defended by a queen on `square`, given `occupied`
 * squares, by casting all eight rays.
 */
export const queenAttacks = (square: Square, occupied: BitBoard): BitBoard =>
  slidingAttacks(square, KING_DIRECTIONS, occupied);
