export const FILE_NAMES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

export type FileName = (typeof FILE_NAMES)[number];

export const RANK_NAMES = ['1', '2', '3', '4', '5', '6', '7', '8'] as const;

export type RankName = (typeof RANK_NAMES)[number];

export type SquareName = `${FileName}${RankName}`;

export const FILES = [0, 1, 2, 3, 4, 5, 6, 7] as const;

/**
 * A vertical column of the board, from 0 (file a) to 7 (file h).
 */
export type File = (typeof FILES)[number];

export const RANKS = [0, 1, 2, 3, 4, 5, 6, 7] as const;

/**
 * A horizontal row of the board, from 0 (rank 1) to 7 (rank 8).
 */
export type Rank = (typeof RANKS)[number];

export const DIAGONALS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14] as const;

/**
 * Index of an a1-h8 oriented diagonal: `file - rank + 7`.
 */
export type Diagonal = (typeof DIAGONALS)[number];

/**
 * Index of an a8-h1 oriented anti-diagonal: `file + rank`.
 */
export type AntiDiagonal = (typeof DIAGONALS)[number];

// prettier-ignore
export const SQUARES = [
   0,  1,  2,  3,  4,  5,  6,  7,
   8,  9, 10, 11, 12, 13, 14, 15,
  16, 17, 18, 19, 20, 21, 22, 23,
  24, 25, 26, 27, 28, 29, 30, 31,
  32, 33, 34, 35, 36, 37, 38, 39,
  40, 41, 42, 43, 44, 45, 46, 47,
  48, 49, 50, 51, 52, 53, 54, 55,
  56, 57, 58, 59, 60, 61, 62, 63,
] as const;

/**
 * A cell of the board: `rank * 8 + file`, so a1 is 0, h1 is 7 and h8 is 63.
 */
export type Square = (typeof SQUARES)[number];

export type BySquare<T> = T[];

export const COLORS = ['white', 'black'] as const;

export type Color = (typeof COLORS)[number];

export type ByColor<T> = {
  [color in Color]: T;
};

/**
 * Piece roles, in the order used whenever a cell is looked up.
 */
export const ROLES = ['king', 'queen', 'bishop', 'knight', 'rook', 'pawn'] as const;

export type Role = (typeof ROLES)[number];

export type ByRole<T> = {
  [role in Role]: T;
};

export const DIRECTIONS = ['n', 'ne', 'e', 'se', 's', 'sw', 'w', 'nw'] as const;

export type Direction = (typeof DIRECTIONS)[number];
