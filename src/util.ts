import {
  AntiDiagonal,
  Color,
  DIAGONALS,
  Diagonal,
  Direction,
  File,
  FILE_NAMES,
  FILES,
  Rank,
  RANK_NAMES,
  RANKS,
  Square,
  SquareName,
  SQUARES,
} from './types.js';

export const defined = <A>(v: A | undefined): v is A => v !== undefined;

export const opposite = (color: Color): Color => (color === 'white' ? 'black' : 'white');

export const squareRank = (square: Square): Rank => RANKS[square >> 3];

export const squareFile = (square: Square): File => FILES[square & 0x7];

export const squareFromCoords = (file: File, rank: Rank): Square => SQUARES[8 * rank + file];

export const squareDiagonal = (square: Square): Diagonal => DIAGONALS[squareFile(square) - squareRank(square) + 7];

export const squareAntiDiagonal = (square: Square): AntiDiagonal => DIAGONALS[squareFile(square) + squareRank(square)];

/**
 * Gets the file to the left of `square`, or `undefined` on the a-file.
 */
export const westFile = (square: Square): File | undefined => {
  const file = squareFile(square);
  return file > 0 ? FILES[file - 1] : undefined;
};

/**
 * Gets the file to the right of `square`, or `undefined` on the h-file.
 */
export const eastFile = (square: Square): File | undefined => {
  const file = squareFile(square);
  return file < 7 ? FILES[file + 1] : undefined;
};

/**
 * Gets the rank above `square`, or `undefined` on the 8th rank.
 */
export const northRank = (square: Square): Rank | undefined => {
  const rank = squareRank(square);
  return rank < 7 ? RANKS[rank + 1] : undefined;
};

/**
 * Gets the rank below `square`, or `undefined` on the 1st rank.
 */
export const southRank = (square: Square): Rank | undefined => {
  const rank = squareRank(square);
  return rank > 0 ? RANKS[rank - 1] : undefined;
};

/**
 * Gets the square `deltaRank` ranks up and `deltaFile` files to the right of
 * `square` (negative values go down and left), or `undefined` if that leaves
 * the board.
 */
export const squareAfterSteps = (square: Square, deltaRank: number, deltaFile: number): Square | undefined => {
  const file = squareFile(square) + deltaFile;
  const rank = squareRank(square) + deltaRank;
  return 0 <= file && file < 8 && 0 <= rank && rank < 8 ? SQUARES[8 * rank + file] : undefined;
};

const DIRECTION_STEPS: { [direction in Direction]: [deltaRank: number, deltaFile: number] } = {
  n: [1, 0],
  ne: [1, 1],
  e: [0, 1],
  se: [-1, 1],
  s: [-1, 0],
  sw: [-1, -1],
  w: [0, -1],
  nw: [1, -1],
};

/**
 * Gets the adjacent square in `direction`, or `undefined` at the edge of the
 * board. White looks north.
 */
export const neighbour = (square: Square, direction: Direction): Square | undefined => {
  const [deltaRank, deltaFile] = DIRECTION_STEPS[direction];
  return squareAfterSteps(square, deltaRank, deltaFile);
};

export const makeSquare = (square: Square): SquareName =>
  `${FILE_NAMES[squareFile(square)]}${RANK_NAMES[squareRank(square)]}`;
