import { Result } from '@badrap/result';
import { File, FILE_NAMES, FILES, Rank, RANK_NAMES, RANKS, Role, Square } from './types.js';
import { defined, squareFromCoords } from './util.js';

export enum IllegalConversion {
  File = 'ERR_FILE',
  Rank = 'ERR_RANK',
  Cell = 'ERR_CELL',
  Piece = 'ERR_PIECE',
}

export class ConversionError extends Error {}

/**
 * Parses a file letter, `a` to `h`.
 */
export const parseFile = (str: string): Result<File, ConversionError> => {
  const index = FILE_NAMES.findIndex(name => name === str);
  return index === -1 ? Result.err(new ConversionError(IllegalConversion.File)) : Result.ok(FILES[index]);
};

/**
 * Parses a rank digit, `1` to `8`.
 */
export const parseRank = (str: string): Result<Rank, ConversionError> => {
  const index = RANK_NAMES.findIndex(name => name === str);
  return index === -1 ? Result.err(new ConversionError(IllegalConversion.Rank)) : Result.ok(RANKS[index]);
};

/**
 * Parses a square in algebraic notation, like `e4`.
 */
export const parseCell = (str: string): Result<Square, ConversionError> => {
  if (str.length !== 2) return Result.err(new ConversionError(IllegalConversion.Cell));
  const file = parseFile(str[0]);
  const rank = parseRank(str[1]);
  if (file.isErr || rank.isErr) return Result.err(new ConversionError(IllegalConversion.Cell));
  return Result.ok(squareFromCoords(file.value, rank.value));
};

const sanRole = (str: string): Role | undefined => {
  switch (str) {
    case 'K':
      return 'king';
    case 'Q':
      return 'queen';
    case 'B':
      return 'bishop';
    case 'N':
      return 'knight';
    case 'R':
      return 'rook';
    default:
      return;
  }
};

/**
 * Parses the piece letter of standard algebraic notation. Pawns have no
 * letter there, so only `K`, `Q`, `B`, `N` and `R` are accepted.
 */
export const parseRole = (str: string): Result<Role, ConversionError> => {
  const role = sanRole(str);
  return defined(role) ? Result.ok(role) : Result.err(new ConversionError(IllegalConversion.Piece));
};
