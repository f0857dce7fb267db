export * from './types.js';

export {
  defined,
  opposite,
  squareRank,
  squareFile,
  squareFromCoords,
  squareDiagonal,
  squareAntiDiagonal,
  westFile,
  eastFile,
  northRank,
  southRank,
  squareAfterSteps,
  neighbour,
  makeSquare,
} from './util.js';

export { BitBoard, FILE_MASKS, RANK_MASKS, DIAGONAL_MASKS, ANTI_DIAGONAL_MASKS } from './bitBoard.js';

export { kingAttacks, knightAttacks, pawnAttacks, rayAttacks, bishopAttacks, rookAttacks, queenAttacks } from './attacks.js';

export { ChessArmy, armyEquals } from './army.js';

export { IllegalConversion, ConversionError, parseFile, parseRank, parseCell, parseRole } from './parse.js';

export type { ChessMove } from './move.js';
export { EMPTY_MOVE, INVALID_MOVE, encodeMove, decodeMove, enPassantSquare } from './move.js';
