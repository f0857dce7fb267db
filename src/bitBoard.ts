import {
  AntiDiagonal,
  Diagonal,
  DIAGONALS,
  File,
  FILES,
  Rank,
  RANKS,
  Square,
  SQUARES,
} from './types.js';
import { squareAntiDiagonal, squareDiagonal } from './util.js';

const popcnt32 = (n: number): number => {
  n = n - ((n >>> 1) & 0x5555_5555);
  n = (n & 0x3333_3333) + ((n >>> 2) & 0x3333_3333);
  return Math.imul((n + (n >>> 4)) & 0x0f0f_0f0f, 0x0101_0101) >> 24;
};

/**
 * An immutable set of cells, implemented as a bitboard.
 *
 * Bit `i` is set if and only if cell `i` is active. What "active" means is up
 * to the caller: occupied, controlled, a move target and so on. The 64 bits
 * are held in two signed 32-bit halves, `lo` for a1-h4 and `hi` for a5-h8.
 */
export class BitBoard implements Iterable<Square> {
  readonly lo: number;
  readonly hi: number;

  constructor(lo: number, hi: number) {
    this.lo = lo | 0;
    this.hi = hi | 0;
  }

  static fromSquare(square: Square): BitBoard {
    return square >= 32 ? new BitBoard(0, 1 << (square - 32)) : new BitBoard(1 << square, 0);
  }

  static fromCells(cells: Iterable<Square>): BitBoard {
    return BitBoard.empty().withCells(cells);
  }

  /**
   * Builds a bitboard from a raw 64-bit mask. Bits above the 64th are
   * ignored.
   */
  static fromMask(mask: bigint): BitBoard {
    return new BitBoard(Number(mask & 0xffff_ffffn), Number((mask >> 32n) & 0xffff_ffffn));
  }

  static empty(): BitBoard {
    return new BitBoard(0, 0);
  }

  static full(): BitBoard {
    return new BitBoard(0xffff_ffff, 0xffff_ffff);
  }

  toMask(): bigint {
    return (BigInt(this.hi >>> 0) << 32n) | BigInt(this.lo >>> 0);
  }

  complement(): BitBoard {
    return new BitBoard(~this.lo, ~this.hi);
  }

  xor(other: BitBoard): BitBoard {
    return new BitBoard(this.lo ^ other.lo, this.hi ^ other.hi);
  }

  union(other: BitBoard): BitBoard {
    return new BitBoard(this.lo | other.lo, this.hi | other.hi);
  }

  intersect(other: BitBoard): BitBoard {
    return new BitBoard(this.lo & other.lo, this.hi & other.hi);
  }

  diff(other: BitBoard): BitBoard {
    return new BitBoard(this.lo & ~other.lo, this.hi & ~other.hi);
  }

  intersects(other: BitBoard): boolean {
    return this.intersect(other).nonEmpty();
  }

  equals(other: BitBoard): boolean {
    return this.lo === other.lo && this.hi === other.hi;
  }

  /**
   * Counts the active cells.
   */
  popCount(): number {
    return popcnt32(this.lo) + popcnt32(this.hi);
  }

  isEmpty(): boolean {
    return this.lo === 0 && this.hi === 0;
  }

  nonEmpty(): boolean {
    return this.lo !== 0 || this.hi !== 0;
  }

  has(square: Square): boolean {
    return (square >= 32 ? this.hi & (1 << (square - 32)) : this.lo & (1 << square)) !== 0;
  }

  withCell(square: Square): BitBoard {
    return square >= 32
      ? new BitBoard(this.lo, this.hi | (1 << (square - 32)))
      : new BitBoard(this.lo | (1 << square), this.hi);
  }

  withoutCell(square: Square): BitBoard {
    return square >= 32
      ? new BitBoard(this.lo, this.hi & ~(1 << (square - 32)))
      : new BitBoard(this.lo & ~(1 << square), this.hi);
  }

  withCells(cells: Iterable<Square>): BitBoard {
    let bb: BitBoard = this;
    for (const square of cells) bb = bb.withCell(square);
    return bb;
  }

  withoutCells(cells: Iterable<Square>): BitBoard {
    let bb: BitBoard = this;
    for (const square of cells) bb = bb.withoutCell(square);
    return bb;
  }

  withRank(rank: Rank): BitBoard {
    return this.union(RANK_MASKS[rank]);
  }

  withoutRank(rank: Rank): BitBoard {
    return this.diff(RANK_MASKS[rank]);
  }

  withFile(file: File): BitBoard {
    return this.union(FILE_MASKS[file]);
  }

  withoutFile(file: File): BitBoard {
    return this.diff(FILE_MASKS[file]);
  }

  withDiagonal(diagonal: Diagonal): BitBoard {
    return this.union(DIAGONAL_MASKS[diagonal]);
  }

  withAntiDiagonal(antiDiagonal: AntiDiagonal): BitBoard {
    return this.union(ANTI_DIAGONAL_MASKS[antiDiagonal]);
  }

  last(): Square | undefined {
    if (this.hi !== 0) return SQUARES[63 - Math.clz32(this.hi)];
    if (this.lo !== 0) return SQUARES[31 - Math.clz32(this.lo)];
    return;
  }

  first(): Square | undefined {
    if (this.lo !== 0) return SQUARES[31 - Math.clz32(this.lo & -this.lo)];
    if (this.hi !== 0) return SQUARES[63 - Math.clz32(this.hi & -this.hi)];
    return;
  }

  moreThanOne(): boolean {
    return (this.hi !== 0 && this.lo !== 0) || (this.lo & (this.lo - 1)) !== 0 || (this.hi & (this.hi - 1)) !== 0;
  }

  /**
   * Gets the only active cell, or `undefined` if there are none or several.
   */
  activeCell(): Square | undefined {
    return this.moreThanOne() ? undefined : this.last();
  }

  *[Symbol.iterator](): Iterator<Square> {
    let lo = this.lo;
    let hi = this.hi;
    while (lo !== 0) {
      const idx = 31 - Math.clz32(lo & -lo);
      lo ^= 1 << idx;
      yield SQUARES[idx];
    }
    while (hi !== 0) {
      const idx = 31 - Math.clz32(hi & -hi);
      hi ^= 1 << idx;
      yield SQUARES[32 + idx];
    }
  }
}

const maskOf = (predicate: (square: Square) => boolean): BitBoard =>
  BitBoard.fromCells(SQUARES.filter(predicate));

export const FILE_MASKS: readonly BitBoard[] = FILES.map(file => new BitBoard(0x0101_0101 << file, 0x0101_0101 << file));

export const RANK_MASKS: readonly BitBoard[] = RANKS.map(rank =>
  rank < 4 ? new BitBoard(0xff << (8 * rank), 0) : new BitBoard(0, 0xff << (8 * (rank - 4)))
);

export const DIAGONAL_MASKS: readonly BitBoard[] = DIAGONALS.map(diagonal =>
  maskOf(square => squareDiagonal(square) === diagonal)
);

export const ANTI_DIAGONAL_MASKS: readonly BitBoard[] = DIAGONALS.map(antiDiagonal =>
  maskOf(square => squareAntiDiagonal(square) === antiDiagonal)
);
