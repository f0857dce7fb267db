import { kingAttacks, knightAttacks, pawnAttacks, bishopAttacks, rookAttacks } from './attacks.js';
import { BitBoard } from './bitBoard.js';
import { ByRole, Color, Role, ROLES, Square } from './types.js';
import { defined, neighbour, squareRank } from './util.js';

/**
 * The pieces of one color on the board.
 *
 * Each role has its own set of squares, like `army.knight` for all knights of
 * the army. Nothing prevents two roles from claiming the same square, or an
 * army from having several kings: keeping the sets disjoint is up to whoever
 * places the pieces.
 *
 * Queries that take an `interference` board expect the squares occupied by
 * the opposing army. They block sliding pieces but can still be captured, so
 * they count as controlled.
 */
export class ChessArmy implements Iterable<[Square, Role]>, ByRole<BitBoard> {
  color: Color;
  king: BitBoard;
  queen: BitBoard;
  bishop: BitBoard;
  knight: BitBoard;
  rook: BitBoard;
  pawn: BitBoard;

  private constructor(color: Color) {
    this.color = color;
    this.king = BitBoard.empty();
    this.queen = BitBoard.empty();
    this.bishop = BitBoard.empty();
    this.knight = BitBoard.empty();
    this.rook = BitBoard.empty();
    this.pawn = BitBoard.empty();
  }

  static empty(color: Color): ChessArmy {
    return new ChessArmy(color);
  }

  /**
   * Gets the army in the standard starting position.
   */
  static initial(color: Color): ChessArmy {
    const army = new ChessArmy(color);
    army.reset();
    return army;
  }

  /**
   * Resets to the standard starting position.
   */
  reset(): void {
    if (this.color === 'white') {
      this.king = new BitBoard(0x10, 0);
      this.queen = new BitBoard(0x8, 0);
      this.bishop = new BitBoard(0x24, 0);
      this.knight = new BitBoard(0x42, 0);
      this.rook = new BitBoard(0x81, 0);
      this.pawn = BitBoard.empty().withRank(1);
    } else {
      this.king = new BitBoard(0, 0x1000_0000);
      this.queen = new BitBoard(0, 0x0800_0000);
      this.bishop = new BitBoard(0, 0x2400_0000);
      this.knight = new BitBoard(0, 0x4200_0000);
      this.rook = new BitBoard(0, 0x8100_0000);
      this.pawn = BitBoard.empty().withRank(6);
    }
  }

  clear(): void {
    for (const role of ROLES) this[role] = BitBoard.empty();
  }

  clone(): ChessArmy {
    const army = new ChessArmy(this.color);
    for (const role of ROLES) army[role] = this[role];
    return army;
  }

  pieces(role: Role): BitBoard {
    return this[role];
  }

  /**
   * Adds pieces of `role` on `squares`, without checking whether the squares
   * are already taken.
   */
  placePieces(role: Role, squares: Iterable<Square>): void {
    this[role] = this[role].withCells(squares);
  }

  occupied(): BitBoard {
    return this.king.union(this.queen).union(this.bishop).union(this.knight).union(this.rook).union(this.pawn);
  }

  getRole(square: Square): Role | undefined {
    for (const role of ROLES) {
      if (this[role].has(square)) return role;
    }
    return;
  }

  numPieces(): number {
    let count = 0;
    for (const role of ROLES) count += this[role].popCount();
    return count;
  }

  *[Symbol.iterator](): Iterator<[Square, Role]> {
    for (const role of ROLES) {
      for (const square of this[role]) yield [square, role];
    }
  }

  /**
   * Gets all squares controlled by the army.
   */
  controlledCells(interference: BitBoard): BitBoard {
    let controlled = BitBoard.empty();
    for (const role of ROLES) controlled = controlled.union(this.controlledCellsByRole(role, interference));
    return controlled;
  }

  /**
   * Gets the squares controlled by all pieces of `role`.
   */
  controlledCellsByRole(role: Role, interference: BitBoard): BitBoard {
    switch (role) {
      case 'king':
        return this.kingControlledCells();
      case 'queen':
        return this.queensControlledCells(interference);
      case 'bishop':
        return this.bishopsControlledCells(interference);
      case 'knight':
        return this.knightsControlledCells();
      case 'rook':
        return this.rooksControlledCells(interference);
      case 'pawn':
        return this.pawnsControlledCells();
    }
  }

  /**
   * Gets the squares the piece of `role` on `square` may move to: controlled
   * squares not occupied by the army itself, and for pawns the forward pushes
   * and diagonal captures.
   *
   * Returns an empty set if there is no piece of `role` on `square`.
   */
  possibleMoves(role: Role, square: Square, interference: BitBoard): BitBoard {
    if (this.getRole(square) !== role) return BitBoard.empty();
    switch (role) {
      case 'king':
        return kingAttacks(square).diff(this.occupied());
      case 'pawn':
        return this.pawnMoves(square, interference);
      default:
        return this.regularMoves(role, square, interference);
    }
  }

  private kingControlledCells(): BitBoard {
    return this.unionOver(this.king, kingAttacks);
  }

  private knightsControlledCells(): BitBoard {
    return this.unionOver(this.knight, knightAttacks);
  }

  private pawnsControlledCells(): BitBoard {
    return this.unionOver(this.pawn, square => pawnAttacks(this.color, square));
  }

  private bishopsControlledCells(interference: BitBoard): BitBoard {
    const occupied = this.occupied().union(interference);
    return this.unionOver(this.bishop, square => bishopAttacks(square, occupied));
  }

  private rooksControlledCells(interference: BitBoard): BitBoard {
    const occupied = this.occupied().union(interference);
    return this.unionOver(this.rook, square => rookAttacks(square, occupied));
  }

  /**
   * Queens control what a bishop and a rook on the same squares would. The
   * queens are moved into the bishop slot and then into the rook slot of a
   * copy of the army, with the real bishops and rooks parked among the pawns
   * so that they keep blocking without being counted.
   */
  private queensControlledCells(interference: BitBoard): BitBoard {
    const relabeled = this.clone();
    relabeled.pawn = relabeled.pawn.union(this.bishop).union(this.rook);
    relabeled.bishop = this.queen;
    relabeled.queen = BitBoard.empty();
    const diagonal = relabeled.bishopsControlledCells(interference);

    relabeled.rook = relabeled.bishop;
    relabeled.bishop = BitBoard.empty();
    return diagonal.union(relabeled.rooksControlledCells(interference));
  }

  private regularMoves(role: Role, square: Square, interference: BitBoard): BitBoard {
    const piece = BitBoard.fromSquare(square);
    const relabeled = this.clone();
    relabeled.pawn = relabeled.pawn.union(this[role].diff(piece));
    relabeled[role] = piece;
    return relabeled.controlledCellsByRole(role, interference).diff(this.occupied());
  }

  private pawnMoves(square: Square, interference: BitBoard): BitBoard {
    const occupied = this.occupied().union(interference);
    const forward = this.color === 'white' ? 'n' : 's';
    let moves = BitBoard.empty();
    const step = neighbour(square, forward);
    if (defined(step) && !occupied.has(step)) {
      moves = moves.withCell(step);
      const doubleStep = neighbour(step, forward);
      const startRank = this.color === 'white' ? 1 : 6;
      if (squareRank(square) === startRank && defined(doubleStep) && !occupied.has(doubleStep)) {
        moves = moves.withCell(doubleStep);
      }
    }
    return moves.union(pawnAttacks(this.color, square).intersect(interference));
  }

  private unionOver(pieces: BitBoard, f: (square: Square) => BitBoard): BitBoard {
    let range = BitBoard.empty();
    for (const square of pieces) range = range.union(f(square));
    return range;
  }
}

export const armyEquals = (left: ChessArmy, right: ChessArmy): boolean =>
  left.color === right.color && ROLES.every(role => left[role].equals(right[role]));
