import { Piece, PieceColor, PieceKind } from './Piece';
import { cellKey, parseCellKey } from './coordinates';
import type { CellCoord } from './coordinates';

/**
 * Chess Board Surface
 *
 * A sparse board of cells keyed by (row, col). A coordinate is either
 * a hole (no key), an empty cell (key with null) or an occupied cell.
 * Shape (which cells exist) and content (what stands on them) are
 * edited separately: placing a piece never creates a cell.
 */

export interface BoardBounds {
  minRow: number;
  maxRow: number;
  minCol: number;
  maxCol: number;
}

export interface OccupiedCell extends CellCoord {
  piece: Piece;
}

/**
 * Read-only view consumed by renderers
 */
export interface ReadonlyBoard {
  cellExists(row: number, col: number): boolean;
  getPiece(row: number, col: number): Piece | null;
  bounds(): BoardBounds;
  allCells(): CellCoord[];
}

export interface BoardOptions {
  name?: string; // Prefix for debug output
  debug?: boolean; // Trace every mutation to the console
}

const BACK_RANK: readonly PieceKind[] = [
  PieceKind.ROOK, PieceKind.KNIGHT, PieceKind.BISHOP, PieceKind.QUEEN,
  PieceKind.KING, PieceKind.BISHOP, PieceKind.KNIGHT, PieceKind.ROOK,
];

// Cross sample: 9x9 index range, 3x3 corner blocks cut out
const CROSS_SIZE = 9;
const CROSS_CORNER = 3;

const CROSS_PIECES: ReadonlyArray<[number, number, PieceKind, PieceColor]> = [
  [4, 4, PieceKind.KING, PieceColor.WHITE],
  [0, 4, PieceKind.QUEEN, PieceColor.BLACK],
  [8, 4, PieceKind.QUEEN, PieceColor.WHITE],
  [4, 0, PieceKind.ROOK, PieceColor.BLACK],
  [4, 8, PieceKind.ROOK, PieceColor.WHITE],
];

export class Board implements ReadonlyBoard {
  private cells: Map<string, Piece | null> = new Map();
  private name: string;
  private debug: boolean;

  constructor(options: BoardOptions = {}) {
    this.name = options.name || 'Board';
    this.debug = options.debug ?? false;
  }

  /**
   * Check whether (row, col) is a cell rather than a hole
   */
  cellExists(row: number, col: number): boolean {
    return this.cells.has(cellKey(row, col));
  }

  /**
   * Create an empty cell
   * @returns false if the cell already existed (nothing changes) or row/col is not an integer
   */
  addCell(row: number, col: number): boolean {
    if (!isCoordinate(row, col)) return false;
    const key = cellKey(row, col);
    if (this.cells.has(key)) return false;

    this.cells.set(key, null);
    this.trace(`addCell ${key}`);
    return true;
  }

  /**
   * Turn a cell into a hole, discarding any piece on it
   * @returns false if there was no cell
   */
  removeCell(row: number, col: number): boolean {
    if (!isCoordinate(row, col)) return false;
    const key = cellKey(row, col);
    if (!this.cells.delete(key)) return false;

    this.trace(`removeCell ${key}`);
    return true;
  }

  /**
   * Get the piece at (row, col). Null for an empty cell and for a hole alike;
   * use cellExists() to tell them apart.
   */
  getPiece(row: number, col: number): Piece | null {
    return this.cells.get(cellKey(row, col)) ?? null;
  }

  /**
   * Place a piece on (or clear) an existing cell
   * @returns false if (row, col) is a hole; holes are never created here
   */
  setPiece(row: number, col: number, piece: Piece | null): boolean {
    if (!isCoordinate(row, col)) return false;
    const key = cellKey(row, col);
    if (!this.cells.has(key)) return false;

    this.cells.set(key, piece);
    this.trace(`setPiece ${key} ${piece ? piece.toString() : 'none'}`);
    return true;
  }

  /**
   * Smallest rectangle covering every cell; all zeros when there are none
   */
  bounds(): BoardBounds {
    if (this.cells.size === 0) {
      return { minRow: 0, maxRow: 0, minCol: 0, maxCol: 0 };
    }

    let minRow = Infinity;
    let maxRow = -Infinity;
    let minCol = Infinity;
    let maxCol = -Infinity;

    for (const { row, col } of this.allCells()) {
      minRow = Math.min(minRow, row);
      maxRow = Math.max(maxRow, row);
      minCol = Math.min(minCol, col);
      maxCol = Math.max(maxCol, col);
    }

    return { minRow, maxRow, minCol, maxCol };
  }

  /**
   * Every existing cell, in no particular order
   */
  allCells(): CellCoord[] {
    const coords: CellCoord[] = [];
    for (const key of this.cells.keys()) {
      const coord = parseCellKey(key);
      if (coord) coords.push(coord);
    }
    return coords;
  }

  cellCount(): number {
    return this.cells.size;
  }

  occupiedCells(): OccupiedCell[] {
    const occupied: OccupiedCell[] = [];
    this.cells.forEach((piece, key) => {
      const coord = parseCellKey(key);
      if (piece && coord) {
        occupied.push({ ...coord, piece });
      }
    });
    return occupied;
  }

  /**
   * Remove every cell
   */
  clear(): void {
    this.cells.clear();
    this.trace('clear');
  }

  /**
   * Standard 8x8 starting position: black on rows 0-1, white on rows 6-7
   */
  setupStandard(): void {
    this.clear();

    for (let row = 0; row < 8; row++) {
      for (let col = 0; col < 8; col++) {
        this.addCell(row, col);
      }
    }

    BACK_RANK.forEach((kind, col) => {
      this.setPiece(0, col, new Piece(kind, PieceColor.BLACK));
      this.setPiece(1, col, new Piece(PieceKind.PAWN, PieceColor.BLACK));
      this.setPiece(6, col, new Piece(PieceKind.PAWN, PieceColor.WHITE));
      this.setPiece(7, col, new Piece(kind, PieceColor.WHITE));
    });
  }

  /**
   * Cross-shaped sample board with a king in the middle and a piece on each arm tip
   */
  setupIrregularSample(): void {
    this.clear();

    const far = CROSS_SIZE - CROSS_CORNER;
    for (let row = 0; row < CROSS_SIZE; row++) {
      for (let col = 0; col < CROSS_SIZE; col++) {
        const rowInArm = row >= CROSS_CORNER && row < far;
        const colInArm = col >= CROSS_CORNER && col < far;
        if (rowInArm || colInArm) {
          this.addCell(row, col);
        }
      }
    }

    for (const [row, col, kind, color] of CROSS_PIECES) {
      this.setPiece(row, col, new Piece(kind, color));
    }
  }

  private trace(message: string): void {
    if (this.debug) {
      console.log(`[${this.name}] ${message}`);
    }
  }
}

function isCoordinate(row: number, col: number): boolean {
  return Number.isInteger(row) && Number.isInteger(col);
}
