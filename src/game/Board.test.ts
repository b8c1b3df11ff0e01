import { describe, it, expect, vi, afterEach } from 'vitest';
import { Board } from './Board';
import { Piece, PieceColor, PieceKind } from './Piece';
import { cellKey } from './coordinates';
import type { CellCoord } from './coordinates';

function keysOf(cells: CellCoord[]): string[] {
  return cells.map(({ row, col }) => cellKey(row, col)).sort();
}

const whiteKing = new Piece(PieceKind.KING, PieceColor.WHITE);
const blackQueen = new Piece(PieceKind.QUEEN, PieceColor.BLACK);

describe('Board', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('cells', () => {
    it('starts with no cells', () => {
      const board = new Board();
      expect(board.allCells()).toEqual([]);
      expect(board.cellExists(0, 0)).toBe(false);
    });

    it('creates a cell once', () => {
      const board = new Board();
      expect(board.addCell(2, 3)).toBe(true);
      expect(board.cellExists(2, 3)).toBe(true);
      expect(board.addCell(2, 3)).toBe(false);
      expect(board.cellCount()).toBe(1);
    });

    it('keeps the piece when a cell is added twice', () => {
      const board = new Board();
      board.addCell(1, 1);
      board.setPiece(1, 1, whiteKing);
      expect(board.addCell(1, 1)).toBe(false);
      expect(board.getPiece(1, 1)).toBe(whiteKing);
    });

    it('accepts negative and far-apart coordinates', () => {
      const board = new Board();
      expect(board.addCell(-5, -12)).toBe(true);
      expect(board.addCell(1000, 3)).toBe(true);
      expect(board.cellExists(-5, -12)).toBe(true);
      expect(board.cellExists(1000, 3)).toBe(true);
      expect(board.cellExists(0, 0)).toBe(false);
    });

    it('rejects coordinates that are not integers', () => {
      const board = new Board();
      expect(board.addCell(1.5, 0)).toBe(false);
      expect(board.addCell(Number.NaN, 2)).toBe(false);
      expect(board.addCell(0, Infinity)).toBe(false);

      expect(board.cellExists(1.5, 0)).toBe(false);
      expect(board.cellCount()).toBe(0);
      expect(board.allCells()).toEqual([]);
      expect(board.bounds()).toEqual({ minRow: 0, maxRow: 0, minCol: 0, maxCol: 0 });

      expect(board.setPiece(1.5, 0, whiteKing)).toBe(false);
      expect(board.removeCell(1.5, 0)).toBe(false);
    });

    it('removes a cell and the piece on it', () => {
      const board = new Board();
      board.addCell(4, 4);
      board.setPiece(4, 4, blackQueen);

      expect(board.removeCell(4, 4)).toBe(true);
      expect(board.cellExists(4, 4)).toBe(false);
      expect(board.getPiece(4, 4)).toBeNull();

      // The piece does not come back with the cell
      board.addCell(4, 4);
      expect(board.getPiece(4, 4)).toBeNull();
    });

    it('reports removing a hole as a failure', () => {
      const board = new Board();
      expect(board.removeCell(0, 0)).toBe(false);
    });

    it('lists every cell', () => {
      const board = new Board();
      board.addCell(0, 0);
      board.addCell(-1, 2);
      board.addCell(3, -4);
      expect(keysOf(board.allCells())).toEqual(['-1,2', '0,0', '3,-4']);
    });

    it('clears every cell whatever the shape', () => {
      const board = new Board();
      board.setupIrregularSample();
      board.addCell(-3, 20);
      board.clear();
      expect(board.allCells()).toEqual([]);
      expect(board.cellExists(4, 4)).toBe(false);
      expect(board.cellExists(-3, 20)).toBe(false);
    });
  });

  describe('pieces', () => {
    it('places and reads back a piece', () => {
      const board = new Board();
      board.addCell(3, 5);
      expect(board.setPiece(3, 5, blackQueen)).toBe(true);

      const piece = board.getPiece(3, 5);
      expect(piece?.kind).toBe(PieceKind.QUEEN);
      expect(piece?.color).toBe(PieceColor.BLACK);
    });

    it('refuses to place on a hole and leaves the board unchanged', () => {
      const board = new Board();
      board.addCell(0, 0);
      board.addCell(0, 1);
      const before = keysOf(board.allCells());

      expect(board.setPiece(5, 5, whiteKing)).toBe(false);
      expect(keysOf(board.allCells())).toEqual(before);
      expect(board.cellExists(5, 5)).toBe(false);
    });

    it('clears a cell with null', () => {
      const board = new Board();
      board.addCell(0, 0);
      board.setPiece(0, 0, whiteKing);
      expect(board.setPiece(0, 0, null)).toBe(true);
      expect(board.getPiece(0, 0)).toBeNull();
      expect(board.cellExists(0, 0)).toBe(true);
    });

    it('overwrites the previous piece', () => {
      const board = new Board();
      board.addCell(0, 0);
      board.setPiece(0, 0, whiteKing);
      board.setPiece(0, 0, blackQueen);
      expect(board.getPiece(0, 0)).toBe(blackQueen);
    });

    it('returns null for both empty cells and holes', () => {
      const board = new Board();
      board.addCell(0, 0);
      expect(board.getPiece(0, 0)).toBeNull();
      expect(board.getPiece(9, 9)).toBeNull();
    });

    it('lists occupied cells only', () => {
      const board = new Board();
      board.addCell(0, 0);
      board.addCell(0, 1);
      board.setPiece(0, 1, whiteKing);
      expect(board.occupiedCells()).toEqual([{ row: 0, col: 1, piece: whiteKing }]);
    });
  });

  describe('bounds', () => {
    it('is all zeros without cells', () => {
      expect(new Board().bounds()).toEqual({ minRow: 0, maxRow: 0, minCol: 0, maxCol: 0 });
    });

    it('covers scattered cells', () => {
      const board = new Board();
      board.addCell(2, 7);
      board.addCell(-3, 1);
      board.addCell(5, -2);
      expect(board.bounds()).toEqual({ minRow: -3, maxRow: 5, minCol: -2, maxCol: 7 });
    });

    it('shrinks when an edge cell is removed', () => {
      const board = new Board();
      board.addCell(0, 0);
      board.addCell(10, 10);
      board.removeCell(10, 10);
      expect(board.bounds()).toEqual({ minRow: 0, maxRow: 0, minCol: 0, maxCol: 0 });
    });

    it('goes back to zeros after clear', () => {
      const board = new Board();
      board.addCell(-4, 9);
      board.clear();
      expect(board.bounds()).toEqual({ minRow: 0, maxRow: 0, minCol: 0, maxCol: 0 });
    });
  });

  describe('setupStandard', () => {
    it('builds the starting position on an 8x8 grid', () => {
      const board = new Board();
      board.setupStandard();

      expect(board.cellCount()).toBe(64);
      expect(board.bounds()).toEqual({ minRow: 0, maxRow: 7, minCol: 0, maxCol: 7 });

      expect(board.getPiece(0, 0)?.equals(new Piece(PieceKind.ROOK, PieceColor.BLACK))).toBe(true);
      expect(board.getPiece(7, 4)?.equals(new Piece(PieceKind.KING, PieceColor.WHITE))).toBe(true);
      expect(board.getPiece(1, 3)?.equals(new Piece(PieceKind.PAWN, PieceColor.BLACK))).toBe(true);
      expect(board.getPiece(0, 3)?.equals(new Piece(PieceKind.QUEEN, PieceColor.BLACK))).toBe(true);
      expect(board.getPiece(6, 7)?.equals(new Piece(PieceKind.PAWN, PieceColor.WHITE))).toBe(true);
      expect(board.getPiece(7, 6)?.equals(new Piece(PieceKind.KNIGHT, PieceColor.WHITE))).toBe(true);

      expect(board.cellExists(2, 0)).toBe(true);
      expect(board.getPiece(2, 0)).toBeNull();
      expect(board.occupiedCells()).toHaveLength(32);
    });

    it('replaces whatever was there before', () => {
      const board = new Board();
      board.addCell(-1, -1);
      board.setupStandard();
      expect(board.cellExists(-1, -1)).toBe(false);
    });
  });

  describe('setupIrregularSample', () => {
    it('builds a cross with the corners cut out', () => {
      const board = new Board();
      board.setupIrregularSample();

      expect(board.cellCount()).toBe(45);
      expect(board.bounds()).toEqual({ minRow: 0, maxRow: 8, minCol: 0, maxCol: 8 });

      expect(board.cellExists(0, 0)).toBe(false);
      expect(board.cellExists(2, 2)).toBe(false);
      expect(board.cellExists(0, 8)).toBe(false);
      expect(board.cellExists(8, 0)).toBe(false);
      expect(board.cellExists(6, 6)).toBe(false);
      expect(board.cellExists(0, 3)).toBe(true);
      expect(board.cellExists(3, 0)).toBe(true);
      expect(board.cellExists(5, 8)).toBe(true);
    });

    it('places the king in the middle and a piece on each arm tip', () => {
      const board = new Board();
      board.setupIrregularSample();

      expect(board.getPiece(4, 4)?.equals(new Piece(PieceKind.KING, PieceColor.WHITE))).toBe(true);
      expect(board.getPiece(0, 4)?.equals(new Piece(PieceKind.QUEEN, PieceColor.BLACK))).toBe(true);
      expect(board.getPiece(8, 4)?.equals(new Piece(PieceKind.QUEEN, PieceColor.WHITE))).toBe(true);
      expect(board.getPiece(4, 0)?.equals(new Piece(PieceKind.ROOK, PieceColor.BLACK))).toBe(true);
      expect(board.getPiece(4, 8)?.equals(new Piece(PieceKind.ROOK, PieceColor.WHITE))).toBe(true);
      expect(board.occupiedCells()).toHaveLength(5);
    });
  });

  describe('debug tracing', () => {
    it('stays silent by default', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const board = new Board();
      board.addCell(0, 0);
      expect(log).not.toHaveBeenCalled();
    });

    it('logs mutations with the board name', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const board = new Board({ name: 'Test', debug: true });
      board.addCell(0, 1);
      board.setPiece(0, 1, whiteKing);
      board.addCell(0, 1);
      board.removeCell(0, 1);

      expect(log.mock.calls).toEqual([
        ['[Test] addCell 0,1'],
        ['[Test] setPiece 0,1 Piece(king, white)'],
        ['[Test] removeCell 0,1'],
      ]);
    });
  });
});
