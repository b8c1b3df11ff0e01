import { Board } from './Board';
import { Piece, PieceColor, PieceKind } from './Piece';

/**
 * Named board layouts shared by the demo and the editor
 */

export const LayoutName = {
  STANDARD: 'standard',
  CROSS: 'cross',
  DIAGONAL: 'diagonal',
} as const;

export type LayoutName = typeof LayoutName[keyof typeof LayoutName];

export interface BoardLayout {
  name: LayoutName;
  title: string;
  note?: string;
  apply: (board: Board) => void;
}

/**
 * Three-cell-wide diagonal band from (0,0) to (7,7)
 */
export function setupDiagonalSample(board: Board): void {
  board.clear();

  for (let i = 0; i < 7; i++) {
    board.addCell(i, i);
    board.addCell(i, i + 1);
    board.addCell(i + 1, i);
  }

  board.setPiece(0, 0, new Piece(PieceKind.KING, PieceColor.WHITE));
  board.setPiece(3, 3, new Piece(PieceKind.QUEEN, PieceColor.BLACK));
  board.setPiece(6, 6, new Piece(PieceKind.KING, PieceColor.BLACK));
}

export const BOARD_LAYOUTS: Record<LayoutName, BoardLayout> = {
  standard: {
    name: LayoutName.STANDARD,
    title: 'Standard 8×8 Chess Board',
    apply: (board) => board.setupStandard(),
  },
  cross: {
    name: LayoutName.CROSS,
    title: 'Irregular Cross-Shaped Board',
    note: "'·' marks holes (cells that do not exist)",
    apply: (board) => board.setupIrregularSample(),
  },
  diagonal: {
    name: LayoutName.DIAGONAL,
    title: 'Custom Irregular Board',
    note: 'A diagonal band with a few pieces',
    apply: setupDiagonalSample,
  },
};

export function isLayoutName(value: string): value is LayoutName {
  return Object.prototype.hasOwnProperty.call(BOARD_LAYOUTS, value);
}
