// Board model exports
export { Board } from './Board';
export type { BoardBounds, BoardOptions, OccupiedCell, ReadonlyBoard } from './Board';
export {
  Piece,
  PieceKind,
  PieceColor,
  ALL_PIECE_KINDS,
  ALL_PIECE_COLORS,
  UnknownPieceCombinationError,
  pieceSymbol,
} from './Piece';
export { cellKey, parseCellKey, columnLabel, columnLabels, isLightSquare } from './coordinates';
export type { CellCoord } from './coordinates';
export { BOARD_LAYOUTS, LayoutName, isLayoutName, setupDiagonalSample } from './layouts';
export type { BoardLayout } from './layouts';
