/**
 * Piece
 *
 * An immutable chess piece: a kind and a color.
 * The display symbol is derived from the pair.
 */

export const PieceKind = {
  KING: 'king',
  QUEEN: 'queen',
  ROOK: 'rook',
  BISHOP: 'bishop',
  KNIGHT: 'knight',
  PAWN: 'pawn',
} as const;

export type PieceKind = typeof PieceKind[keyof typeof PieceKind];

export const PieceColor = {
  WHITE: 'white',
  BLACK: 'black',
} as const;

export type PieceColor = typeof PieceColor[keyof typeof PieceColor];

export const ALL_PIECE_KINDS: readonly PieceKind[] = Object.values(PieceKind);
export const ALL_PIECE_COLORS: readonly PieceColor[] = Object.values(PieceColor);

// Adding a kind or color fails to compile until its glyph is listed here
const SYMBOLS: Record<PieceColor, Record<PieceKind, string>> = {
  white: { king: '♔', queen: '♕', rook: '♖', bishop: '♗', knight: '♘', pawn: '♙' },
  black: { king: '♚', queen: '♛', rook: '♜', bishop: '♝', knight: '♞', pawn: '♟' },
};

export class UnknownPieceCombinationError extends Error {
  constructor(readonly color: string, readonly kind: string) {
    super(`Unknown piece combination: ${color} ${kind}`);
    this.name = 'UnknownPieceCombinationError';
  }
}

/**
 * Look up the Unicode glyph for a color/kind pair.
 * @throws UnknownPieceCombinationError for values outside the enumerations
 */
export function pieceSymbol(color: PieceColor, kind: PieceKind): string {
  const hasOwn = Object.prototype.hasOwnProperty;
  if (!hasOwn.call(SYMBOLS, color) || !hasOwn.call(SYMBOLS[color], kind)) {
    throw new UnknownPieceCombinationError(String(color), String(kind));
  }
  return SYMBOLS[color][kind];
}

export class Piece {
  readonly kind: PieceKind;
  readonly color: PieceColor;

  constructor(kind: PieceKind, color: PieceColor) {
    this.kind = kind;
    this.color = color;
    Object.freeze(this);
  }

  symbol(): string {
    return pieceSymbol(this.color, this.kind);
  }

  equals(other: Piece | null | undefined): boolean {
    return !!other && other.kind === this.kind && other.color === this.color;
  }

  toString(): string {
    return `Piece(${this.kind}, ${this.color})`;
  }
}
