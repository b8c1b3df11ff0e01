import type { ReadonlyBoard } from '../game/Board';
import { columnLabels, isLightSquare } from '../game/coordinates';

export interface RenderOptions {
  holeGlyph?: string;
  lightGlyph?: string;
  darkGlyph?: string;
}

export const DEFAULT_GLYPHS: Required<RenderOptions> = {
  holeGlyph: '·',
  lightGlyph: '□',
  darkGlyph: '■',
};

export const EMPTY_BOARD_TEXT = 'Empty board';

/**
 * Render a board as a text grid: a header of column labels, then one
 * line per row prefixed with the row number. Only reads the board.
 */
export function renderBoard(board: ReadonlyBoard, options: RenderOptions = {}): string {
  const glyphs: Required<RenderOptions> = {
    holeGlyph: options.holeGlyph ?? DEFAULT_GLYPHS.holeGlyph,
    lightGlyph: options.lightGlyph ?? DEFAULT_GLYPHS.lightGlyph,
    darkGlyph: options.darkGlyph ?? DEFAULT_GLYPHS.darkGlyph,
  };

  if (board.allCells().length === 0) {
    return EMPTY_BOARD_TEXT;
  }

  const { minRow, maxRow, minCol, maxCol } = board.bounds();
  const labels = columnLabels(minCol, maxCol);

  const colWidth = Math.max(1, ...labels.map((label) => label.length));
  let rowLabelWidth = 1;
  for (let row = minRow; row <= maxRow; row++) {
    rowLabelWidth = Math.max(rowLabelWidth, row.toString().length);
  }

  const lines: string[] = [];
  lines.push(' '.repeat(rowLabelWidth) + ' ' + labels.map((label) => label.padStart(colWidth)).join(' '));

  for (let row = minRow; row <= maxRow; row++) {
    const cells: string[] = [];

    for (let col = minCol; col <= maxCol; col++) {
      let glyph: string;
      if (!board.cellExists(row, col)) {
        glyph = glyphs.holeGlyph;
      } else {
        const piece = board.getPiece(row, col);
        if (piece) {
          glyph = piece.symbol();
        } else {
          glyph = isLightSquare(row, col) ? glyphs.lightGlyph : glyphs.darkGlyph;
        }
      }
      cells.push(glyph.padStart(colWidth));
    }

    lines.push(row.toString().padStart(rowLabelWidth) + ' ' + cells.join(' '));
  }

  return lines.join('\n');
}

/**
 * Frame a rendering with a title and a rule under it
 */
export function renderPanel(title: string, body: string): string {
  const width = Math.max(title.length, ...body.split('\n').map((line) => line.length));
  return [title, '─'.repeat(width), body].join('\n');
}
