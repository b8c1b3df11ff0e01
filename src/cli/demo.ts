import { Board, BOARD_LAYOUTS } from '../game';
import type { DemoConfig } from './config';
import { renderBoard, renderPanel } from './renderBoard';

/**
 * Build every configured layout and return the printable sections
 */
export function buildDemo(config: DemoConfig): string[] {
  const sections: string[] = [];

  config.layouts.forEach((name, index) => {
    const layout = BOARD_LAYOUTS[name];
    const board = new Board({ name: `Board:${name}`, debug: config.debug });
    layout.apply(board);

    const heading = `Example ${index + 1}: ${layout.title}`;
    const body = layout.note
      ? `${layout.note}\n\n${renderBoard(board, config.glyphs)}`
      : renderBoard(board, config.glyphs);
    sections.push(renderPanel(heading, body));
  });

  return sections;
}
