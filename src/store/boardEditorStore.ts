import { create } from 'zustand';
import { Board, BOARD_LAYOUTS } from '../game';
import type { LayoutName, Piece } from '../game';
import { useEditorLogStore } from './editorLogStore';

export type EditorTool = 'place' | 'erase' | 'shape';

interface BoardEditorState {
  board: Board;
  revision: number; // Bumped on every successful edit; the board is mutated in place
  layout: LayoutName | null; // Last layout loaded
  tool: EditorTool;
  selectedPiece: Piece | null;

  // Actions
  loadLayout: (name: LayoutName) => void;
  clearBoard: () => void;
  applyTool: (row: number, col: number) => boolean;
  setTool: (tool: EditorTool) => void;
  selectPiece: (piece: Piece | null) => void;
  reset: () => void;
}

function describeCell(row: number, col: number): string {
  return `(${row}, ${col})`;
}

function reject(message: string): false {
  console.warn(`[Editor] ${message}`);
  useEditorLogStore.getState().addLog('rejected', message);
  return false;
}

/**
 * Board Editor Store
 *
 * Holds the board being edited and routes clicks through the active tool.
 */
export const useBoardEditorStore = create<BoardEditorState>((set, get) => ({
  board: new Board({ name: 'Editor' }),
  revision: 0,
  layout: null,
  tool: 'shape',
  selectedPiece: null,

  loadLayout: (name: LayoutName) => {
    const { board } = get();
    const layout = BOARD_LAYOUTS[name];
    layout.apply(board);

    set((state) => ({ revision: state.revision + 1, layout: name }));
    useEditorLogStore.getState().addLog('layout', `Loaded ${layout.title}`);
  },

  clearBoard: () => {
    get().board.clear();
    set((state) => ({ revision: state.revision + 1, layout: null }));
    useEditorLogStore.getState().addLog('layout', 'Cleared board');
  },

  applyTool: (row: number, col: number) => {
    const { board, tool, selectedPiece } = get();
    const log = useEditorLogStore.getState().addLog;
    const where = describeCell(row, col);

    switch (tool) {
      case 'shape': {
        if (board.cellExists(row, col)) {
          board.removeCell(row, col);
          log('shape', `Removed cell ${where}`);
        } else {
          board.addCell(row, col);
          log('shape', `Added cell ${where}`);
        }
        break;
      }

      case 'place': {
        if (!board.setPiece(row, col, selectedPiece)) {
          return reject(`Cannot place on hole ${where}`);
        }
        log('placement', selectedPiece
          ? `Placed ${selectedPiece.symbol()} on ${where}`
          : `Cleared ${where}`);
        break;
      }

      case 'erase': {
        if (!board.setPiece(row, col, null)) {
          return reject(`Cannot clear hole ${where}`);
        }
        log('placement', `Cleared ${where}`);
        break;
      }
    }

    set((state) => ({ revision: state.revision + 1 }));
    return true;
  },

  setTool: (tool: EditorTool) => {
    set({ tool });
  },

  selectPiece: (piece: Piece | null) => {
    set({ selectedPiece: piece, tool: 'place' });
  },

  reset: () => {
    set({
      board: new Board({ name: 'Editor' }),
      revision: 0,
      layout: null,
      tool: 'shape',
      selectedPiece: null,
    });
    useEditorLogStore.getState().clearLogs();
  },
}));
