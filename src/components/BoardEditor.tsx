import { useEffect } from 'react';
import { BoardGrid } from './BoardGrid';
import { PiecePalette } from './PiecePalette';
import { EditorToolbar } from './EditorToolbar';
import { EditLog } from './EditLog';
import { useBoardEditorStore } from '../store/boardEditorStore';
import { useEditorLogStore } from '../store/editorLogStore';
import { LayoutName } from '../game/layouts';

/**
 * BoardEditor Component
 *
 * Main container for the board editor: toolbar and palette on the left,
 * the board in the middle, the edit log underneath.
 */
export function BoardEditor() {
  const board = useBoardEditorStore((state) => state.board);
  // The board is mutated in place; the revision is what changes
  useBoardEditorStore((state) => state.revision);
  const layout = useBoardEditorStore((state) => state.layout);
  const tool = useBoardEditorStore((state) => state.tool);
  const selectedPiece = useBoardEditorStore((state) => state.selectedPiece);

  // Get actions (these don't cause re-renders)
  const loadLayout = useBoardEditorStore((state) => state.loadLayout);
  const clearBoard = useBoardEditorStore((state) => state.clearBoard);
  const applyTool = useBoardEditorStore((state) => state.applyTool);
  const setTool = useBoardEditorStore((state) => state.setTool);
  const selectPiece = useBoardEditorStore((state) => state.selectPiece);

  useEffect(() => {
    console.log('[BoardEditor] Component mounted');

    // First mount only; StrictMode runs this effect twice
    if (useBoardEditorStore.getState().revision === 0) {
      useEditorLogStore.getState().startSession();
      loadLayout(LayoutName.STANDARD);
    }
    return () => console.log('[BoardEditor] Component unmounted');
  }, [loadLayout]);

  const bounds = board.bounds();
  const cellCount = board.cellCount();
  const pieceCount = board.occupiedCells().length;

  return (
    <div className="board-editor">
      <div className="editor-header">
        <h1>Board Editor</h1>
        <div className="editor-status">
          {cellCount} cells, {pieceCount} pieces
          {cellCount > 0 && (
            <span className="bounds-info">
              {' '}· rows {bounds.minRow}–{bounds.maxRow}, cols {bounds.minCol}–{bounds.maxCol}
            </span>
          )}
        </div>
      </div>

      <div className="editor-body">
        <div className="editor-sidebar">
          <EditorToolbar
            tool={tool}
            layout={layout}
            onToolChange={setTool}
            onLoadLayout={loadLayout}
            onClear={clearBoard}
          />
          <PiecePalette selected={selectedPiece} active={tool === 'place'} onSelect={selectPiece} />
        </div>

        <div className="editor-board">
          <BoardGrid board={board} margin={tool === 'shape' ? 1 : 0} onCellClick={applyTool} />
        </div>
      </div>

      <EditLog />

      <style>{`
        .board-editor {
          padding: 20px;
          max-width: 1100px;
          margin: 0 auto;
          display: flex;
          flex-direction: column;
          gap: 16px;
        }

        .editor-header {
          display: flex;
          justify-content: space-between;
          align-items: baseline;
        }

        .editor-status {
          color: #666;
        }

        .editor-body {
          display: flex;
          gap: 24px;
          align-items: flex-start;
        }

        .editor-sidebar {
          display: flex;
          flex-direction: column;
          gap: 16px;
          width: 320px;
        }
      `}</style>
    </div>
  );
}
