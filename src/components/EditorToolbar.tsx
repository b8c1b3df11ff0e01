import { BOARD_LAYOUTS } from '../game/layouts';
import type { LayoutName } from '../game/layouts';
import type { EditorTool } from '../store/boardEditorStore';

interface EditorToolbarProps {
  tool: EditorTool;
  layout: LayoutName | null;
  onToolChange: (tool: EditorTool) => void;
  onLoadLayout: (name: LayoutName) => void;
  onClear: () => void;
}

const TOOLS: EditorTool[] = ['shape', 'place', 'erase'];

const TOOL_LABELS: Record<EditorTool, string> = {
  shape: 'Add / remove cells',
  place: 'Place piece',
  erase: 'Erase piece',
};

export function EditorToolbar({ tool, layout, onToolChange, onLoadLayout, onClear }: EditorToolbarProps) {
  return (
    <div className="editor-toolbar">
      <div className="toolbar-group">
        {Object.values(BOARD_LAYOUTS).map((entry) => (
          <button
            key={entry.name}
            className={`toolbar-btn ${layout === entry.name ? 'active' : ''}`}
            onClick={() => onLoadLayout(entry.name)}
          >
            {entry.title}
          </button>
        ))}
        <button className="toolbar-btn" onClick={onClear}>Clear</button>
      </div>

      <div className="toolbar-group" role="radiogroup" aria-label="Tool">
        {TOOLS.map((value) => (
          <label key={value} className="tool-option">
            <input
              type="radio"
              name="editor-tool"
              value={value}
              checked={tool === value}
              onChange={() => onToolChange(value)}
            />
            <span>{TOOL_LABELS[value]}</span>
          </label>
        ))}
      </div>

      <style>{`
        .editor-toolbar {
          display: flex;
          flex-direction: column;
          gap: 8px;
        }

        .toolbar-group {
          display: flex;
          flex-wrap: wrap;
          gap: 6px;
        }

        .toolbar-btn {
          padding: 6px 12px;
          background: #f5f5f5;
          border: 2px solid #ddd;
          border-radius: 6px;
          cursor: pointer;
        }

        .toolbar-btn.active {
          background: #e3f2fd;
          border-color: #2196f3;
        }
      `}</style>
    </div>
  );
}
