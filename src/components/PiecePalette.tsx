import { useMemo } from 'react';
import { ALL_PIECE_COLORS, ALL_PIECE_KINDS, Piece } from '../game/Piece';

interface PiecePaletteProps {
  selected: Piece | null;
  active: boolean; // Whether the place tool is in use
  onSelect: (piece: Piece | null) => void;
}

/**
 * PiecePalette Component
 *
 * One button per color/kind pair, plus an empty brush that clears cells.
 */
export function PiecePalette({ selected, active, onSelect }: PiecePaletteProps) {
  const pieces = useMemo(
    () => ALL_PIECE_COLORS.map((color) => ALL_PIECE_KINDS.map((kind) => new Piece(kind, color))),
    [],
  );

  const isSelected = (piece: Piece | null): boolean => {
    if (!active) return false;
    return piece === null ? selected === null : piece.equals(selected);
  };

  return (
    <div className="piece-palette">
      {pieces.map((row) => (
        <div key={row[0].color} className="piece-palette-row">
          {row.map((piece) => (
            <button
              key={piece.kind}
              className={`palette-piece ${isSelected(piece) ? 'selected' : ''}`}
              title={`${piece.color} ${piece.kind}`}
              onClick={() => onSelect(piece)}
            >
              {piece.symbol()}
            </button>
          ))}
        </div>
      ))}
      <button
        className={`palette-piece palette-none ${isSelected(null) ? 'selected' : ''}`}
        title="Empty"
        onClick={() => onSelect(null)}
      >
        ∅
      </button>

      <style>{`
        .piece-palette {
          display: flex;
          flex-direction: column;
          gap: 4px;
        }

        .piece-palette-row {
          display: flex;
          gap: 4px;
        }

        .palette-piece {
          width: 40px;
          height: 40px;
          font-size: 26px;
          background: #f5f5f5;
          border: 2px solid #ddd;
          border-radius: 6px;
          cursor: pointer;
        }

        .palette-piece.selected {
          background: #e3f2fd;
          border-color: #2196f3;
        }
      `}</style>
    </div>
  );
}
