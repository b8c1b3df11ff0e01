import type { ReadonlyBoard } from '../game/Board';
import { columnLabels, isLightSquare } from '../game/coordinates';

interface BoardGridProps {
  board: ReadonlyBoard;
  margin?: number; // Extra ring of holes drawn around the bounds so the shape can grow
  onCellClick?: (row: number, col: number) => void;
}

/**
 * BoardGrid Component
 *
 * Draws any board shape as a table. Holes are shown as '·'.
 * Only reads from the board.
 */
export function BoardGrid({ board, margin = 0, onCellClick }: BoardGridProps) {
  const isEmpty = board.allCells().length === 0;

  if (isEmpty && margin === 0) {
    return <div className="board-grid-empty">Empty board</div>;
  }

  const bounds = board.bounds();
  const minRow = bounds.minRow - margin;
  const maxRow = bounds.maxRow + margin;
  const minCol = bounds.minCol - margin;
  const maxCol = bounds.maxCol + margin;

  const rows: number[] = [];
  for (let row = minRow; row <= maxRow; row++) rows.push(row);
  const cols: number[] = [];
  for (let col = minCol; col <= maxCol; col++) cols.push(col);
  const labels = columnLabels(minCol, maxCol);

  const renderCell = (row: number, col: number) => {
    const handleClick = onCellClick ? () => onCellClick(row, col) : undefined;

    if (!board.cellExists(row, col)) {
      return (
        <td key={col} className="board-cell hole" data-testid={`cell-${row}-${col}`} onClick={handleClick}>
          ·
        </td>
      );
    }

    const piece = board.getPiece(row, col);
    const shade = isLightSquare(row, col) ? 'light' : 'dark';

    return (
      <td
        key={col}
        className={`board-cell ${shade}${piece ? ' occupied' : ''}`}
        data-testid={`cell-${row}-${col}`}
        title={piece ? piece.toString() : undefined}
        onClick={handleClick}
      >
        {piece ? piece.symbol() : ''}
      </td>
    );
  };

  return (
    <div className="board-grid-container">
      <table className="board-grid">
        <thead>
          <tr>
            <th />
            {labels.map((label, i) => (
              <th key={cols[i]} className="col-label">{label}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.map((row) => (
            <tr key={row}>
              <th className="row-label">{row}</th>
              {cols.map((col) => renderCell(row, col))}
            </tr>
          ))}
        </tbody>
      </table>

      <style>{`
        .board-grid {
          border-collapse: collapse;
          font-size: 28px;
        }

        .board-grid th {
          font-size: 13px;
          color: #888;
          padding: 2px 6px;
        }

        .board-cell {
          width: 40px;
          height: 40px;
          text-align: center;
          cursor: pointer;
          user-select: none;
        }

        .board-cell.light {
          background: #f0d9b5;
        }

        .board-cell.dark {
          background: #b58863;
        }

        .board-cell.hole {
          background: #222;
          color: #555;
        }

        .board-cell:hover {
          outline: 2px solid #2196f3;
          outline-offset: -2px;
        }
      `}</style>
    </div>
  );
}
