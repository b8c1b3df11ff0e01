export interface CellCoord {
  row: number;
  col: number;
}

export function cellKey(row: number, col: number): string {
  return `${row},${col}`;
}

/**
 * Inverse of cellKey. Returns null for anything that is not two integers.
 */
export function parseCellKey(key: string): CellCoord | null {
  const parts = key.split(',');
  if (parts.length !== 2) return null;

  const row = Number(parts[0]);
  const col = Number(parts[1]);
  if (parts[0].trim() === '' || parts[1].trim() === '') return null;
  if (!Number.isInteger(row) || !Number.isInteger(col)) return null;

  return { row, col };
}

/**
 * Column label: a-z for 0-25, the number itself otherwise.
 */
export function columnLabel(col: number): string {
  if (col >= 0 && col <= 25) {
    return String.fromCharCode('a'.charCodeAt(0) + col);
  }
  return col.toString();
}

export function columnLabels(minCol: number, maxCol: number): string[] {
  const labels: string[] = [];
  for (let col = minCol; col <= maxCol; col++) {
    labels.push(columnLabel(col));
  }
  return labels;
}

export function isLightSquare(row: number, col: number): boolean {
  return Math.abs(row + col) % 2 === 0;
}
