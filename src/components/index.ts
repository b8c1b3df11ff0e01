// Component exports
export { BoardGrid } from './BoardGrid';
export { BoardEditor } from './BoardEditor';
export { EditorToolbar } from './EditorToolbar';
export { PiecePalette } from './PiecePalette';
export { EditLog } from './EditLog';
