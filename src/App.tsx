import { BoardEditor } from './components';

export function App() {
  return <BoardEditor />;
}
