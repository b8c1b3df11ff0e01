import { create } from 'zustand';

export type LogCategory =
  | 'shape'
  | 'placement'
  | 'layout'
  | 'rejected';

export interface EditorLogEntry {
  timestamp: number; // Milliseconds since the session started
  category: LogCategory;
  message: string;
}

interface EditorLogState {
  logs: EditorLogEntry[];
  sessionStartTime: number | null;

  // Actions
  startSession: () => void;
  addLog: (category: LogCategory, message: string) => void;
  clearLogs: () => void;
  getFilteredLogs: (categories: LogCategory[]) => EditorLogEntry[];
  formatLog: (categories: LogCategory[]) => string;
}

export const useEditorLogStore = create<EditorLogState>((set, get) => ({
  logs: [],
  sessionStartTime: null,

  startSession: () => {
    set({
      sessionStartTime: Date.now(),
      logs: [],
    });
  },

  addLog: (category: LogCategory, message: string) => {
    let { sessionStartTime } = get();
    if (sessionStartTime === null) {
      sessionStartTime = Date.now();
      set({ sessionStartTime });
    }

    const timestamp = Date.now() - sessionStartTime;
    set((state) => ({
      logs: [...state.logs, { timestamp, category, message }],
    }));
  },

  clearLogs: () => {
    set({ logs: [], sessionStartTime: null });
  },

  getFilteredLogs: (categories: LogCategory[]) => {
    const { logs } = get();
    if (categories.length === 0) return logs;
    return logs.filter((log) => categories.includes(log.category));
  },

  formatLog: (categories: LogCategory[]) => {
    const filteredLogs = get().getFilteredLogs(categories);

    return filteredLogs.map((log) => {
      const minutes = Math.floor(log.timestamp / 60000);
      const seconds = Math.floor((log.timestamp % 60000) / 1000);
      const timeStr = `${minutes}:${seconds.toString().padStart(2, '0')}`;
      return `[${log.category}] ${log.message} (${timeStr})`;
    }).join('\n');
  },
}));
