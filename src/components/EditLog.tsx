import { useState } from 'react';
import { useEditorLogStore, type LogCategory } from '../store/editorLogStore';

const CATEGORIES: LogCategory[] = ['shape', 'placement', 'layout', 'rejected'];

const CATEGORY_LABELS: Record<LogCategory, string> = {
  shape: 'Shape edits',
  placement: 'Piece placement',
  layout: 'Layouts',
  rejected: 'Rejected edits',
};

/**
 * EditLog Component
 *
 * Shows the edit history, filtered by category.
 */
export function EditLog() {
  const formatLog = useEditorLogStore((state) => state.formatLog);
  // Re-render when entries arrive
  useEditorLogStore((state) => state.logs);

  const [selectedCategories, setSelectedCategories] = useState<LogCategory[]>(CATEGORIES);

  const toggleCategory = (category: LogCategory) => {
    setSelectedCategories((prev) => {
      if (prev.includes(category)) {
        return prev.filter((c) => c !== category);
      } else {
        return [...prev, category];
      }
    });
  };

  // An empty selection would mean "everything" to the store
  const logText = selectedCategories.length > 0 ? formatLog(selectedCategories) : '';

  return (
    <div className="edit-log">
      <div className="category-list">
        {CATEGORIES.map((category) => (
          <label key={category} className="category-item">
            <input
              type="checkbox"
              checked={selectedCategories.includes(category)}
              onChange={() => toggleCategory(category)}
            />
            <span>{CATEGORY_LABELS[category]}</span>
          </label>
        ))}
      </div>

      <textarea
        className="log-textarea"
        value={logText}
        readOnly
        placeholder="Edits will appear here..."
      />

      <style>{`
        .edit-log {
          display: flex;
          flex-direction: column;
          gap: 6px;
        }

        .category-list {
          display: flex;
          flex-wrap: wrap;
          gap: 10px;
          font-size: 13px;
        }

        .log-textarea {
          width: 100%;
          min-height: 160px;
          font-family: monospace;
          font-size: 12px;
        }
      `}</style>
    </div>
  );
}
