import { useRef, type ChangeEvent } from 'react';
import { useStoryStore } from '@/store/storyStore';

function downloadJson(filename: string, data: unknown) {
  const blob = new Blob([JSON.stringify(data, null, 2)], { type: 'application/json' });
  const url = URL.createObjectURL(blob);
  const anchor = document.createElement('a');
  anchor.href = url;
  anchor.download = filename;
  anchor.click();
  URL.revokeObjectURL(url);
}

function slugify(title: string): string {
  const slug = title.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
  return slug || 'story';
}

export default function StoryLibrary() {
  const { stories, story, isLoading, openStory, deleteStory, exportStory, importStory, setNotice } =
    useStoryStore();
  const fileInputRef = useRef<HTMLInputElement>(null);

  const handleExport = async (id: string) => {
    const exported = await exportStory(id);
    if (exported) {
      downloadJson(`${slugify(exported.title)}.json`, exported);
    }
  };

  const handleImport = async (event: ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0];
    event.target.value = '';
    if (!file) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(await file.text());
    } catch (err) {
      console.error('Failed to read story file:', err);
      setNotice({ type: 'error', text: `${file.name} is not valid JSON.` });
      return;
    }
    await importStory(parsed);
  };

  return (
    <div className="panel story-library">
      <h3>Library</h3>
      {stories.length === 0 ? (
        <p className="dim">No saved stories yet.</p>
      ) : (
        <ul>
          {stories.map((entry) => (
            <li key={entry.id} className={entry.id === story?.id ? 'active' : undefined}>
              <button className="link-button" onClick={() => openStory(entry.id)} disabled={isLoading}>
                {entry.title}
              </button>
              <span className="dim"> ({entry.nodeCount} nodes)</span>
              <div className="library-actions">
                <button className="link-button" onClick={() => handleExport(entry.id)}>Export</button>
                <button
                  className="link-button danger"
                  onClick={() => {
                    if (window.confirm(`Delete "${entry.title}"?`)) {
                      void deleteStory(entry.id);
                    }
                  }}
                  disabled={isLoading}
                >
                  Delete
                </button>
              </div>
            </li>
          ))}
        </ul>
      )}
      <button onClick={() => fileInputRef.current?.click()} disabled={isLoading}>
        Import JSON
      </button>
      <input
        ref={fileInputRef}
        type="file"
        accept="application/json,.json"
        hidden
        onChange={handleImport}
      />
    </div>
  );
}
