import { useEffect } from 'react';
import { useStoryStore } from './store/storyStore';
import StoryPrompt from './components/story/StoryPrompt';
import StoryLibrary from './components/story/StoryLibrary';
import StoryTree from './components/story/StoryTree';
import NodeDetails from './components/story/NodeDetails';
import BranchBuilder from './components/story/BranchBuilder';

function App() {
  const { story, validation, notice, isLoading, loadingMessage, loadStories, setNotice } = useStoryStore();

  useEffect(() => {
    void loadStories();
  }, [loadStories]);

  return (
    <div className="app">
      <header className="app-header">
        <h1>Branching Stories</h1>
        <p className="dim">Generate a story, then grow branches that end, stay open, or merge back.</p>
      </header>

      {notice && (
        <div className={`notice notice--${notice.type}`}>
          <span>{notice.text}</span>
          <button className="link-button" onClick={() => setNotice(null)}>Dismiss</button>
        </div>
      )}
      {isLoading && <p className="loading">{loadingMessage}...</p>}

      <div className="app-body">
        <aside className="app-sidebar">
          <StoryPrompt />
          <StoryLibrary />
        </aside>

        <main className="app-main">
          {story ? (
            <>
              <h2>{story.title}</h2>
              {validation && (
                <p className="dim story-stats">
                  {validation.stats.nodeCount} nodes · {validation.stats.endingCount} endings ·{' '}
                  {validation.stats.mergeCount} merges · {validation.stats.achievementCount} achievements
                </p>
              )}
              {validation?.warnings.map((warning) => (
                <p key={warning} className="notice notice--warning">{warning}</p>
              ))}
              <div className="story-container">
                <StoryTree />
                <NodeDetails />
              </div>
              <BranchBuilder />
            </>
          ) : (
            <p className="dim empty-state">Create a story or open one from the library to see its tree.</p>
          )}
        </main>
      </div>
    </div>
  );
}

export default App;
