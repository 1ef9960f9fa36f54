import { useState, type FormEvent } from 'react';
import { useStoryStore } from '@/store/storyStore';

export default function StoryPrompt() {
  const { createStory, isLoading } = useStoryStore();
  const [prompt, setPrompt] = useState('');

  const handleSubmit = async (event: FormEvent) => {
    event.preventDefault();
    const trimmed = prompt.trim();
    if (!trimmed) return;
    await createStory(trimmed);
    setPrompt('');
  };

  return (
    <form className="panel story-prompt" onSubmit={handleSubmit}>
      <h3>New Story</h3>
      <label htmlFor="story-prompt">Enter a story prompt to generate the main storyline:</label>
      <textarea
        id="story-prompt"
        rows={4}
        value={prompt}
        placeholder="A student's first day at a new school..."
        onChange={(e) => setPrompt(e.target.value)}
        disabled={isLoading}
      />
      <p className="hint">This will create a linear story with no branches. You can add branches later.</p>
      <button type="submit" disabled={isLoading || !prompt.trim()}>
        Generate Story
      </button>
    </form>
  );
}
