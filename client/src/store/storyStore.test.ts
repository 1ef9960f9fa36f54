import { beforeEach, describe, it, expect, vi } from 'vitest';
import type { StoryRecord } from '@branching-stories/shared';
import { apiClient } from '@/services/api';
import { initialStoryState, toImportPayload, useStoryStore } from './storyStore';

vi.mock('@/services/api', () => ({
  apiClient: {
    listStories: vi.fn(),
    createStory: vi.fn(),
    getStory: vi.fn(),
    deleteStory: vi.fn(),
    getOutline: vi.fn(),
    getValidation: vi.fn(),
    addBranches: vi.fn(),
    exportStory: vi.fn(),
    importStory: vi.fn(),
  },
}));

const api = vi.mocked(apiClient);

const story: StoryRecord = {
  id: 'story-1',
  title: 'Rainy Day',
  prompt: 'A rainy day',
  root: {
    name: 'Rainy Day',
    description: '',
    children: [{ name: 'Umbrella', description: '', children: [] }],
  },
  provider: 'openai',
  createdAt: '2024-05-01T10:00:00.000Z',
  updatedAt: '2024-05-01T10:00:00.000Z',
};

const validation = {
  valid: true,
  errors: [],
  warnings: [],
  stats: { nodeCount: 2, endingCount: 1, mergeCount: 0, achievementCount: 0, maxDepth: 1 },
};

describe('useStoryStore', () => {
  beforeEach(() => {
    vi.resetAllMocks();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    useStoryStore.setState(initialStoryState);
    api.listStories.mockResolvedValue([]);
    api.getOutline.mockResolvedValue([]);
    api.getValidation.mockResolvedValue(validation);
  });

  it('opens a freshly generated story and refreshes its outline', async () => {
    api.createStory.mockResolvedValue({ story, usedFallback: false });

    await useStoryStore.getState().createStory('A rainy day');

    const state = useStoryStore.getState();
    expect(api.createStory).toHaveBeenCalledWith('A rainy day');
    expect(state.story?.id).toBe('story-1');
    expect(state.validation).toEqual(validation);
    expect(state.isLoading).toBe(false);
    expect(state.notice).toEqual({
      type: 'success',
      text: 'Created "Rainy Day". Select a node to start branching.',
    });
    expect(api.listStories).toHaveBeenCalledTimes(1);
  });

  it('warns when the server fell back to the sample story', async () => {
    api.createStory.mockResolvedValue({ story, usedFallback: true });

    await useStoryStore.getState().createStory('A rainy day');

    expect(useStoryStore.getState().notice?.type).toBe('warning');
  });

  it('surfaces request errors as a notice', async () => {
    api.createStory.mockRejectedValue(new Error('No AI provider configured'));

    await useStoryStore.getState().createStory('A rainy day');

    const state = useStoryStore.getState();
    expect(state.story).toBeNull();
    expect(state.isLoading).toBe(false);
    expect(state.notice).toEqual({ type: 'error', text: 'No AI provider configured' });
  });

  it('keeps the selection when the same story is updated', async () => {
    useStoryStore.setState({ story, selectedPath: [0] });
    api.addBranches.mockResolvedValue({
      story,
      added: 1,
      originalCount: 0,
      message: 'Successfully added 1 new branches to the story!',
      usedFallback: false,
    });

    const added = await useStoryStore.getState().addBranches({
      sourcePath: [0],
      ending: { kind: 'open' },
      branchLength: 3,
      mode: 'single',
      achievements: true,
    });

    const state = useStoryStore.getState();
    expect(added).toBe(true);
    expect(api.addBranches).toHaveBeenCalledWith('story-1', expect.objectContaining({ sourcePath: [0] }));
    expect(state.selectedPath).toEqual([0]);
    expect(state.notice).toEqual({ type: 'success', text: 'Successfully added 1 new branches to the story!' });
  });

  it('does nothing when adding branches with no story open', async () => {
    const added = await useStoryStore.getState().addBranches({
      sourcePath: [],
      ending: { kind: 'alternate' },
      branchLength: 3,
      mode: 'single',
      achievements: true,
    });

    expect(added).toBe(false);
    expect(api.addBranches).not.toHaveBeenCalled();
  });

  it('closes the open story when it is deleted', async () => {
    useStoryStore.setState({ story, selectedPath: [0] });
    api.deleteStory.mockResolvedValue(undefined);

    await useStoryStore.getState().deleteStory('story-1');

    const state = useStoryStore.getState();
    expect(state.story).toBeNull();
    expect(state.selectedPath).toBeNull();
    expect(api.listStories).toHaveBeenCalledTimes(1);
  });
});

describe('toImportPayload', () => {
  it('reads the title and root of an exported document', () => {
    expect(
      toImportPayload({ format: 'branching-story', version: 1, title: 'Saved', root: { name: 'Start' } })
    ).toEqual({ title: 'Saved', root: { name: 'Start' } });
  });

  it('wraps a bare story tree', () => {
    expect(toImportPayload({ name: 'Start', children: [] })).toEqual({
      root: { name: 'Start', children: [] },
    });
  });
});
