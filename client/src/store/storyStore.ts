import { create } from 'zustand';
import {
  formatPath,
  getNodeByPath,
  type BranchRequest,
  type NodePath,
  type OutlineResponseEntry,
  type StoryExport,
  type StoryRecord,
  type StorySummary,
  type ValidationResponse,
} from '@branching-stories/shared';
import { apiClient, type ImportPayload } from '@/services/api';

export interface Notice {
  type: 'success' | 'warning' | 'error';
  text: string;
}

interface StoryData {
  // Library
  stories: StorySummary[];

  // Open story
  story: StoryRecord | null;
  outline: OutlineResponseEntry[];
  validation: ValidationResponse | null;
  selectedPath: NodePath | null;

  // Loading states
  isLoading: boolean;
  loadingMessage: string;
  notice: Notice | null;
}

interface StoryState extends StoryData {
  loadStories: () => Promise<void>;
  createStory: (prompt: string) => Promise<void>;
  openStory: (id: string) => Promise<void>;
  closeStory: () => void;
  deleteStory: (id: string) => Promise<void>;
  selectNode: (path: NodePath | null) => void;
  addBranches: (request: BranchRequest) => Promise<boolean>;
  exportStory: (id: string) => Promise<StoryExport | null>;
  importStory: (document: unknown) => Promise<void>;
  setNotice: (notice: Notice | null) => void;
}

export const initialStoryState: StoryData = {
  stories: [],
  story: null,
  outline: [],
  validation: null,
  selectedPath: null,
  isLoading: false,
  loadingMessage: '',
  notice: null,
};

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Accepts either an exported document or a bare story tree
export function toImportPayload(parsed: unknown): ImportPayload {
  if (typeof parsed === 'object' && parsed !== null && 'root' in parsed) {
    const title = 'title' in parsed && typeof parsed.title === 'string' ? parsed.title : undefined;
    return { title, root: parsed.root };
  }
  return { root: parsed };
}

export const useStoryStore = create<StoryState>((set, get) => {
  // Outline and validation follow every change to the open story
  const refreshDerived = async (story: StoryRecord) => {
    const [outline, validation] = await Promise.all([
      apiClient.getOutline(story.id),
      apiClient.getValidation(story.id),
    ]);
    if (get().story?.id === story.id) {
      set({ outline, validation });
    }
  };

  const showStory = async (story: StoryRecord, notice: Notice | null) => {
    const current = get().selectedPath;
    const keepSelection = get().story?.id === story.id && current && getNodeByPath(story.root, current);
    set({
      story,
      selectedPath: keepSelection ? current : null,
      notice,
    });
    await refreshDerived(story);
    await get().loadStories();
  };

  const run = async (loadingMessage: string, task: () => Promise<void>) => {
    set({ isLoading: true, loadingMessage, notice: null });
    try {
      await task();
    } catch (error) {
      console.error(`${loadingMessage} failed:`, error);
      set({ notice: { type: 'error', text: errorText(error) } });
    } finally {
      set({ isLoading: false, loadingMessage: '' });
    }
  };

  return {
    ...initialStoryState,

    loadStories: async () => {
      try {
        set({ stories: await apiClient.listStories() });
      } catch (error) {
        console.error('Failed to load stories:', error);
        set({ notice: { type: 'error', text: errorText(error) } });
      }
    },

    createStory: (prompt) =>
      run('Generating your story', async () => {
        const { story, usedFallback } = await apiClient.createStory(prompt);
        await showStory(
          story,
          usedFallback
            ? { type: 'warning', text: 'The AI model could not be reached, so a sample story was used instead.' }
            : { type: 'success', text: `Created "${story.title}". Select a node to start branching.` }
        );
      }),

    openStory: (id) =>
      run('Opening story', async () => {
        await showStory(await apiClient.getStory(id), null);
      }),

    closeStory: () => set({ story: null, outline: [], validation: null, selectedPath: null }),

    deleteStory: (id) =>
      run('Deleting story', async () => {
        await apiClient.deleteStory(id);
        if (get().story?.id === id) {
          get().closeStory();
        }
        await get().loadStories();
      }),

    selectNode: (path) => set({ selectedPath: path }),

    addBranches: async (request) => {
      const story = get().story;
      if (!story) return false;

      let added = false;
      await run('Growing new branches', async () => {
        const result = await apiClient.addBranches(story.id, request);
        await showStory(result.story, {
          type: result.usedFallback ? 'warning' : 'success',
          text: result.usedFallback
            ? `${result.message} The AI model could not be reached, so placeholder branches were used.`
            : result.message,
        });
        added = true;
      });
      return added;
    },

    exportStory: async (id) => {
      try {
        return await apiClient.exportStory(id);
      } catch (error) {
        console.error('Failed to export story:', error);
        set({ notice: { type: 'error', text: errorText(error) } });
        return null;
      }
    },

    importStory: (document) =>
      run('Importing story', async () => {
        const story = await apiClient.importStory(toImportPayload(document));
        await showStory(story, { type: 'success', text: `Imported "${story.title}".` });
      }),

    setNotice: (notice) => set({ notice }),
  };
});

// Key of the selected node, for comparing against outline entries
export function selectedKey(state: Pick<StoryData, 'selectedPath'>): string | null {
  return state.selectedPath ? formatPath(state.selectedPath) : null;
}
