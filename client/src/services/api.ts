// API client for the story server

import type {
  BranchRequest,
  BranchResponse,
  CreateStoryResponse,
  OutlineResponseEntry,
  StoryExport,
  StoryRecord,
  StorySummary,
  ValidationResponse,
} from '@branching-stories/shared';

const API_BASE = '/api';

export interface ImportPayload {
  title?: string;
  root: unknown;
}

interface ApiClient {
  listStories: () => Promise<StorySummary[]>;
  createStory: (prompt: string) => Promise<CreateStoryResponse>;
  getStory: (storyId: string) => Promise<StoryRecord>;
  deleteStory: (storyId: string) => Promise<void>;
  getOutline: (storyId: string) => Promise<OutlineResponseEntry[]>;
  getValidation: (storyId: string) => Promise<ValidationResponse>;
  addBranches: (storyId: string, data: BranchRequest) => Promise<BranchResponse>;
  exportStory: (storyId: string) => Promise<StoryExport>;
  importStory: (data: ImportPayload) => Promise<StoryRecord>;
}

async function send(endpoint: string, options: RequestInit = {}): Promise<Response> {
  const url = `${API_BASE}${endpoint}`;

  const response = await fetch(url, {
    ...options,
    headers: {
      'Content-Type': 'application/json',
      ...options.headers,
    },
  });

  if (!response.ok) {
    const error = await response.json().catch(() => ({ error: 'Unknown error' }));
    throw new Error(error.error || `HTTP ${response.status}`);
  }

  return response;
}

async function request<T>(endpoint: string, options: RequestInit = {}): Promise<T> {
  const response = await send(endpoint, options);
  return response.json();
}

export const apiClient: ApiClient = {
  listStories: () =>
    request<StorySummary[]>('/stories'),

  createStory: (prompt) =>
    request<CreateStoryResponse>('/stories', {
      method: 'POST',
      body: JSON.stringify({ prompt }),
    }),

  getStory: (storyId) =>
    request<StoryRecord>(`/stories/${storyId}`),

  deleteStory: async (storyId) => {
    await send(`/stories/${storyId}`, { method: 'DELETE' });
  },

  getOutline: (storyId) =>
    request<OutlineResponseEntry[]>(`/stories/${storyId}/outline`),

  getValidation: (storyId) =>
    request<ValidationResponse>(`/stories/${storyId}/validation`),

  addBranches: (storyId, data) =>
    request<BranchResponse>(`/stories/${storyId}/branches`, {
      method: 'POST',
      body: JSON.stringify(data),
    }),

  exportStory: (storyId) =>
    request<StoryExport>(`/stories/${storyId}/export`),

  importStory: (data) =>
    request<StoryRecord>('/stories/import', {
      method: 'POST',
      body: JSON.stringify(data),
    }),
};
