// Story tree types shared by the server and the client

// Child indices from the root; [] is the root itself
export type NodePath = number[];

export interface Achievement {
  type: 'Achievement';
  title: string;
  description: string;
}

export interface StoryNode {
  name: string;
  description: string;
  children: StoryNode[];
  achievement?: Achievement;
  mergeTarget?: NodePath; // set only on merge nodes, which have no children
}

export type AIProvider = 'anthropic' | 'openai' | 'gemini';
export type StorySource = AIProvider | 'fallback' | 'import';

export interface StoryRecord {
  id: string;
  title: string;
  prompt: string;
  root: StoryNode;
  provider: StorySource;
  createdAt: string;
  updatedAt: string;
}

export interface StorySummary {
  id: string;
  title: string;
  nodeCount: number;
  updatedAt: string;
}

export interface OutlineEntry {
  path: NodePath;
  depth: number;
  name: string;
  label: string;
}

export interface StoryStats {
  nodeCount: number;
  endingCount: number;
  mergeCount: number;
  achievementCount: number;
  maxDepth: number;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// Branch requests
export type BranchMode = 'single' | 'multiple';

export type BranchEnding =
  | { kind: 'merge'; targetPath: NodePath }
  | { kind: 'alternate' }
  | { kind: 'open' };

export interface BranchRequest {
  sourcePath: NodePath;
  ending: BranchEnding;
  branchLength: number;
  mode: BranchMode;
  achievements: boolean;
  instructions?: string;
}

export const MIN_BRANCH_LENGTH = 2;
export const MAX_BRANCH_LENGTH = 10;
export const DEFAULT_BRANCH_LENGTH = 3;

// Import/export document
export const EXPORT_FORMAT = 'branching-story';
export const EXPORT_VERSION = 1;

export interface StoryExport {
  format: typeof EXPORT_FORMAT;
  version: typeof EXPORT_VERSION;
  title: string;
  root: StoryNode;
  exportedAt: string;
}

// API responses
export interface CreateStoryResponse {
  story: StoryRecord;
  usedFallback: boolean;
}

export interface BranchResponse {
  story: StoryRecord;
  added: number;
  originalCount: number;
  message: string;
  usedFallback: boolean;
}

export interface OutlineResponseEntry extends OutlineEntry {
  pathKey: string;
}

export interface ValidationResponse extends ValidationResult {
  stats: StoryStats;
}
