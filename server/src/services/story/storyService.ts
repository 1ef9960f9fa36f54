import { randomUUID } from 'crypto';
import {
  countNodes,
  EXPORT_FORMAT,
  EXPORT_VERSION,
  formatPath,
  outlineStory,
  storyStats,
  validateImportedStory,
  validateStory,
  type BranchRequest,
  type BranchResponse,
  type CreateStoryResponse,
  type OutlineResponseEntry,
  type StoryExport,
  type StoryRecord,
  type StorySummary,
  type ValidationResponse,
  type ValidationResult,
} from '@branching-stories/shared';
import type { StoryRepository } from '../../models/index.js';
import logger from '../../utils/logger.js';
import type { StoryGenerator } from '../ai/storyGeneration/index.js';
import { attachBranches, buildBranchPrompt, finalizeBranch, resolveBranchRequest } from './branching.js';

export interface ImportDocument {
  title?: string;
  root: unknown;
}

export type ImportResult =
  | { ok: true; story: StoryRecord }
  | { ok: false; validation: ValidationResult };

export class StoryService {
  // Tail of the pending extends per story; each waits for the one before it
  private readonly storyLocks = new Map<string, Promise<void>>();

  constructor(
    private readonly repository: StoryRepository,
    private readonly generator: StoryGenerator,
    private readonly now: () => Date = () => new Date(),
    private readonly newId: () => string = randomUUID
  ) {}

  get canGenerate(): boolean {
    return this.generator.isAvailable;
  }

  async listSummaries(): Promise<StorySummary[]> {
    const stories = await this.repository.list();
    return stories.map(story => ({
      id: story.id,
      title: story.title,
      nodeCount: countNodes(story.root),
      updatedAt: story.updatedAt,
    }));
  }

  async get(id: string): Promise<StoryRecord | null> {
    return this.repository.get(id);
  }

  async delete(id: string): Promise<boolean> {
    const deleted = await this.repository.delete(id);
    if (deleted) {
      logger.info('STORIES', `Deleted story ${id}`);
    }
    return deleted;
  }

  /**
   * One-shot flow: generate the linear main storyline and store it.
   */
  async createStory(prompt: string): Promise<CreateStoryResponse> {
    logger.info('STORIES', `Creating story from prompt: "${prompt.slice(0, 80)}"`);

    const outcome = await this.generator.generateInitialStory(prompt);
    const timestamp = this.now().toISOString();
    const story: StoryRecord = {
      id: this.newId(),
      title: outcome.result.name,
      prompt,
      root: outcome.result,
      provider: outcome.provider,
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    await this.repository.put(story);
    logger.info('STORIES', `Created story ${story.id} "${story.title}" via ${outcome.provider}`);

    return { story, usedFallback: outcome.usedFallback };
  }

  /**
   * Generate branches from a node and attach them, finishing each one with a
   * merge pointer, an alternate ending or nothing. Returns null for an unknown story.
   */
  async extendStory(id: string, request: BranchRequest): Promise<BranchResponse | null> {
    return this.withStoryLock(id, () => this.extendUnlocked(id, request));
  }

  private async extendUnlocked(id: string, request: BranchRequest): Promise<BranchResponse | null> {
    const story = await this.repository.get(id);
    if (!story) return null;

    const resolved = resolveBranchRequest(story.root, request);
    const prompt = buildBranchPrompt(resolved, request.ending.kind, request.branchLength);

    logger.info(
      'STORIES',
      `Extending ${id} from [${request.sourcePath.join(', ')}] (${request.mode}, ${request.ending.kind}, length ${request.branchLength})`
    );

    const outcome = await this.generator.generateBranches({
      prompt,
      branchLength: request.branchLength,
      mode: request.mode,
      ending: request.ending.kind,
      achievements: request.achievements,
    });

    const finalizeOptions = {
      ending: request.ending.kind,
      branchLength: request.branchLength,
      achievements: request.achievements,
      target: resolved.target,
    };
    const branches = outcome.result.map(branch => finalizeBranch(branch, finalizeOptions));
    const attached = attachBranches(story.root, request.sourcePath, branches, finalizeOptions);

    const updated: StoryRecord = {
      ...story,
      root: attached.root,
      updatedAt: this.now().toISOString(),
    };
    await this.repository.put(updated, story.updatedAt);

    return {
      story: updated,
      added: attached.added,
      originalCount: attached.originalCount,
      message: attached.message,
      usedFallback: outcome.usedFallback,
    };
  }

  async outline(id: string): Promise<OutlineResponseEntry[] | null> {
    const story = await this.repository.get(id);
    if (!story) return null;
    return outlineStory(story.root).map(entry => ({ ...entry, pathKey: formatPath(entry.path) }));
  }

  async validation(id: string): Promise<ValidationResponse | null> {
    const story = await this.repository.get(id);
    if (!story) return null;
    return { ...validateStory(story.root), stats: storyStats(story.root) };
  }

  async exportStory(id: string): Promise<StoryExport | null> {
    const story = await this.repository.get(id);
    if (!story) return null;
    return {
      format: EXPORT_FORMAT,
      version: EXPORT_VERSION,
      title: story.title,
      root: story.root,
      exportedAt: this.now().toISOString(),
    };
  }

  async importStory(document: ImportDocument): Promise<ImportResult> {
    const { root, validation } = validateImportedStory(document.root);
    if (!validation.valid) {
      logger.warn('STORIES', 'Rejected story import', validation.errors);
      return { ok: false, validation };
    }

    const timestamp = this.now().toISOString();
    const story: StoryRecord = {
      id: this.newId(),
      title: document.title?.trim() || root.name,
      prompt: '',
      root,
      provider: 'import',
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    await this.repository.put(story);
    logger.info('STORIES', `Imported story ${story.id} "${story.title}"`);

    return { ok: true, story };
  }

  private async withStoryLock<T>(id: string, task: () => Promise<T>): Promise<T> {
    const previous = this.storyLocks.get(id) ?? Promise.resolve();
    const run = previous.then(task);
    // Failures reach the caller through `run`; the queue only orders the work
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.storyLocks.set(id, tail);

    try {
      return await run;
    } finally {
      if (this.storyLocks.get(id) === tail) {
        this.storyLocks.delete(id);
      }
    }
  }
}
