import type {
  Achievement,
  NodePath,
  OutlineEntry,
  StoryNode,
  StoryStats,
} from './types.js';

export type StoryTreeErrorCode = 'NODE_NOT_FOUND' | 'TARGET_NOT_FOUND';

export class StoryTreeError extends Error {
  constructor(
    public readonly code: StoryTreeErrorCode,
    public readonly path: NodePath,
    message: string
  ) {
    super(message);
    this.name = 'StoryTreeError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function toPath(value: unknown): NodePath | undefined {
  if (!Array.isArray(value)) return undefined;
  const path: NodePath = [];
  for (const item of value) {
    if (typeof item !== 'number' || !Number.isInteger(item) || item < 0) {
      return undefined;
    }
    path.push(item);
  }
  return path;
}

function toAchievement(value: unknown): Achievement | undefined {
  if (!isRecord(value)) return undefined;
  const title = nonEmptyString(value.title);
  const description = typeof value.description === 'string' ? value.description : undefined;
  if (!title || description === undefined) return undefined;
  return { type: 'Achievement', title, description };
}

/**
 * Coerce loosely-shaped JSON (model output, imports, older exports) into a StoryNode.
 * Accepts `title`/`text` as aliases and the snake_case `merge_target` key.
 */
// Name a raw node carries itself, before any default is filled in
export function rawNodeName(raw: unknown): string | undefined {
  if (!isRecord(raw)) return undefined;
  return nonEmptyString(raw.name) ?? nonEmptyString(raw.title);
}

export function normalizeNode(raw: unknown): StoryNode {
  const source = isRecord(raw) ? raw : {};

  const node: StoryNode = {
    name: rawNodeName(source) ?? 'Unnamed Node',
    description: nonEmptyString(source.description) ?? nonEmptyString(source.text) ?? '',
    children: Array.isArray(source.children) ? source.children.map(normalizeNode) : [],
  };

  const achievement = toAchievement(source.achievement);
  if (achievement) {
    node.achievement = achievement;
  }

  const mergeTarget = toPath(source.mergeTarget ?? source.merge_target);
  if (mergeTarget) {
    node.mergeTarget = mergeTarget;
  }

  return node;
}

export function cloneNode(node: StoryNode): StoryNode {
  const copy: StoryNode = {
    name: node.name,
    description: node.description,
    children: node.children.map(cloneNode),
  };
  if (node.achievement) copy.achievement = { ...node.achievement };
  if (node.mergeTarget) copy.mergeTarget = [...node.mergeTarget];
  return copy;
}

export function getNodeByPath(root: StoryNode, path: NodePath): StoryNode | null {
  let current = root;
  for (const index of path) {
    const next = current.children[index];
    if (!next) return null;
    current = next;
  }
  return current;
}

export function isMergeNode(node: StoryNode): boolean {
  return node.mergeTarget !== undefined;
}

// Depth-first, parents before children
export function walkStory(
  root: StoryNode,
  visit: (node: StoryNode, path: NodePath) => void
): void {
  const step = (node: StoryNode, path: NodePath) => {
    visit(node, path);
    node.children.forEach((child, i) => step(child, [...path, i]));
  };
  step(root, []);
}

/**
 * Flatten the tree into select-box entries. Each label is the node name
 * indented with one arrow per level.
 */
export function outlineStory(root: StoryNode): OutlineEntry[] {
  const entries: OutlineEntry[] = [];
  walkStory(root, (node, path) => {
    entries.push({
      path,
      depth: path.length,
      name: node.name,
      label: '→ '.repeat(path.length) + node.name,
    });
  });
  return entries;
}

/**
 * Return a copy of the tree with `nodes` appended after the existing children
 * of the node at `path`. Existing paths are unchanged.
 */
export function appendChildren(root: StoryNode, path: NodePath, nodes: StoryNode[]): StoryNode {
  const copy = cloneNode(root);
  const target = getNodeByPath(copy, path);
  if (!target) {
    throw new StoryTreeError('NODE_NOT_FOUND', path, `No story node at path [${path.join(', ')}]`);
  }
  target.children.push(...nodes.map(cloneNode));
  return copy;
}

export function countNodes(root: StoryNode): number {
  let count = 0;
  walkStory(root, () => {
    count++;
  });
  return count;
}

export function collectAchievements(root: StoryNode): Array<{ path: NodePath; achievement: Achievement }> {
  const found: Array<{ path: NodePath; achievement: Achievement }> = [];
  walkStory(root, (node, path) => {
    if (node.achievement) {
      found.push({ path, achievement: node.achievement });
    }
  });
  return found;
}

export function storyStats(root: StoryNode): StoryStats {
  const stats: StoryStats = {
    nodeCount: 0,
    endingCount: 0,
    mergeCount: 0,
    achievementCount: 0,
    maxDepth: 0,
  };

  walkStory(root, (node, path) => {
    stats.nodeCount++;
    stats.maxDepth = Math.max(stats.maxDepth, path.length);
    if (node.achievement) stats.achievementCount++;
    if (isMergeNode(node)) {
      stats.mergeCount++;
    } else if (node.children.length === 0) {
      stats.endingCount++;
    }
  });

  return stats;
}

export function formatPath(path: NodePath): string {
  return path.join('.');
}

export function parsePath(key: string): NodePath | null {
  if (key === '') return [];
  const parts = key.split('.');
  const path: NodePath = [];
  for (const part of parts) {
    if (!/^\d+$/.test(part)) return null;
    path.push(parseInt(part, 10));
  }
  return path;
}

export function isAncestorPath(ancestor: NodePath, path: NodePath): boolean {
  return ancestor.length < path.length && ancestor.every((index, i) => path[i] === index);
}
