import { getNodeByPath, isAncestorPath, normalizeNode, rawNodeName, walkStory } from './tree.js';
import type { StoryNode, ValidationResult } from './types.js';

function describePath(path: number[]): string {
  return path.length === 0 ? 'root' : `[${path.join(', ')}]`;
}

/**
 * Structural checks on a story tree.
 *
 * Errors make the tree unusable (dangling merge pointers, unnamed nodes).
 * Warnings flag stories that still render but loop back on themselves.
 */
export function validateStory(root: StoryNode): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  walkStory(root, (node, path) => {
    const where = describePath(path);

    if (node.name.trim() === '') {
      errors.push(`Node ${where}: name is empty`);
    }

    if (!node.mergeTarget) return;

    if (node.children.length > 0) {
      errors.push(`Node ${where}: merge node "${node.name}" has ${node.children.length} children`);
    }

    const target = getNodeByPath(root, node.mergeTarget);
    if (!target) {
      errors.push(
        `Node ${where}: merge target ${describePath(node.mergeTarget)} does not exist`
      );
      return;
    }

    if (isAncestorPath(node.mergeTarget, path)) {
      warnings.push(
        `Node ${where}: merges back to its own ancestor "${target.name}", so the story loops`
      );
    }
    if (target.mergeTarget) {
      warnings.push(`Node ${where}: merge target "${target.name}" is itself a merge node`);
    }
  });

  return { valid: errors.length === 0, errors, warnings };
}

function findUnnamed(raw: unknown, path: number[], errors: string[]): void {
  if (rawNodeName(raw) === undefined) {
    errors.push(`Node ${describePath(path)}: name is empty`);
  }
  if (typeof raw !== 'object' || raw === null || !('children' in raw) || !Array.isArray(raw.children)) {
    return;
  }
  raw.children.forEach((child: unknown, index: number) => findUnnamed(child, [...path, index], errors));
}

/**
 * Validate an uploaded tree. Names are checked on the raw input, since
 * normalizing would otherwise hide a missing one behind the default.
 */
export function validateImportedStory(raw: unknown): { root: StoryNode; validation: ValidationResult } {
  const root = normalizeNode(raw);
  const unnamed: string[] = [];
  findUnnamed(raw, [], unnamed);

  const structural = validateStory(root);
  const errors = [...unnamed, ...structural.errors];
  return {
    root,
    validation: { valid: errors.length === 0, errors, warnings: structural.warnings },
  };
}
