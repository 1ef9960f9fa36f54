import {
  appendChildren,
  cloneNode,
  defaultBranchInstructions,
  getNodeByPath,
  StoryTreeError,
  type Achievement,
  type BranchEnding,
  type BranchRequest,
  type NodePath,
  type StoryNode,
} from '@branching-stories/shared';

export interface ResolvedBranchRequest {
  source: StoryNode;
  target: { node: StoryNode; path: NodePath } | null;
  instructions: string;
}

export interface FinalizeOptions {
  ending: BranchEnding['kind'];
  branchLength: number;
  achievements: boolean;
  target: { node: StoryNode; path: NodePath } | null;
}

export interface AttachResult {
  root: StoryNode;
  added: number;
  originalCount: number;
  message: string;
}

/**
 * Look up the source and merge target of a branch request and fill in the
 * default instructions. Throws StoryTreeError when a path does not resolve.
 */
export function resolveBranchRequest(root: StoryNode, request: BranchRequest): ResolvedBranchRequest {
  const source = getNodeByPath(root, request.sourcePath);
  if (!source) {
    throw new StoryTreeError(
      'NODE_NOT_FOUND',
      request.sourcePath,
      `Source node [${request.sourcePath.join(', ')}] does not exist`
    );
  }

  let target: ResolvedBranchRequest['target'] = null;
  if (request.ending.kind === 'merge') {
    const { targetPath } = request.ending;
    const node = getNodeByPath(root, targetPath);
    if (!node) {
      throw new StoryTreeError(
        'TARGET_NOT_FOUND',
        targetPath,
        `Merge target [${targetPath.join(', ')}] does not exist`
      );
    }
    target = { node, path: targetPath };
  }

  const instructions =
    request.instructions?.trim() ||
    defaultBranchInstructions(source.name, request.mode, request.ending.kind, target?.node.name);

  return { source, target, instructions };
}

// The user message sent alongside the branch system prompt
export function buildBranchPrompt(
  resolved: ResolvedBranchRequest,
  ending: BranchEnding['kind'],
  branchLength: number
): string {
  const blocks = [
    `Source node: ${resolved.source.name}\nDescription: ${resolved.source.description}`,
  ];

  if (resolved.target) {
    blocks.push(
      `Destination node: ${resolved.target.node.name}\nDescription: ${resolved.target.node.description}`
    );
  }

  blocks.push(resolved.instructions);

  if (ending === 'merge') {
    blocks.push(
      `Create a branch that naturally leads to the destination node after ${branchLength} steps.`
    );
  } else if (ending === 'alternate') {
    blocks.push('Create an alternative ending that provides closure to the story.');
  }

  return blocks.join('\n\n');
}

function stripGenerated(node: StoryNode, keepAchievements: boolean): void {
  delete node.mergeTarget;
  if (!keepAchievements) {
    delete node.achievement;
  }
  node.children.forEach(child => stripGenerated(child, keepAchievements));
}

function completedAchievement(name: string): Achievement {
  return {
    type: 'Achievement',
    title: `Completed: ${name}`,
    description: `Congratulations! You completed the '${name}' storyline and demonstrated excellent decision-making skills.`,
  };
}

function alternateEndingAchievement(name: string): Achievement {
  return {
    type: 'Achievement',
    title: `Alternate Ending: ${name}`,
    description:
      "Congratulations! You've discovered an alternate ending to the story. Your unique choices led to this special conclusion.",
  };
}

export function createMergeNode(target: StoryNode, targetPath: NodePath): StoryNode {
  return {
    name: `Merge back to: ${target.name}`,
    description: `This path merges back to the main storyline at '${target.name}'.`,
    children: [],
    mergeTarget: [...targetPath],
  };
}

/**
 * Shape one generated branch for insertion.
 *
 * The first-child chain is followed to its last node, at most branchLength
 * nodes deep; anything below that is cut. The last node then gets the ending:
 * a merge pointer, an alternate-ending achievement, or nothing for open branches.
 */
export function finalizeBranch(branch: StoryNode, options: FinalizeOptions): StoryNode {
  const copy = cloneNode(branch);
  stripGenerated(copy, options.achievements);

  let last = copy;
  let depth = 0;
  while (last.children.length > 0 && depth < options.branchLength - 1) {
    last = last.children[0];
    depth++;
  }
  last.children = [];

  if (options.ending === 'merge' && options.target) {
    if (options.achievements && !last.achievement) {
      last.achievement = completedAchievement(last.name);
    }
    last.children = [createMergeNode(options.target.node, options.target.path)];
  } else if (options.ending === 'alternate') {
    if (options.achievements && !last.achievement) {
      last.achievement = alternateEndingAchievement(last.name);
    }
  }

  return copy;
}

export function attachBranches(
  root: StoryNode,
  sourcePath: NodePath,
  branches: StoryNode[],
  options: FinalizeOptions
): AttachResult {
  const updated = appendChildren(root, sourcePath, branches);
  const source = getNodeByPath(updated, sourcePath);
  const total = source ? source.children.length : branches.length;
  const originalCount = total - branches.length;

  let mergeMessage = '';
  if (options.ending === 'merge' && options.target) {
    mergeMessage = ` They will merge back to '${options.target.node.name}' after ${options.branchLength} steps.`;
  } else if (options.ending === 'alternate') {
    mergeMessage = ` They will create alternative endings after ${options.branchLength} steps.`;
  }

  const message =
    originalCount > 0
      ? `Successfully added ${branches.length} new branches to the story while preserving the original ${originalCount} path(s)!${mergeMessage}`
      : `Successfully added ${branches.length} new branches to the story!${mergeMessage}`;

  return { root: updated, added: branches.length, originalCount, message };
}
