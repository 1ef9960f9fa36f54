import type { Achievement, BranchEnding, BranchMode, StoryNode } from './types.js';

const MAX_LABEL_LENGTH = 20;

export function truncateLabel(name: string): string {
  return name.length > MAX_LABEL_LENGTH ? name.substring(0, MAX_LABEL_LENGTH - 2) + '...' : name;
}

export type NodeFooter =
  | { kind: 'merge'; text: string }
  | { kind: 'options'; options: string[] }
  | { kind: 'endpoint'; text: string };

export interface NodeDetails {
  title: string;
  description: string;
  achievement?: Achievement;
  footer: NodeFooter;
}

// What the details panel shows for a selected node
export function describeNode(node: StoryNode): NodeDetails {
  let footer: NodeFooter;
  if (node.mergeTarget) {
    footer = { kind: 'merge', text: 'This node merges back to the main storyline.' };
  } else if (node.children.length > 0) {
    footer = { kind: 'options', options: node.children.map(child => child.name) };
  } else {
    footer = { kind: 'endpoint', text: 'This is an endpoint of the story.' };
  }

  return {
    title: node.name || 'Unnamed Node',
    description: node.description || 'No description available.',
    achievement: node.achievement,
    footer,
  };
}

/**
 * Pre-filled request text for the branch builder, e.g.
 * "Create a branch from 'Lunch Break' that eventually leads to 'Final Bell'".
 */
export function defaultBranchInstructions(
  sourceName: string,
  mode: BranchMode,
  ending: BranchEnding['kind'],
  targetName?: string
): string {
  const single = mode === 'single';
  let text = single ? `Create a branch from '${sourceName}'` : `Create branches from '${sourceName}'`;

  if (ending === 'merge' && targetName) {
    text += single
      ? ` that eventually leads to '${targetName}'`
      : ` that eventually lead to '${targetName}'`;
  } else if (ending === 'alternate') {
    text += single ? ' with an alternative ending' : ' with alternative endings';
  }

  return text;
}
