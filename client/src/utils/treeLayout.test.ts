import { describe, it, expect } from 'vitest';
import type { StoryNode } from '@branching-stories/shared';
import { curvePath, initialView, layoutStory, nodeClasses } from './treeLayout';

function leaf(name: string, extra: Partial<StoryNode> = {}): StoryNode {
  return { name, description: '', children: [], ...extra };
}

// Root with two options; the first loops back to the second through a merge node
const story: StoryNode = {
  name: 'Crossroads',
  description: '',
  children: [
    { name: 'Forest Path', description: '', children: [leaf('Merge back to: River', { mergeTarget: [1] })] },
    leaf('River', { achievement: { type: 'Achievement', title: 'Swimmer', description: '' } }),
  ],
};

describe('curvePath', () => {
  it('bends vertically between two points', () => {
    expect(curvePath({ x: 0, y: 0 }, { x: 10, y: 110 }, 50)).toBe('M0,0C0,50 10,60 10,110');
  });
});

describe('nodeClasses', () => {
  it('marks leaves, merges and achievements', () => {
    expect(nodeClasses(story)).toEqual(['node', 'node--internal']);
    expect(nodeClasses(leaf('M', { mergeTarget: [0] }))).toEqual(['node', 'node--leaf', 'merge-node']);
    expect(nodeClasses(story.children[1])).toEqual(['node', 'node--leaf', 'achievement-node']);
  });
});

describe('layoutStory', () => {
  it('stacks a linear story straight down', () => {
    const layout = layoutStory({ name: 'A', description: '', children: [leaf('B')] });

    expect(layout.nodes.map(n => [n.key, n.x, n.y])).toEqual([
      ['', 0, 0],
      ['0', 0, 110],
    ]);
    expect(layout.links).toEqual([{ key: '>0', kind: 'tree', d: 'M0,0C0,50 0,60 0,110' }]);
  });

  it('spreads siblings one cell apart and keys nodes by path', () => {
    const layout = layoutStory(story);
    const byKey = new Map(layout.nodes.map(n => [n.key, n]));

    expect(byKey.get('0')?.x).toBe(-90);
    expect(byKey.get('1')?.x).toBe(90);
    expect(byKey.get('0.0')?.y).toBe(220);
    expect(byKey.get('0.0')?.path).toEqual([0, 0]);
    expect(layout.bounds).toEqual({ minX: -90, maxX: 90, minY: 0, maxY: 220 });
  });

  it('draws a dashed-link entry from each merge node to its target', () => {
    const layout = layoutStory(story);

    expect(layout.links.filter(l => l.kind === 'merge')).toEqual([
      { key: '0.0~1', kind: 'merge', d: 'M-90,220C-90,320 90,10 90,110' },
    ]);
  });

  it('skips merge links whose target is gone', () => {
    const layout = layoutStory({ name: 'A', description: '', children: [leaf('M', { mergeTarget: [4] })] });
    expect(layout.links.map(l => l.kind)).toEqual(['tree']);
  });

  it('truncates long labels', () => {
    const layout = layoutStory({ name: 'A', description: '', children: [leaf('An extremely long node title')] });

    expect(layout.nodes[1].label).toBe('An extremely long ...');
  });

  it('does not depend on which node is selected', () => {
    const first = layoutStory(story);
    const second = layoutStory(story);

    expect(second).toEqual(first);
    expect(first.nodes.every(n => !n.classes.includes('selected-node'))).toBe(true);
  });
});

describe('initialView', () => {
  const bounds = { minX: -90, maxX: 270, minY: 0, maxY: 220 };

  it('centers a fresh tree below the top margin', () => {
    expect(initialView(null, bounds, 800, 50)).toEqual({ x: 310, y: 50, k: 1 });
  });

  it('keeps the pan and zoom the user left the view at', () => {
    const saved = { x: 12, y: -40, k: 1.5 };
    expect(initialView(saved, bounds, 800, 50)).toBe(saved);
  });
});
