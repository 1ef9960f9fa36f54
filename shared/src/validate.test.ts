import { describe, it, expect } from 'vitest';
import { validateImportedStory, validateStory } from './validate.js';
import type { StoryNode } from './types.js';

function chain(): StoryNode {
  return {
    name: 'Start',
    description: '',
    children: [
      {
        name: 'Middle',
        description: '',
        children: [{ name: 'End', description: '', children: [] }],
      },
    ],
  };
}

describe('validateStory', () => {
  it('accepts a plain linear story', () => {
    expect(validateStory(chain())).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('accepts a merge node pointing forward on the main line', () => {
    const story = chain();
    story.children.push({
      name: 'Detour',
      description: '',
      children: [{ name: 'Merge back to: End', description: '', children: [], mergeTarget: [0, 0] }],
    });

    expect(validateStory(story).valid).toBe(true);
  });

  it('reports dangling merge targets and empty names', () => {
    const story = chain();
    story.children[0].name = '  ';
    story.children.push({ name: 'Lost', description: '', children: [], mergeTarget: [4] });

    const result = validateStory(story);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'Node [0]: name is empty',
      'Node [1]: merge target [4] does not exist',
    ]);
  });

  it('reports merge nodes that carry children', () => {
    const story = chain();
    story.children[0].children[0].mergeTarget = [];
    story.children[0].children[0].children.push({ name: 'Extra', description: '', children: [] });

    const result = validateStory(story);

    expect(result.errors).toEqual(['Node [0, 0]: merge node "End" has 1 children']);
    expect(result.warnings).toEqual([
      'Node [0, 0]: merges back to its own ancestor "Start", so the story loops',
    ]);
  });

  it('warns when a merge points at another merge node', () => {
    const story = chain();
    story.children.push(
      { name: 'A', description: '', children: [], mergeTarget: [0] },
      { name: 'B', description: '', children: [], mergeTarget: [1] }
    );

    const result = validateStory(story);

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['Node [2]: merge target "A" is itself a merge node']);
  });
});

describe('validateImportedStory', () => {
  it('reports nodes that arrive without a name', () => {
    const { root, validation } = validateImportedStory({
      name: 'Start',
      children: [{ description: 'no name' }, { title: 'Titled', children: [{ name: '  ' }] }],
    });

    expect(root.children[0].name).toBe('Unnamed Node');
    expect(validation).toEqual({
      valid: false,
      errors: ['Node [0]: name is empty', 'Node [1, 0]: name is empty'],
      warnings: [],
    });
  });

  it('flags a root that is not an object', () => {
    expect(validateImportedStory('just text').validation.errors).toEqual(['Node root: name is empty']);
  });

  it('accepts a named tree and keeps structural checks', () => {
    const { validation } = validateImportedStory({
      name: 'Start',
      children: [{ name: 'Merge back to: Nowhere', mergeTarget: [7] }],
    });

    expect(validation.errors).toEqual(['Node [0]: merge target [7] does not exist']);
  });
});
