import type { BranchMode, StoryNode } from '@branching-stories/shared';

// Served when every generation attempt fails, so the reader always gets a usable tree
export function fallbackInitialStory(): StoryNode {
  const beats: Array<[string, string]> = [
    ["Student's Day", 'A day in the life of a student, told as a simple linear story.'],
    ['Morning Begins', 'The student starts the day with their morning routine.'],
    ['Heading to School', 'After getting ready, the student heads off to school.'],
    ['First Class', 'The student settles in for the first class of the day.'],
    ['End of Day', 'The student finishes the day and heads home.'],
  ];

  return beats.reduceRight<StoryNode | null>(
    (child, [name, description]) => ({
      name,
      description,
      children: child ? [child] : [],
    }),
    null
  ) ?? { name: "Student's Day", description: '', children: [] };
}

function fallbackChain(title: string, description: string, branchLength: number): StoryNode {
  const length = Math.max(1, branchLength);
  let tail: StoryNode | null = null;

  for (let position = length; position >= 1; position--) {
    let node: StoryNode;
    if (position === 1) {
      node = { name: title, description, children: [] };
    } else if (position === length) {
      node = {
        name: 'Final Node in Branch',
        description: 'The conclusion of this branch of the story.',
        children: [],
      };
    } else {
      node = {
        name: `Node ${position} in Branch`,
        description: 'The story continues along this branch...',
        children: [],
      };
    }
    if (tail) node.children.push(tail);
    tail = node;
  }

  return tail ?? { name: title, description, children: [] };
}

export function fallbackBranches(branchLength: number, mode: BranchMode): StoryNode[] {
  const options = [
    fallbackChain('Option A', 'This is the first possible branch of the story.', branchLength),
    fallbackChain('Option B', 'This is the second possible branch of the story.', branchLength),
  ];
  return mode === 'single' ? options.slice(0, 1) : options;
}
