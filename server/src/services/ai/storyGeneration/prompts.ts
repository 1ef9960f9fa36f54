import type { BranchGenerationOptions } from './types.js';

export const INITIAL_STORY_NODE_COUNT = 5;

export const INITIAL_STORY_SYSTEM_PROMPT = `You are a storyteller. Write a linear story with a clear beginning, middle and end.

Respond ONLY with valid JSON in this shape:
{
  "name": "Main Story Title",
  "description": "A paragraph describing the overall story and its theme.",
  "children": [
    {
      "name": "First Story Node",
      "description": "A detailed paragraph about this part of the story.",
      "children": [
        {
          "name": "Second Story Node",
          "description": "What happens next...",
          "children": []
        }
      ]
    }
  ]
}

Use EXACTLY ${INITIAL_STORY_NODE_COUNT} nodes in a single chain: every node has exactly ONE child except the last, which has none.
Do not add any branching choices yet.`;

const ACHIEVEMENT_INSTRUCTIONS = `Give the FINAL node of each branch an "achievement" object:
"achievement": {
  "type": "Achievement",
  "title": "A Creative Achievement Title",
  "description": "A congratulatory message explaining what the reader accomplished on this branch."
}
The title should be catchy and tied to what happened on the branch. The description should name the skills or values the reader showed.`;

const SINGLE_BRANCH_FORMAT = `{
  "name": "New Branch Title",
  "description": "What happens at the start of this branch.",
  "children": [
    {
      "name": "Next node in the branch",
      "description": "What happens next on this branch...",
      "children": []
    }
  ]
}`;

const MULTIPLE_BRANCH_FORMAT = `[
  {
    "name": "Option 1 Title",
    "description": "What happens at the start of this option.",
    "children": [
      { "name": "Next node in Option 1", "description": "What happens next...", "children": [] }
    ]
  },
  {
    "name": "Option 2 Title",
    "description": "What happens at the start of this option.",
    "children": [
      { "name": "Next node in Option 2", "description": "What happens next...", "children": [] }
    ]
  }
]`;

function endingInstruction(ending: BranchGenerationOptions['ending']): string {
  switch (ending) {
    case 'merge':
      return 'The final node must lead naturally back into the main story.';
    case 'alternate':
      return 'The final node must be an alternative ending that gives the story closure.';
    case 'open':
      return 'The final node may leave the story open for further choices.';
  }
}

export function buildBranchSystemPrompt(options: BranchGenerationOptions): string {
  const single = options.mode === 'single';

  const sections = [
    'You are a branching story generator.',
    single
      ? 'Respond ONLY with valid JSON describing a SINGLE new branch for an existing story.'
      : 'Respond ONLY with a valid JSON array of new branches for an existing story.',
    'Every node has a "name" (the node title), a "description" (a detailed paragraph) and a "children" array holding the next node.',
    `Format:\n${single ? SINGLE_BRANCH_FORMAT : MULTIPLE_BRANCH_FORMAT}`,
    single ? '' : 'Create 2-3 interesting and clearly distinct options.',
    `Each branch is a single chain of EXACTLY ${options.branchLength} nodes, counting its first node.`,
    endingInstruction(options.ending),
    options.achievements ? ACHIEVEMENT_INSTRUCTIONS : '',
  ];

  return sections.filter(section => section !== '').join('\n\n');
}
