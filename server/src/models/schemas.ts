import { z } from 'zod';
import { normalizeNode } from '@branching-stories/shared';

export const storySourceSchema = z.enum(['anthropic', 'openai', 'gemini', 'fallback', 'import']);

// Stored records are re-read through this so older or hand-edited items still load
export const storyRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  prompt: z.string(),
  root: z.unknown().transform(value => normalizeNode(value)),
  provider: storySourceSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
});
