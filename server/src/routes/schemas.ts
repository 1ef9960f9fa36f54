import { z } from 'zod';
import {
  DEFAULT_BRANCH_LENGTH,
  EXPORT_FORMAT,
  EXPORT_VERSION,
  MAX_BRANCH_LENGTH,
  MIN_BRANCH_LENGTH,
} from '@branching-stories/shared';

const nodePathSchema = z.array(z.number().int().min(0));

export const createStorySchema = z.object({
  prompt: z.string().trim().min(1, 'prompt is required').max(4000),
});

export const branchRequestSchema = z.object({
  sourcePath: nodePathSchema,
  ending: z
    .discriminatedUnion('kind', [
      z.object({ kind: z.literal('merge'), targetPath: nodePathSchema }),
      z.object({ kind: z.literal('alternate') }),
      z.object({ kind: z.literal('open') }),
    ])
    .default({ kind: 'alternate' }),
  branchLength: z
    .number()
    .int()
    .min(MIN_BRANCH_LENGTH)
    .max(MAX_BRANCH_LENGTH)
    .default(DEFAULT_BRANCH_LENGTH),
  mode: z.enum(['single', 'multiple']).default('single'),
  achievements: z.boolean().default(true),
  instructions: z.string().max(4000).optional(),
});

export const importStorySchema = z.object({
  format: z.literal(EXPORT_FORMAT).optional(),
  version: z.literal(EXPORT_VERSION).optional(),
  title: z.string().optional(),
  root: z.record(z.unknown()),
});
