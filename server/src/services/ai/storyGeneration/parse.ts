import { z } from 'zod';
import { normalizeNode, type StoryNode } from '@branching-stories/shared';
import logger from '../../../utils/logger.js';

interface RawStoryNode {
  name?: string;
  title?: string;
  description?: string;
  text?: string;
  children?: RawStoryNode[];
  achievement?: unknown;
}

// Lenient on purpose: aliases are resolved later by normalizeNode
const rawNodeSchema: z.ZodType<RawStoryNode> = z.lazy(() =>
  z
    .object({
      name: z.string().optional(),
      title: z.string().optional(),
      description: z.string().optional(),
      text: z.string().optional(),
      children: z.array(rawNodeSchema).optional(),
      achievement: z.unknown().optional(),
    })
    .refine(node => Boolean(node.name?.trim() || node.title?.trim()), {
      message: 'Story node has no name',
    })
);

const branchListSchema = z.union([
  z.array(rawNodeSchema).min(1),
  z.object({ branches: z.array(rawNodeSchema).min(1) }).transform(value => value.branches),
  z.object({ options: z.array(rawNodeSchema).min(1) }).transform(value => value.options),
  rawNodeSchema.transform(node => [node]),
]);

// Span from an opening bracket to its matching closer, or to the end when the reply was cut off
function bracketSpan(content: string, start: number): string {
  const open: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < content.length; i++) {
    const char = content[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{' || char === '[') {
      open.push(char);
    } else if (char === '}' || char === ']') {
      open.pop();
      if (open.length === 0) {
        return content.slice(start, i + 1);
      }
    }
  }

  return content.slice(start);
}

function parsesAsJson(text: string): boolean {
  for (const candidate of [text, repairJson(text)]) {
    try {
      JSON.parse(candidate);
      return true;
    } catch {
      continue;
    }
  }
  return false;
}

/**
 * Pull the JSON payload out of a model reply: the body of the first fenced code
 * block if there is one, otherwise the longest bracketed span that parses
 * (directly or after repair). Prose such as "[5 nodes]" before the payload
 * yields a shorter or unparseable span and loses to the real one.
 */
export function extractJsonText(content: string): string {
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (fenced) {
    return fenced[1].trim();
  }

  const spans: string[] = [];
  for (let i = 0; i < content.length; i++) {
    if (content[i] === '{' || content[i] === '[') {
      spans.push(bracketSpan(content, i));
    }
  }
  if (spans.length === 0) {
    return content.trim();
  }

  let best: string | null = null;
  for (const span of spans) {
    if ((best === null || span.length > best.length) && parsesAsJson(span)) {
      best = span;
    }
  }
  return best ?? spans[0];
}

/**
 * Fix the two mistakes models make most: trailing commas and output cut off
 * before the closing brackets.
 */
export function repairJson(jsonText: string): string {
  const repaired = jsonText.replace(/,(\s*[\]}])/g, '$1');

  const open: string[] = [];
  let inString = false;
  let escaped = false;

  for (const char of repaired) {
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      open.push('}');
    } else if (char === '[') {
      open.push(']');
    } else if (char === '}' || char === ']') {
      open.pop();
    }
  }

  let closing = inString ? '"' : '';
  while (open.length > 0) {
    closing += open.pop();
  }

  return repaired + closing;
}

function getJsonErrorContext(jsonText: string, error: unknown): string | null {
  if (!(error instanceof SyntaxError)) return null;
  const posMatch = error.message.match(/position (\d+)/);
  if (!posMatch) return null;
  const position = parseInt(posMatch[1], 10);
  const before = jsonText.slice(Math.max(0, position - 50), position);
  const after = jsonText.slice(position, position + 50);
  return `...${before}<<<ERROR HERE>>>${after}...`;
}

export function parseJsonResponse(content: string, label: string): unknown {
  const jsonText = extractJsonText(content);

  try {
    return JSON.parse(jsonText);
  } catch (firstError) {
    logger.warn('STORY_GEN', `Initial JSON parse failed for ${label}, attempting repair...`);
    const context = getJsonErrorContext(jsonText, firstError);
    if (context) {
      logger.warn('STORY_GEN', `Error context: ${context}`);
    }

    try {
      const result: unknown = JSON.parse(repairJson(jsonText));
      logger.info('STORY_GEN', `JSON repair successful for ${label}`);
      return result;
    } catch (secondError) {
      logger.error('STORY_GEN', `JSON parsing failed for ${label}`, {
        length: jsonText.length,
        head: jsonText.slice(0, 500),
        tail: jsonText.slice(-500),
      });
      const reason = secondError instanceof Error ? secondError.message : 'Unknown error';
      throw new Error(`JSON parsing failed for ${label}: ${reason}`);
    }
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseStoryResponse(content: string): StoryNode {
  const parsed = parseJsonResponse(content, 'initial story');
  const candidate = Array.isArray(parsed) && parsed.length === 1 ? parsed[0] : parsed;

  const result = rawNodeSchema.safeParse(candidate);
  if (!result.success) {
    throw new Error(`Story JSON has the wrong shape: ${describeIssues(result.error)}`);
  }
  return normalizeNode(result.data);
}

export function parseBranchesResponse(content: string): StoryNode[] {
  const parsed = parseJsonResponse(content, 'branches');

  const result = branchListSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Branch JSON has the wrong shape: ${describeIssues(result.error)}`);
  }
  return result.data.map(normalizeNode);
}
