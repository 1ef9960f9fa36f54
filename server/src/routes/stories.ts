import { Router, Request, Response } from 'express';
import { StoryTreeError } from '@branching-stories/shared';
import type { ZodError } from 'zod';
import { StoryConflictError } from '../models/index.js';
import type { StoryService } from '../services/story/storyService.js';
import logger from '../utils/logger.js';
import { branchRequestSchema, createStorySchema, importStorySchema } from './schemas.js';

function badRequest(res: Response, error: ZodError) {
  return res.status(400).json({ error: 'Invalid request', details: error.issues });
}

function notFound(res: Response) {
  return res.status(404).json({ error: 'Story not found' });
}

function noProvider(res: Response) {
  return res.status(503).json({ error: 'No AI provider configured' });
}

function exportFilename(title: string): string {
  const slug = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return `${slug || 'story'}.json`;
}

export function createStoriesRouter(service: StoryService): Router {
  const router = Router();

  // List stories, most recently updated first
  router.get('/', async (req: Request, res: Response) => {
    try {
      return res.json(await service.listSummaries());
    } catch (error) {
      logger.error('ROUTES', 'List stories error', error);
      return res.status(500).json({ error: 'Failed to list stories' });
    }
  });

  // Create the main storyline from a prompt
  router.post('/', async (req: Request, res: Response) => {
    const body = createStorySchema.safeParse(req.body);
    if (!body.success) {
      return badRequest(res, body.error);
    }
    if (!service.canGenerate) {
      return noProvider(res);
    }

    try {
      const result = await service.createStory(body.data.prompt);
      return res.status(201).json(result);
    } catch (error) {
      logger.error('ROUTES', 'Create story error', error);
      return res.status(500).json({ error: 'Failed to create story' });
    }
  });

  // Import a previously exported story
  router.post('/import', async (req: Request, res: Response) => {
    const body = importStorySchema.safeParse(req.body);
    if (!body.success) {
      return badRequest(res, body.error);
    }

    try {
      const result = await service.importStory(body.data);
      if (!result.ok) {
        return res.status(422).json({
          error: 'Story failed validation',
          details: result.validation.errors,
        });
      }
      return res.status(201).json(result.story);
    } catch (error) {
      logger.error('ROUTES', 'Import story error', error);
      return res.status(500).json({ error: 'Failed to import story' });
    }
  });

  router.get('/:id', async (req: Request, res: Response) => {
    try {
      const story = await service.get(req.params.id);
      return story ? res.json(story) : notFound(res);
    } catch (error) {
      logger.error('ROUTES', 'Get story error', error);
      return res.status(500).json({ error: 'Failed to get story' });
    }
  });

  router.delete('/:id', async (req: Request, res: Response) => {
    try {
      const deleted = await service.delete(req.params.id);
      return deleted ? res.status(204).end() : notFound(res);
    } catch (error) {
      logger.error('ROUTES', 'Delete story error', error);
      return res.status(500).json({ error: 'Failed to delete story' });
    }
  });

  // Flattened node list for source/destination pickers
  router.get('/:id/outline', async (req: Request, res: Response) => {
    try {
      const outline = await service.outline(req.params.id);
      return outline ? res.json(outline) : notFound(res);
    } catch (error) {
      logger.error('ROUTES', 'Outline error', error);
      return res.status(500).json({ error: 'Failed to build outline' });
    }
  });

  router.get('/:id/validation', async (req: Request, res: Response) => {
    try {
      const result = await service.validation(req.params.id);
      return result ? res.json(result) : notFound(res);
    } catch (error) {
      logger.error('ROUTES', 'Validation error', error);
      return res.status(500).json({ error: 'Failed to validate story' });
    }
  });

  // Grow branches from a node, optionally merging them back into the main line
  router.post('/:id/branches', async (req: Request, res: Response) => {
    const body = branchRequestSchema.safeParse(req.body);
    if (!body.success) {
      return badRequest(res, body.error);
    }
    if (!service.canGenerate) {
      return noProvider(res);
    }

    try {
      const result = await service.extendStory(req.params.id, body.data);
      return result ? res.json(result) : notFound(res);
    } catch (error) {
      if (error instanceof StoryTreeError) {
        return res.status(400).json({ error: error.message, path: error.path });
      }
      if (error instanceof StoryConflictError) {
        return res.status(409).json({ error: error.message });
      }
      logger.error('ROUTES', 'Extend story error', error);
      return res.status(500).json({ error: 'Failed to extend story' });
    }
  });

  router.get('/:id/export', async (req: Request, res: Response) => {
    try {
      const document = await service.exportStory(req.params.id);
      if (!document) {
        return notFound(res);
      }
      res.setHeader('Content-Disposition', `attachment; filename="${exportFilename(document.title)}"`);
      return res.json(document);
    } catch (error) {
      logger.error('ROUTES', 'Export story error', error);
      return res.status(500).json({ error: 'Failed to export story' });
    }
  });

  return router;
}
