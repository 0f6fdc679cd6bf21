import type { NextFunction, Request, Response } from 'express';
import { parseBody } from '../middleware/validate';
import { characterCreateSchema, threadUpdateSchema, worldFactCreateSchema } from '../validators/entities';
import ApiError from '../utils/ApiError';
import { getOrchestrator, projectNameParam, toChapterIndex } from './shared';

export const addCharacter = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { firstAppearance, ...input } = parseBody(characterCreateSchema, req);
    const status = await getOrchestrator(req).addCharacter(projectNameParam(req), {
      ...input,
      firstAppearance: toChapterIndex(firstAppearance),
    });
    res.status(201).json({ project: status });
  } catch (error) {
    next(error);
  }
};

export const addWorldFact = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { establishedIn, ...input } = parseBody(worldFactCreateSchema, req);
    // 0 places the fact before the first chapter, alongside facts from planning.
    const status = await getOrchestrator(req).addWorldFact(projectNameParam(req), {
      ...input,
      establishedIn: toChapterIndex(establishedIn),
    });
    res.status(201).json({ project: status });
  } catch (error) {
    next(error);
  }
};

export const updateThread = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const threadId = req.params.threadId?.trim();
    if (!threadId) {
      throw new ApiError(400, 'Thread id is required', undefined, 'VALIDATION_FAILED');
    }
    const { status, resolvingChapter } = parseBody(threadUpdateSchema, req);
    const project = await getOrchestrator(req).updateThread(projectNameParam(req), threadId, {
      status,
      resolvingChapter: toChapterIndex(resolvingChapter),
    });
    res.json({ project });
  } catch (error) {
    next(error);
  }
};
