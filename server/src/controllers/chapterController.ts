import type { NextFunction, Request, Response } from 'express';
import { parseBody } from '../middleware/validate';
import { chapterApproveSchema, chapterNextSchema, chapterRevisionSchema } from '../validators/chapter';
import { getOrchestrator, projectNameParam } from './shared';

export const writeNextChapter = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { instructions } = parseBody(chapterNextSchema, req);
    const result = await getOrchestrator(req).writeNext(projectNameParam(req), instructions);
    res.status(result.committed ? 201 : 200).json(result);
  } catch (error) {
    next(error);
  }
};

export const approveChapter = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { override } = parseBody(chapterApproveSchema, req);
    const result = await getOrchestrator(req).approveChapter(projectNameParam(req), { override });
    res.status(201).json(result);
  } catch (error) {
    next(error);
  }
};

export const requestChapterRevision = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { feedback } = parseBody(chapterRevisionSchema, req);
    const result = await getOrchestrator(req).requestRevision(projectNameParam(req), feedback);
    res.json(result);
  } catch (error) {
    next(error);
  }
};
