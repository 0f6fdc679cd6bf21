import type { NextFunction, Request, Response } from 'express';
import { parseBody, parseQuery } from '../middleware/validate';
import {
  answersSchema,
  critiqueRequestSchema,
  logQuerySchema,
  outlineReviseSchema,
  projectCreateSchema,
  reopenSchema,
  summaryQuerySchema,
} from '../validators/project';
import { getOrchestrator, projectNameParam, toChapterIndex } from './shared';

export const listProjects = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const projects = await getOrchestrator(req).listProjects();
    res.json({ projects });
  } catch (error) {
    next(error);
  }
};

export const createProject = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const orchestrator = getOrchestrator(req);
    const { analyse, ...input } = parseBody(projectCreateSchema, req);
    const created = await orchestrator.createProject(input);
    const status = analyse === false ? created : await orchestrator.analyse(input.name);
    res.status(201).json({ project: status });
  } catch (error) {
    next(error);
  }
};

export const getProjectStatus = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const status = await getOrchestrator(req).status(projectNameParam(req));
    res.json({ project: status, busy: getOrchestrator(req).isBusy(status.name) });
  } catch (error) {
    next(error);
  }
};

export const deleteProject = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    await getOrchestrator(req).deleteProject(projectNameParam(req));
    res.status(204).end();
  } catch (error) {
    next(error);
  }
};

export const runAnalysis = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const status = await getOrchestrator(req).analyse(projectNameParam(req));
    res.json({ project: status });
  } catch (error) {
    next(error);
  }
};

export const submitAnswers = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { answers } = parseBody(answersSchema, req);
    const result = await getOrchestrator(req).answerQuestions(projectNameParam(req), answers);
    res.json({ project: result.status, remainingQuestions: result.remaining });
  } catch (error) {
    next(error);
  }
};

export const reviseOutline = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { feedback } = parseBody(outlineReviseSchema, req);
    const status = await getOrchestrator(req).reviseOutline(projectNameParam(req), feedback);
    res.json({ project: status });
  } catch (error) {
    next(error);
  }
};

export const approveOutline = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const status = await getOrchestrator(req).approveOutline(projectNameParam(req));
    res.json({ project: status });
  } catch (error) {
    next(error);
  }
};

export const requestCritique = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { chapter } = parseBody(critiqueRequestSchema, req);
    const result = await getOrchestrator(req).critique(projectNameParam(req), { chapterIndex: toChapterIndex(chapter) });
    res.json({ project: result.status, review: result.review });
  } catch (error) {
    next(error);
  }
};

export const reopenPhase = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { phase, reason } = parseBody(reopenSchema, req);
    const status = await getOrchestrator(req).reopen(projectNameParam(req), phase, reason);
    res.json({ project: status });
  } catch (error) {
    next(error);
  }
};

export const cancelGeneration = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const cancelled = getOrchestrator(req).cancel(projectNameParam(req));
    res.status(cancelled ? 202 : 200).json({ cancelled });
  } catch (error) {
    next(error);
  }
};

export const getSummary = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { upto } = parseQuery(summaryQuerySchema, req);
    const summary = await getOrchestrator(req).summary(projectNameParam(req), upto === undefined ? undefined : upto - 1);
    res.json({ summary });
  } catch (error) {
    next(error);
  }
};

export const getChangeLog = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { after, limit } = parseQuery(logQuerySchema, req);
    const entries = await getOrchestrator(req).changeLog(projectNameParam(req), { afterSeq: after, limit });
    res.json({ entries });
  } catch (error) {
    next(error);
  }
};
