import type { Request } from 'express';
import PhaseOrchestrator from '../services/phaseOrchestrator';
import ExportService from '../services/exportService';
import ApiError from '../utils/ApiError';

export function getOrchestrator(req: Request): PhaseOrchestrator {
  const service: unknown = req.app.get('orchestrator');
  if (!(service instanceof PhaseOrchestrator)) {
    throw new ApiError(500, 'Orchestrator is not available', undefined, 'ORCHESTRATOR_UNAVAILABLE');
  }
  return service;
}

export function getExportService(req: Request): ExportService {
  const service: unknown = req.app.get('exportService');
  if (!(service instanceof ExportService)) {
    throw new ApiError(500, 'Export service is not available', undefined, 'EXPORT_SERVICE_UNAVAILABLE');
  }
  return service;
}

export function projectNameParam(req: Request): string {
  const name = req.params.name?.trim();
  if (!name) {
    throw new ApiError(400, 'Project name is required', undefined, 'VALIDATION_FAILED');
  }
  return name;
}

/** Operators number chapters from 1; the store indexes them from 0. */
export function toChapterIndex(chapterNumber: number | undefined): number | undefined {
  return chapterNumber === undefined ? undefined : chapterNumber - 1;
}
