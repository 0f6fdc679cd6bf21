import { Router } from 'express';
import {
  cancelGeneration,
  createProject,
  deleteProject,
  getChangeLog,
  getProjectStatus,
  getSummary,
  listProjects,
  approveOutline,
  reopenPhase,
  requestCritique,
  reviseOutline,
  runAnalysis,
  submitAnswers,
} from '../controllers/projectController';
import { approveChapter, requestChapterRevision, writeNextChapter } from '../controllers/chapterController';
import { addCharacter, addWorldFact, updateThread } from '../controllers/entityController';
import { exportProject } from '../controllers/exportController';
import { createGenerationLimiter } from '../middleware/rateLimiters';

const router = Router();

const generationLimiter = createGenerationLimiter('generation');

router.get('/projects', listProjects);
router.post('/projects', generationLimiter, createProject);
router.get('/projects/:name/status', getProjectStatus);
router.delete('/projects/:name', deleteProject);

router.post('/projects/:name/analysis', generationLimiter, runAnalysis);
router.post('/projects/:name/answers', generationLimiter, submitAnswers);
router.post('/projects/:name/outline/revise', generationLimiter, reviseOutline);
router.post('/projects/:name/outline/approve', approveOutline);

router.post('/projects/:name/chapters/next', generationLimiter, writeNextChapter);
router.post('/projects/:name/chapters/approve', generationLimiter, approveChapter);
router.post('/projects/:name/chapters/revise', generationLimiter, requestChapterRevision);

router.post('/projects/:name/critique', generationLimiter, requestCritique);
router.post('/projects/:name/reopen', generationLimiter, reopenPhase);
router.post('/projects/:name/cancel', cancelGeneration);

router.get('/projects/:name/summary', getSummary);
router.get('/projects/:name/log', getChangeLog);
router.get('/projects/:name/export', exportProject);

router.post('/projects/:name/characters', addCharacter);
router.post('/projects/:name/facts', addWorldFact);
router.patch('/projects/:name/threads/:threadId', updateThread);

export default router;
