import { Router } from 'express';
import type { InterviewController } from '../controllers/interviewController';

export const createInterviewRouter = (controller: InterviewController): Router => {
  const router = Router();

  // Sessions
  router.post('/session', controller.createSession);
  router.get('/session/:sessionId', controller.getSession);
  router.get('/session/:sessionId/question', controller.getCurrentQuestion);
  router.get('/unfinished/:resumeId', controller.findUnfinishedSession);

  // Answers
  router.post('/answer', controller.submitAnswer);
  router.post('/save-answer', controller.saveAnswer);

  // Completion, reports and history
  router.post('/:sessionId/complete', controller.completeInterview);
  router.get('/:sessionId/report', controller.getReport);
  router.get('/:sessionId/detail', controller.getInterviewDetail);
  router.get('/:sessionId/export', controller.exportReport);

  return router;
};
