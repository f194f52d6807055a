import type { Request, Response, NextFunction } from 'express';
import { interviewConfig } from '../config/services';
import type { InterviewServices } from '../config/container';
import { ApiError } from '../middlewares/errorHandler';
import type { QuestionDifficulty } from '../models/types';
import { toAnswerView, toInterviewDetail } from '../services/history/interviewHistoryService';

const difficulties: ReadonlyArray<QuestionDifficulty> = ['Easy', 'Medium', 'Hard'];

const requirePositiveInt = (value: unknown, field: string): number => {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < 1) {
    throw new ApiError(400, `${field} must be a positive integer`);
  }
  return parsed;
};

const requireIndex = (value: unknown): number => {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ApiError(400, 'questionIndex must be a non-negative integer');
  }
  return value;
};

const requireString = (value: unknown, field: string): string => {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ApiError(400, `${field} is required`);
  }
  return value;
};

const optionalString = (value: unknown, field: string): string | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new ApiError(400, `${field} must be a string`);
  return value;
};

const optionalDifficulty = (value: unknown): QuestionDifficulty | undefined => {
  if (value === undefined || value === null) return undefined;
  const difficulty = difficulties.find((d) => d === value);
  if (!difficulty) throw new ApiError(400, `difficulty must be one of ${difficulties.join(', ')}`);
  return difficulty;
};

const readAnswerBody = (req: Request) => {
  const body = req.body ?? {};
  // Empty answers are allowed; a candidate may skip a question.
  if (typeof body.answerText !== 'string') {
    throw new ApiError(400, 'answerText must be a string');
  }
  return {
    sessionId: requireString(body.sessionId, 'sessionId'),
    questionIndex: requireIndex(body.questionIndex),
    answerText: body.answerText,
  };
};

export class InterviewController {
  constructor(private readonly services: InterviewServices) {}

  createSession = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = req.body ?? {};
      const resumeId = requirePositiveInt(body.resumeId, 'resumeId');
      const questionCount =
        body.questionCount === undefined
          ? interviewConfig.defaultQuestionCount
          : requirePositiveInt(body.questionCount, 'questionCount');
      if (questionCount > interviewConfig.maxQuestionCount) {
        throw new ApiError(400, `questionCount must not exceed ${interviewConfig.maxQuestionCount}`);
      }

      const session = await this.services.lifecycle.createSession(resumeId, questionCount, {
        category: optionalString(body.category, 'category'),
        difficulty: optionalDifficulty(body.difficulty),
      });

      res.status(201).json({ success: true, data: toInterviewDetail(session) });
    } catch (error) {
      next(error);
    }
  };

  getSession = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await this.services.lifecycle.getSession(req.params.sessionId);
      res.json({ success: true, data: toInterviewDetail(session) });
    } catch (error) {
      next(error);
    }
  };

  getCurrentQuestion = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const current = await this.services.lifecycle.getCurrentQuestion(req.params.sessionId);
      res.json({ success: true, data: current });
    } catch (error) {
      next(error);
    }
  };

  findUnfinishedSession = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const resumeId = requirePositiveInt(req.params.resumeId, 'resumeId');
      const session = await this.services.lifecycle.findUnfinishedSession(resumeId);
      res.json({ success: true, data: toInterviewDetail(session) });
    } catch (error) {
      next(error);
    }
  };

  submitAnswer = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId, questionIndex, answerText } = readAnswerBody(req);
      const result = await this.services.evaluator.submitAnswer(sessionId, questionIndex, answerText);
      res.json({
        success: true,
        data: {
          sessionId: result.sessionId,
          questionIndex: result.questionIndex,
          answer: toAnswerView(result.answer),
          pointer: result.pointer,
          state: result.state,
          hasNextQuestion: result.hasNextQuestion,
        },
      });
    } catch (error) {
      next(error);
    }
  };

  saveAnswer = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId, questionIndex, answerText } = readAnswerBody(req);
      await this.services.evaluator.saveAnswer(sessionId, questionIndex, answerText);
      res.json({ success: true, message: 'Answer saved' });
    } catch (error) {
      next(error);
    }
  };

  completeInterview = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await this.services.lifecycle.completeInterview(req.params.sessionId);
      res.json({
        success: true,
        message: 'Interview completed',
        data: { sessionId: session.sessionId, state: session.state, hasReport: Boolean(session.report) },
      });
    } catch (error) {
      next(error);
    }
  };

  getReport = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await this.services.reports.generateReport(req.params.sessionId);
      res.json({ success: true, data: report });
    } catch (error) {
      next(error);
    }
  };

  getInterviewDetail = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const detail = await this.services.history.getInterviewDetail(req.params.sessionId);
      res.json({ success: true, data: detail });
    } catch (error) {
      next(error);
    }
  };

  exportReport = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId } = req.params;
      const rendered = await this.services.history.exportReport(sessionId);
      const filename = encodeURIComponent(`interview-report_${sessionId}.${rendered.fileExtension}`);

      res
        .status(200)
        .set('Content-Type', rendered.contentType)
        .set('Content-Disposition', `attachment; filename*=UTF-8''${filename}`)
        .send(rendered.body);
    } catch (error) {
      next(error);
    }
  };
}
