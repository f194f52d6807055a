import type { Request, Response, NextFunction } from 'express';
import { InterviewError, type InterviewErrorKind } from '../utils/errors';

export class ApiError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
  }
}

const statusByKind: Record<InterviewErrorKind, number> = {
  NotFound: 404,
  Conflict: 409,
  InvalidState: 409,
  InsufficientData: 422,
  RenderFailed: 502,
  // Grading errors are consumed by the evaluator; reaching here is a bug.
  MalformedGradingOutput: 500,
  TransientGradingFailure: 500,
};

export const errorHandler = (
  error: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  if (error instanceof InterviewError) {
    res.status(statusByKind[error.kind]).json({
      success: false,
      error: { kind: error.kind, message: error.message },
    });
    return;
  }

  if (error instanceof ApiError) {
    res.status(error.statusCode).json({
      success: false,
      error: { kind: 'BadRequest', message: error.message },
    });
    return;
  }

  // Malformed JSON bodies from express.json()
  if (error instanceof SyntaxError && 'body' in error) {
    res.status(400).json({
      success: false,
      error: { kind: 'BadRequest', message: 'Request body is not valid JSON' },
    });
    return;
  }

  console.error('❌ Unhandled error:', error);
  res.status(500).json({
    success: false,
    error: { kind: 'Internal', message: 'Internal server error' },
  });
};
