export type InterviewErrorKind =
  | 'NotFound'
  | 'Conflict'
  | 'InvalidState'
  | 'MalformedGradingOutput'
  | 'TransientGradingFailure'
  | 'InsufficientData'
  | 'RenderFailed';

export class InterviewError extends Error {
  readonly kind: InterviewErrorKind;

  constructor(kind: InterviewErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InterviewError';
    this.kind = kind;
  }
}

export const isInterviewError = (error: unknown, kind?: InterviewErrorKind): error is InterviewError =>
  error instanceof InterviewError && (kind === undefined || error.kind === kind);
