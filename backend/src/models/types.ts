export type SessionState = 'CREATED' | 'IN_PROGRESS' | 'COMPLETED';

export type QuestionDifficulty = 'Easy' | 'Medium' | 'Hard';

export interface Question {
  index: number;
  prompt: string;
  topicHints: string[];
  category?: string;
  difficulty?: QuestionDifficulty;
}

export type AnswerStatus = 'draft' | 'graded' | 'degraded';

export interface AnswerRecord {
  questionIndex: number;
  answerText: string;
  status: AnswerStatus;
  rawGraderResponse?: string;
  /** The grader's corrected reply, when a remote repair produced the score. */
  repairedGraderResponse?: string;
  /** Present only on graded records, always within [0, 100]. */
  parsedScore?: number;
  feedback: string;
  /** Grading rounds spent on this answer; 0 for drafts. */
  attempts: number;
  gradedAt?: Date;
  savedAt: Date;
}

export interface QuestionScore {
  questionIndex: number;
  score?: number;
  status: AnswerStatus | 'unanswered';
}

export interface Report {
  sessionId: string;
  questionScores: QuestionScore[];
  overallScore: number;
  summary: string;
  generatedAt: Date;
  unansweredIndices: number[];
  degradedIndices: number[];
  answeredCount: number;
  totalQuestions: number;
  scoringStrategy: string;
}

export interface InterviewSession {
  sessionId: string;
  resumeId: number;
  questions: Question[];
  pointer: number;
  answers: Record<number, AnswerRecord>;
  state: SessionState;
  createdAt: Date;
  updatedAt: Date;
  completedAt?: Date;
  report?: Report;
}

export interface CreateSessionOptions {
  category?: string;
  difficulty?: QuestionDifficulty;
}

export interface QuestionRequest extends CreateSessionOptions {
  resumeId: number;
  questionCount: number;
}

/** Ordered question supply for new sessions. */
export interface QuestionSource {
  getQuestions(request: QuestionRequest): Promise<Question[]>;
}

export interface SessionStore {
  get(sessionId: string): Promise<InterviewSession | null>;
  put(session: InterviewSession): Promise<void>;
  /** Unfinished sessions for a resume, most recent first. */
  listUnfinishedByResume(resumeId: number): Promise<InterviewSession[]>;
}

/**
 * resumeId -> unfinished sessionId claims. `claim` must be atomic: of two
 * concurrent claims for the same resume at most one succeeds.
 */
export interface ActiveSessionIndex {
  claim(resumeId: number, sessionId: string): Promise<boolean>;
  lookup(resumeId: number): Promise<string | null>;
  release(resumeId: number, sessionId: string): Promise<void>;
}

export interface GradingClient {
  grade(prompt: string): Promise<string>;
  repair(prompt: string, brokenText: string): Promise<string>;
}

export interface AnswerView {
  questionIndex: number;
  answerText: string;
  status: AnswerStatus;
  score: number | null;
  feedback: string;
  attempts: number;
  gradedAt: Date | null;
  savedAt: Date;
}

export interface InterviewDetail {
  sessionId: string;
  resumeId: number;
  state: SessionState;
  pointer: number;
  totalQuestions: number;
  createdAt: Date;
  completedAt: Date | null;
  questions: Array<Question & { answer: AnswerView | null }>;
  report: Report | null;
}

export interface RenderedReport {
  contentType: string;
  fileExtension: string;
  body: Buffer;
}

export interface ReportRenderer {
  render(detail: InterviewDetail): Promise<RenderedReport>;
}
