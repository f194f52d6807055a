import mongoose, { Schema } from 'mongoose';
import type { AnswerStatus, QuestionDifficulty, SessionState } from './types';

/**
 * Persistent shape of an interview session. Answers are stored as an array of
 * sub-documents keyed by `questionIndex`; the report is embedded as the cache.
 */
export interface InterviewSessionDocument {
  sessionId: string;
  resumeId: number;
  state: SessionState;
  pointer: number;
  questions: Array<{
    index: number;
    prompt: string;
    topicHints: string[];
    category?: string;
    difficulty?: QuestionDifficulty;
  }>;
  answers: Array<{
    questionIndex: number;
    answerText: string;
    status: AnswerStatus;
    rawGraderResponse?: string;
    repairedGraderResponse?: string;
    parsedScore?: number;
    feedback: string;
    attempts: number;
    gradedAt?: Date;
    savedAt: Date;
  }>;
  report?: {
    questionScores: Array<{ questionIndex: number; score?: number; status: string }>;
    overallScore: number;
    summary: string;
    generatedAt: Date;
    unansweredIndices: number[];
    degradedIndices: number[];
    answeredCount: number;
    totalQuestions: number;
    scoringStrategy: string;
  };
  createdAt: Date;
  updatedAt: Date;
  completedAt?: Date;
}

const QuestionSchema = new Schema(
  {
    index: { type: Number, required: true },
    prompt: { type: String, required: true },
    topicHints: [String],
    category: String,
    difficulty: { type: String, enum: ['Easy', 'Medium', 'Hard'] },
  },
  { _id: false }
);

const AnswerSchema = new Schema(
  {
    questionIndex: { type: Number, required: true },
    answerText: { type: String, default: '' },
    status: { type: String, enum: ['draft', 'graded', 'degraded'], required: true },
    rawGraderResponse: String,
    repairedGraderResponse: String,
    parsedScore: { type: Number, min: 0, max: 100 },
    feedback: { type: String, default: '' },
    attempts: { type: Number, default: 0 },
    gradedAt: Date,
    savedAt: { type: Date, required: true },
  },
  { _id: false }
);

const ReportSchema = new Schema(
  {
    questionScores: [
      {
        _id: false,
        questionIndex: Number,
        score: Number,
        status: String,
      },
    ],
    overallScore: Number,
    summary: String,
    generatedAt: Date,
    unansweredIndices: [Number],
    degradedIndices: [Number],
    answeredCount: Number,
    totalQuestions: Number,
    scoringStrategy: String,
  },
  { _id: false }
);

const InterviewSessionSchema = new Schema<InterviewSessionDocument>({
  sessionId: {
    type: String,
    required: true,
    unique: true,
    index: true,
  },
  resumeId: {
    type: Number,
    required: true,
    index: true,
  },
  state: {
    type: String,
    enum: ['CREATED', 'IN_PROGRESS', 'COMPLETED'],
    default: 'CREATED',
  },
  pointer: {
    type: Number,
    default: 0,
  },
  questions: [QuestionSchema],
  answers: [AnswerSchema],
  report: ReportSchema,
  createdAt: { type: Date, required: true },
  updatedAt: { type: Date, required: true },
  completedAt: Date,
});

InterviewSessionSchema.index({ resumeId: 1, state: 1, createdAt: -1 });

export default mongoose.model<InterviewSessionDocument>('InterviewSession', InterviewSessionSchema);
