import InterviewSessionModel, { type InterviewSessionDocument } from '../models/InterviewSession';
import type { AnswerRecord, InterviewSession, QuestionScore, Report, SessionStore } from '../models/types';

const scoreStatuses: ReadonlyArray<QuestionScore['status']> = ['draft', 'graded', 'degraded', 'unanswered'];

const toQuestionScoreStatus = (status: string): QuestionScore['status'] =>
  scoreStatuses.find((candidate) => candidate === status) ?? 'unanswered';

export const toSessionDocument = (session: InterviewSession): InterviewSessionDocument => ({
  sessionId: session.sessionId,
  resumeId: session.resumeId,
  state: session.state,
  pointer: session.pointer,
  questions: session.questions.map((q) => ({ ...q, topicHints: [...q.topicHints] })),
  answers: Object.values(session.answers)
    .sort((a, b) => a.questionIndex - b.questionIndex)
    .map((answer) => ({ ...answer })),
  report: session.report
    ? {
        ...session.report,
        questionScores: session.report.questionScores.map((s) => ({ ...s })),
      }
    : undefined,
  createdAt: session.createdAt,
  updatedAt: session.updatedAt,
  completedAt: session.completedAt,
});

export const toInterviewSession = (doc: InterviewSessionDocument): InterviewSession => {
  const answers: Record<number, AnswerRecord> = {};
  for (const answer of doc.answers) {
    answers[answer.questionIndex] = {
      questionIndex: answer.questionIndex,
      answerText: answer.answerText,
      status: answer.status,
      rawGraderResponse: answer.rawGraderResponse ?? undefined,
      repairedGraderResponse: answer.repairedGraderResponse ?? undefined,
      parsedScore: answer.parsedScore ?? undefined,
      feedback: answer.feedback,
      attempts: answer.attempts,
      gradedAt: answer.gradedAt ?? undefined,
      savedAt: answer.savedAt,
    };
  }

  let report: Report | undefined;
  if (doc.report) {
    report = {
      ...doc.report,
      sessionId: doc.sessionId,
      questionScores: doc.report.questionScores.map((s) => ({
        questionIndex: s.questionIndex,
        score: s.score ?? undefined,
        status: toQuestionScoreStatus(s.status),
      })),
    };
  }

  return {
    sessionId: doc.sessionId,
    resumeId: doc.resumeId,
    questions: doc.questions.map((q) => ({
      index: q.index,
      prompt: q.prompt,
      topicHints: q.topicHints,
      category: q.category ?? undefined,
      difficulty: q.difficulty ?? undefined,
    })),
    pointer: doc.pointer,
    answers,
    state: doc.state,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
    completedAt: doc.completedAt ?? undefined,
    report,
  };
};

export class MongoSessionStore implements SessionStore {
  async get(sessionId: string): Promise<InterviewSession | null> {
    const doc = await InterviewSessionModel.findOne({ sessionId }).lean<InterviewSessionDocument>();
    return doc ? toInterviewSession(doc) : null;
  }

  async put(session: InterviewSession): Promise<void> {
    await InterviewSessionModel.replaceOne(
      { sessionId: session.sessionId },
      toSessionDocument(session),
      { upsert: true }
    );
  }

  async listUnfinishedByResume(resumeId: number): Promise<InterviewSession[]> {
    const docs = await InterviewSessionModel.find({ resumeId, state: { $ne: 'COMPLETED' } })
      .sort({ createdAt: -1 })
      .lean<InterviewSessionDocument[]>();
    return docs.map(toInterviewSession);
  }
}
