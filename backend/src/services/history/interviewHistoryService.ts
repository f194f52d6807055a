import type { AnswerRecord, AnswerView, InterviewDetail, InterviewSession, RenderedReport, ReportRenderer } from '../../models/types';
import { InterviewError, isInterviewError } from '../../utils/errors';
import type { SessionLifecycleManager } from '../interview-orchestrator/sessionLifecycleManager';
import type { ReportAggregator } from '../report/reportAggregator';

/** Public view of an answer; the grader's raw reply stays internal. */
export const toAnswerView = (answer: AnswerRecord): AnswerView => ({
  questionIndex: answer.questionIndex,
  answerText: answer.answerText,
  status: answer.status,
  score: answer.parsedScore ?? null,
  feedback: answer.feedback,
  attempts: answer.attempts,
  gradedAt: answer.gradedAt ?? null,
  savedAt: answer.savedAt,
});

export const toInterviewDetail = (session: InterviewSession): InterviewDetail => ({
  sessionId: session.sessionId,
  resumeId: session.resumeId,
  state: session.state,
  pointer: session.pointer,
  totalQuestions: session.questions.length,
  createdAt: session.createdAt,
  completedAt: session.completedAt ?? null,
  questions: session.questions.map((question) => {
    const answer = session.answers[question.index];
    return { ...question, answer: answer ? toAnswerView(answer) : null };
  }),
  report: session.report ?? null,
});

export class InterviewHistoryService {
  constructor(
    private readonly lifecycle: SessionLifecycleManager,
    private readonly reports: ReportAggregator,
    private readonly renderer: ReportRenderer
  ) {}

  async getInterviewDetail(sessionId: string): Promise<InterviewDetail> {
    const snapshot = await this.lifecycle.getSession(sessionId);
    if (snapshot.report) return toInterviewDetail(snapshot);

    try {
      await this.reports.generateReport(sessionId);
    } catch (error) {
      if (!isInterviewError(error, 'InsufficientData')) throw error;
    }
    // Answers and report come from one read; a write since generation shows up as a missing report.
    return toInterviewDetail(await this.lifecycle.getSession(sessionId));
  }

  async exportReport(sessionId: string): Promise<RenderedReport> {
    const report = await this.reports.generateReport(sessionId);
    const session = await this.lifecycle.getSession(sessionId);
    const detail = toInterviewDetail({ ...session, report });

    try {
      return await this.renderer.render(detail);
    } catch (error) {
      console.error(`❌ Failed to render report for ${sessionId}:`, error);
      throw new InterviewError('RenderFailed', `Could not render the report for session ${sessionId}`, {
        cause: error,
      });
    }
  }
}
