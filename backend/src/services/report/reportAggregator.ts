import type { ScoringStrategyName } from '../../config/services';
import type { InterviewSession, QuestionScore, Report } from '../../models/types';
import { InterviewError } from '../../utils/errors';
import type { ReportBuilder, SessionLifecycleManager } from '../interview-orchestrator/sessionLifecycleManager';

export interface ScoringStrategy {
  name: string;
  /** `scores` holds every parsed score; never empty. */
  overallScore(scores: number[], totalQuestions: number): number;
}

const roundToTenth = (value: number) => Math.round(value * 10) / 10;

const mean = (scores: number[]) => scores.reduce((sum, s) => sum + s, 0) / scores.length;

export const meanScoring: ScoringStrategy = {
  name: 'mean',
  overallScore: (scores) => roundToTenth(mean(scores)),
};

/** Mean scaled by the share of questions that received a score. */
export const coverageScoring: ScoringStrategy = {
  name: 'coverage',
  overallScore: (scores, totalQuestions) => roundToTenth(mean(scores) * (scores.length / totalQuestions)),
};

export const scoringStrategies: Record<ScoringStrategyName, ScoringStrategy> = {
  mean: meanScoring,
  coverage: coverageScoring,
};

const formatIndices = (indices: number[]) => indices.map((i) => `Q${i + 1}`).join(', ');

const buildSummary = (scores: Array<{ questionIndex: number; score: number }>, report: Omit<Report, 'summary'>) => {
  const parts = [
    `Scored ${scores.length} of ${report.totalQuestions} questions; overall score ${report.overallScore} (${report.scoringStrategy}).`,
  ];

  const ranked = [...scores].sort((a, b) => b.score - a.score || a.questionIndex - b.questionIndex);
  const best = ranked[0];
  const worst = ranked[ranked.length - 1];
  if (ranked.length > 1 && best.score !== worst.score) {
    parts.push(`Strongest answer: Q${best.questionIndex + 1} (${best.score}). Weakest answer: Q${worst.questionIndex + 1} (${worst.score}).`);
  }
  if (report.degradedIndices.length > 0) {
    parts.push(`Could not be graded: ${formatIndices(report.degradedIndices)}.`);
  }
  if (report.unansweredIndices.length > 0) {
    parts.push(`Unanswered: ${formatIndices(report.unansweredIndices)}.`);
  }
  return parts.join(' ');
};

/** Pure report computation over a session's answers. */
export class SessionReportBuilder implements ReportBuilder {
  constructor(
    private readonly strategy: ScoringStrategy = meanScoring,
    private readonly now: () => Date = () => new Date()
  ) {}

  build(session: InterviewSession): Report {
    const questionScores: QuestionScore[] = session.questions.map((question) => {
      const answer = session.answers[question.index];
      if (!answer) return { questionIndex: question.index, status: 'unanswered' };
      return { questionIndex: question.index, score: answer.parsedScore, status: answer.status };
    });

    const scored = questionScores.flatMap((q) =>
      q.status === 'graded' && q.score !== undefined ? [{ questionIndex: q.questionIndex, score: q.score }] : []
    );
    if (scored.length === 0) {
      throw new InterviewError('InsufficientData', `Session ${session.sessionId} has no scored answers`);
    }

    const totalQuestions = session.questions.length;
    const report: Omit<Report, 'summary'> = {
      sessionId: session.sessionId,
      questionScores,
      overallScore: this.strategy.overallScore(
        scored.map((s) => s.score),
        totalQuestions
      ),
      generatedAt: this.now(),
      // Drafts were never submitted, so they count as unanswered.
      unansweredIndices: questionScores
        .filter((q) => q.status === 'unanswered' || q.status === 'draft')
        .map((q) => q.questionIndex),
      degradedIndices: questionScores.filter((q) => q.status === 'degraded').map((q) => q.questionIndex),
      answeredCount: questionScores.filter((q) => q.status === 'graded' || q.status === 'degraded').length,
      totalQuestions,
      scoringStrategy: this.strategy.name,
    };

    return { ...report, summary: buildSummary(scored, report) };
  }
}

export class ReportAggregator {
  constructor(
    private readonly lifecycle: SessionLifecycleManager,
    private readonly builder: ReportBuilder
  ) {}

  /** Cached on the session until the next answer write. */
  async generateReport(sessionId: string): Promise<Report> {
    const snapshot = await this.lifecycle.getSession(sessionId);
    if (snapshot.report) return snapshot.report;

    return this.lifecycle.withSessionLock(sessionId, async (session) => {
      if (session.report) return session.report;

      const report = this.builder.build(session);
      session.report = report;
      await this.lifecycle.save(session);

      console.log(`📊 Report generated for ${sessionId}: overall ${report.overallScore}`);
      return report;
    });
  }
}
