import { describe, it, expect, vi } from 'vitest';
import type { AnswerRecord } from '../../../models/types';
import { InterviewError } from '../../../utils/errors';
import { coverageScoring, meanScoring, SessionReportBuilder } from '../reportAggregator';
import { answerWithScores, buildSession, createTestContext, makeQuestions, scoreReply } from '../../../__tests__/fixtures';

const GENERATED_AT = new Date('2026-01-05T12:00:00.000Z');
const SAVED_AT = new Date('2026-01-05T11:00:00.000Z');

const graded = (questionIndex: number, parsedScore: number): AnswerRecord => ({
  questionIndex,
  answerText: `answer ${questionIndex}`,
  status: 'graded',
  parsedScore,
  feedback: 'ok',
  attempts: 1,
  gradedAt: SAVED_AT,
  savedAt: SAVED_AT,
});

const degraded = (questionIndex: number): AnswerRecord => ({
  questionIndex,
  answerText: `answer ${questionIndex}`,
  status: 'degraded',
  feedback: 'grading unavailable',
  attempts: 3,
  gradedAt: SAVED_AT,
  savedAt: SAVED_AT,
});

describe('SessionReportBuilder', () => {
  const builder = new SessionReportBuilder(meanScoring, () => GENERATED_AT);

  it('should average the scored answers', () => {
    const session = buildSession({ answers: { 0: graded(0, 70), 1: graded(1, 80), 2: graded(2, 90) } });

    const report = builder.build(session);

    expect(report).toEqual({
      sessionId: 'session-1',
      questionScores: [
        { questionIndex: 0, score: 70, status: 'graded' },
        { questionIndex: 1, score: 80, status: 'graded' },
        { questionIndex: 2, score: 90, status: 'graded' },
      ],
      overallScore: 80,
      summary:
        'Scored 3 of 3 questions; overall score 80 (mean). Strongest answer: Q3 (90). Weakest answer: Q1 (70).',
      generatedAt: GENERATED_AT,
      unansweredIndices: [],
      degradedIndices: [],
      answeredCount: 3,
      totalQuestions: 3,
      scoringStrategy: 'mean',
    });
  });

  it('should exclude degraded and unanswered questions from the mean but flag them', () => {
    const session = buildSession({
      questions: makeQuestions(4),
      answers: { 0: graded(0, 70), 1: degraded(1), 3: { ...graded(3, 0), status: 'draft', parsedScore: undefined } },
    });

    const report = builder.build(session);

    expect(report.overallScore).toBe(70);
    expect(report.degradedIndices).toEqual([1]);
    expect(report.unansweredIndices).toEqual([2, 3]);
    expect(report.answeredCount).toBe(2);
    expect(report.summary).toBe(
      'Scored 1 of 4 questions; overall score 70 (mean). Could not be graded: Q2. Unanswered: Q3, Q4.'
    );
  });

  it('should round the mean to one decimal', () => {
    const session = buildSession({ answers: { 0: graded(0, 70), 1: graded(1, 75), 2: graded(2, 75) } });

    expect(builder.build(session).overallScore).toBe(73.3);
  });

  it('should fail with InsufficientData when nothing was scored', () => {
    const session = buildSession({ answers: { 0: degraded(0) } });

    expect(() => builder.build(session)).toThrow(InterviewError);
    expect(() => builder.build(session)).toThrow('Session session-1 has no scored answers');
  });

  it('should apply the coverage strategy', () => {
    const coverage = new SessionReportBuilder(coverageScoring, () => GENERATED_AT);
    const session = buildSession({ questions: makeQuestions(4), answers: { 0: graded(0, 80), 1: graded(1, 60) } });

    const report = coverage.build(session);

    expect(report.overallScore).toBe(35);
    expect(report.scoringStrategy).toBe('coverage');
  });
});

describe('ReportAggregator', () => {
  it('should cache the report until the next answer write', async () => {
    const overallScore = vi.fn(meanScoring.overallScore);
    const ctx = createTestContext({ scoring: { name: 'mean', overallScore } });
    const { sessionId } = await ctx.services.lifecycle.createSession(1, 4);
    await answerWithScores(ctx, sessionId, [70, 80, 90]);

    const first = await ctx.services.reports.generateReport(sessionId);
    const second = await ctx.services.reports.generateReport(sessionId);

    expect(first.overallScore).toBe(80);
    expect(second).toEqual(first);
    expect(overallScore).toHaveBeenCalledTimes(1);
    expect(ctx.grade).toHaveBeenCalledTimes(3);
    expect(ctx.repair).not.toHaveBeenCalled();

    await ctx.services.evaluator.saveAnswer(sessionId, 3, 'draft');
    expect((await ctx.services.lifecycle.getSession(sessionId)).report).toBeUndefined();
    await ctx.services.reports.generateReport(sessionId);
    expect(overallScore).toHaveBeenCalledTimes(2);

    ctx.grade.mockResolvedValueOnce(scoreReply(100));
    await ctx.services.evaluator.submitAnswer(sessionId, 3, 'final');
    const third = await ctx.services.reports.generateReport(sessionId);
    expect(third.overallScore).toBe(85);
    expect(overallScore).toHaveBeenCalledTimes(3);
  });

  it('should fail with InsufficientData when no answer has a score', async () => {
    const ctx = createTestContext();
    const { sessionId } = await ctx.services.lifecycle.createSession(1, 3);

    await expect(ctx.services.reports.generateReport(sessionId)).rejects.toMatchObject({
      kind: 'InsufficientData',
    });
  });

  it('should report unanswered questions after an early completion', async () => {
    const ctx = createTestContext();
    const { sessionId } = await ctx.services.lifecycle.createSession(1, 5);
    await answerWithScores(ctx, sessionId, [70, 90]);

    const completed = await ctx.services.lifecycle.completeInterview(sessionId);

    expect(completed.state).toBe('COMPLETED');
    expect(completed.report).toMatchObject({
      overallScore: 80,
      unansweredIndices: [2, 3, 4],
      degradedIndices: [],
      answeredCount: 2,
      totalQuestions: 5,
    });
    await expect(ctx.services.reports.generateReport(sessionId)).resolves.toEqual(completed.report);
  });
});
