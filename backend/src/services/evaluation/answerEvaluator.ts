import type { AnswerRecord, GradingClient, InterviewSession, Question, SessionState } from '../../models/types';
import { InterviewError } from '../../utils/errors';
import {
  clampScore,
  type GradingResult,
  parseLenient,
  parseStrict,
  type ParseOutcome,
  repairRemotely,
} from '../grading/repairNormalizer';
import { advancePointer, SessionLifecycleManager } from '../interview-orchestrator/sessionLifecycleManager';

/** Grade call, syntactic repair, remote repair. Never more external calls than rounds. */
export const MAX_GRADING_ROUNDS = 3;
export const DEGRADED_FEEDBACK = 'grading unavailable';

export interface SubmitAnswerResult {
  sessionId: string;
  questionIndex: number;
  answer: AnswerRecord;
  pointer: number;
  state: SessionState;
  hasNextQuestion: boolean;
}

interface GradingOutcome {
  attempts: number;
  raw: string | null;
  repaired: string | null;
  result: GradingResult | null;
}

interface InFlightGrading {
  answerText: string;
  result: Promise<SubmitAnswerResult>;
}

export const buildGradingPrompt = (question: Question, answerText: string): string => {
  const hints = question.topicHints.length > 0 ? question.topicHints.join(', ') : 'none';
  return `
You are grading one answer from a mock technical interview.

**Question ${question.index + 1}:**
${question.prompt}

**Topics a strong answer covers:** ${hints}

**Candidate answer:**
${answerText.trim() || '(no answer given)'}

**Reply in JSON format ONLY:**

{
  "score": <integer from 0 to 100>,
  "feedback": "<two or three sentences on what was good and what was missing>"
}
  `.trim();
};

/** Returns the question being answered, or throws when the write is not allowed. */
export const assertAcceptsAnswer = (session: InterviewSession, questionIndex: number): Question => {
  if (session.state === 'COMPLETED') {
    throw new InterviewError('InvalidState', `Session ${session.sessionId} is already completed`);
  }
  const question = session.questions.find((q) => q.index === questionIndex);
  if (!question) {
    throw new InterviewError(
      'InvalidState',
      `Question ${questionIndex} does not exist in session ${session.sessionId}`
    );
  }
  const existing = session.answers[questionIndex];
  if (existing && existing.status !== 'draft') {
    throw new InterviewError('Conflict', `Question ${questionIndex} has already been answered`);
  }
  return question;
};

export class AnswerEvaluator {
  private inFlight = new Map<string, InFlightGrading>();

  constructor(
    private readonly lifecycle: SessionLifecycleManager,
    private readonly gradingClient: GradingClient
  ) {}

  /**
   * Grades and records an answer. A duplicate submission for the same question
   * while grading is under way shares the pending result (same text) or fails
   * with Conflict (different text); the grader is never asked twice.
   */
  async submitAnswer(sessionId: string, questionIndex: number, answerText: string): Promise<SubmitAnswerResult> {
    const key = `${sessionId}:${questionIndex}`;
    const pending = this.inFlight.get(key);
    if (pending) {
      if (pending.answerText !== answerText) {
        throw new InterviewError('Conflict', `Question ${questionIndex} is already being graded`);
      }
      console.log(`⏳ Joining in-flight grading for ${key}`);
      return pending.result;
    }

    const result = this.gradeAndRecord(sessionId, questionIndex, answerText);
    this.inFlight.set(key, { answerText, result });
    try {
      return await result;
    } finally {
      this.inFlight.delete(key);
    }
  }

  /** Stores a draft verbatim. Pointer and state are left alone. */
  async saveAnswer(sessionId: string, questionIndex: number, answerText: string): Promise<AnswerRecord> {
    return this.lifecycle.withSessionLock(sessionId, async (session) => {
      assertAcceptsAnswer(session, questionIndex);
      const draft: AnswerRecord = {
        questionIndex,
        answerText,
        status: 'draft',
        feedback: '',
        attempts: 0,
        savedAt: this.lifecycle.now(),
      };
      session.answers[questionIndex] = draft;
      session.report = undefined;
      await this.lifecycle.save(session);
      return draft;
    });
  }

  private async gradeAndRecord(
    sessionId: string,
    questionIndex: number,
    answerText: string
  ): Promise<SubmitAnswerResult> {
    // Early rejection only; the same guard runs again under the lock.
    const question = assertAcceptsAnswer(await this.lifecycle.getSession(sessionId), questionIndex);

    const outcome = await this.runGradingRounds(buildGradingPrompt(question, answerText));
    const record = this.toAnswerRecord(questionIndex, answerText, outcome);

    return this.lifecycle.withSessionLock(sessionId, async (session) => {
      assertAcceptsAnswer(session, questionIndex);

      session.answers[questionIndex] = record;
      session.report = undefined;
      if (session.state === 'CREATED') session.state = 'IN_PROGRESS';
      if (questionIndex === session.pointer) session.pointer = advancePointer(session);
      await this.lifecycle.save(session);

      console.log(
        `✅ Recorded answer ${questionIndex} for ${sessionId}: ${
          record.status === 'graded' ? `score ${record.parsedScore}` : 'degraded'
        } after ${record.attempts} attempt(s)`
      );
      return {
        sessionId,
        questionIndex,
        answer: record,
        pointer: session.pointer,
        state: session.state,
        hasNextQuestion: session.pointer < session.questions.length,
      };
    });
  }

  /**
   * Round 1 grades and parses strictly, round 2 repairs the syntax of that
   * reply, round 3 asks the grader to repair it. A round whose grade call
   * failed leaves no reply to repair, so the next round grades afresh instead.
   */
  private async runGradingRounds(prompt: string): Promise<GradingOutcome> {
    let raw: string | null = null;
    let lastError: InterviewError | null = null;

    for (let attempt = 1; attempt <= MAX_GRADING_ROUNDS; attempt++) {
      try {
        let outcome: ParseOutcome;
        let repaired: string | null = null;
        if (raw === null) {
          raw = await this.gradingClient.grade(prompt);
          outcome = attempt === 1 ? parseStrict(raw) : parseLenient(raw);
        } else if (attempt === 2) {
          outcome = parseLenient(raw);
        } else {
          outcome = await repairRemotely(this.gradingClient, prompt, raw);
          repaired = outcome.text;
        }

        if (outcome.ok) {
          return { attempts: attempt, raw, repaired, result: outcome.result };
        }
        lastError = outcome.error;
      } catch (error) {
        lastError =
          error instanceof InterviewError
            ? error
            : new InterviewError('TransientGradingFailure', 'Grading client failed', { cause: error });
      }
    }

    console.warn(
      `⚠️ Grading budget exhausted after ${MAX_GRADING_ROUNDS} attempts: ${lastError?.message ?? 'unknown error'}`
    );
    return { attempts: MAX_GRADING_ROUNDS, raw, repaired: null, result: null };
  }

  private toAnswerRecord(questionIndex: number, answerText: string, outcome: GradingOutcome): AnswerRecord {
    const now = this.lifecycle.now();
    const base = {
      questionIndex,
      answerText,
      rawGraderResponse: outcome.raw ?? undefined,
      repairedGraderResponse: outcome.repaired ?? undefined,
      attempts: outcome.attempts,
      gradedAt: now,
      savedAt: now,
    };

    if (!outcome.result) {
      return { ...base, status: 'degraded', feedback: DEGRADED_FEEDBACK };
    }
    return {
      ...base,
      status: 'graded',
      parsedScore: clampScore(outcome.result.score),
      feedback: outcome.result.feedback,
    };
  }
}
