import { v4 as uuidv4 } from 'uuid';
import type {
  ActiveSessionIndex,
  CreateSessionOptions,
  InterviewSession,
  Question,
  QuestionSource,
  Report,
  SessionState,
  SessionStore,
} from '../../models/types';
import { InterviewError, isInterviewError } from '../../utils/errors';
import { KeyedMutex } from '../../utils/keyedMutex';

export interface ReportBuilder {
  build(session: InterviewSession): Report;
}

export interface SessionLifecycleDeps {
  store: SessionStore;
  activeIndex: ActiveSessionIndex;
  questionSource: QuestionSource;
  reportBuilder: ReportBuilder;
  mutex?: KeyedMutex;
  now?: () => Date;
}

export interface CurrentQuestion {
  sessionId: string;
  state: SessionState;
  question: Question;
  questionCount: number;
  answeredCount: number;
  /** Text previously stored with saveAnswer for this question. */
  draftAnswer: string | null;
}

export const countAnswered = (session: InterviewSession): number =>
  Object.values(session.answers).filter((a) => a.status !== 'draft').length;

/** First index at or after the pointer that has no graded or degraded answer. */
export const advancePointer = (session: InterviewSession): number => {
  let next = session.pointer;
  while (next < session.questions.length) {
    const answer = session.answers[next];
    if (!answer || answer.status === 'draft') break;
    next++;
  }
  return next;
};

export class SessionLifecycleManager {
  private readonly store: SessionStore;
  private readonly activeIndex: ActiveSessionIndex;
  private readonly questionSource: QuestionSource;
  private readonly reportBuilder: ReportBuilder;
  private readonly mutex: KeyedMutex;
  readonly now: () => Date;

  constructor(deps: SessionLifecycleDeps) {
    this.store = deps.store;
    this.activeIndex = deps.activeIndex;
    this.questionSource = deps.questionSource;
    this.reportBuilder = deps.reportBuilder;
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.now = deps.now ?? (() => new Date());
  }

  async createSession(
    resumeId: number,
    questionCount: number,
    options: CreateSessionOptions = {}
  ): Promise<InterviewSession> {
    // Creations for one resume are serialized; the index claim settles the rest.
    return this.mutex.runExclusive(`resume:${resumeId}`, async () => {
      const sessionId = uuidv4();
      await this.claimResume(resumeId, sessionId);

      try {
        const questions = await this.questionSource.getQuestions({
          resumeId,
          questionCount,
          ...options,
        });
        const createdAt = this.now();
        const session: InterviewSession = {
          sessionId,
          resumeId,
          questions,
          pointer: 0,
          answers: {},
          state: 'CREATED',
          createdAt,
          updatedAt: createdAt,
        };
        await this.store.put(session);

        console.log(`📝 Created session ${sessionId} for resume ${resumeId} (${questions.length} questions)`);
        return session;
      } catch (error) {
        await this.activeIndex.release(resumeId, sessionId);
        throw error;
      }
    });
  }

  async getSession(sessionId: string): Promise<InterviewSession> {
    const session = await this.store.get(sessionId);
    if (!session) {
      throw new InterviewError('NotFound', `Session ${sessionId} not found`);
    }
    return session;
  }

  async getCurrentQuestion(sessionId: string): Promise<CurrentQuestion> {
    const snapshot = await this.getSession(sessionId);
    this.assertServable(snapshot);
    if (snapshot.state !== 'CREATED') {
      return this.toCurrentQuestion(snapshot);
    }

    return this.withSessionLock(sessionId, async (session) => {
      this.assertServable(session);
      if (session.state === 'CREATED') {
        session.state = 'IN_PROGRESS';
        await this.save(session);
        console.log(`▶️  Session ${sessionId} started`);
      }
      return this.toCurrentQuestion(session);
    });
  }

  async findUnfinishedSession(resumeId: number): Promise<InterviewSession> {
    const claimedId = await this.activeIndex.lookup(resumeId);
    if (claimedId) {
      const claimed = await this.store.get(claimedId);
      if (claimed && claimed.state !== 'COMPLETED') return claimed;
    }

    const [latest] = await this.store.listUnfinishedByResume(resumeId);
    if (!latest) {
      throw new InterviewError('NotFound', `No unfinished interview for resume ${resumeId}`);
    }
    return latest;
  }

  /** Forces COMPLETED. Completing an already completed session is a no-op. */
  async completeInterview(sessionId: string): Promise<InterviewSession> {
    return this.withSessionLock(sessionId, async (session) => {
      if (session.state === 'COMPLETED') return session;

      session.state = 'COMPLETED';
      session.completedAt = this.now();
      if (!session.report) {
        try {
          session.report = this.reportBuilder.build(session);
        } catch (error) {
          if (!isInterviewError(error, 'InsufficientData')) throw error;
          console.log(`ℹ️  Session ${sessionId} completed without scored answers; no report yet`);
        }
      }
      await this.save(session);
      await this.activeIndex.release(session.resumeId, sessionId);

      console.log(
        `🏁 Session ${sessionId} completed (${countAnswered(session)}/${session.questions.length} answered)`
      );
      return session;
    });
  }

  /**
   * Runs `task` inside the session's exclusive region against a freshly read
   * copy. Nothing is written unless the task calls `save`.
   */
  async withSessionLock<T>(sessionId: string, task: (session: InterviewSession) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(sessionId, async () => task(await this.getSession(sessionId)));
  }

  async save(session: InterviewSession): Promise<void> {
    session.updatedAt = this.now();
    await this.store.put(session);
  }

  private async claimResume(resumeId: number, sessionId: string): Promise<void> {
    if (!(await this.activeIndex.claim(resumeId, sessionId))) {
      await this.takeOverStaleClaim(resumeId, sessionId);
    }

    // A claim can lapse while its session is still open; the store has the last word.
    const [unfinished] = await this.store.listUnfinishedByResume(resumeId);
    if (unfinished) {
      await this.activeIndex.release(resumeId, sessionId);
      throw new InterviewError(
        'Conflict',
        `Resume ${resumeId} already has an unfinished interview (${unfinished.sessionId})`
      );
    }
  }

  private async takeOverStaleClaim(resumeId: number, sessionId: string): Promise<void> {
    const holderId = await this.activeIndex.lookup(resumeId);
    const holder = holderId ? await this.store.get(holderId) : null;
    if (holder && holder.state !== 'COMPLETED') {
      throw new InterviewError(
        'Conflict',
        `Resume ${resumeId} already has an unfinished interview (${holder.sessionId})`
      );
    }

    // Stale claim: the holder is gone or finished without releasing.
    if (holderId) {
      await this.activeIndex.release(resumeId, holderId);
    }
    if (!(await this.activeIndex.claim(resumeId, sessionId))) {
      throw new InterviewError('Conflict', `Resume ${resumeId} already has an unfinished interview`);
    }
  }

  private assertServable(session: InterviewSession): void {
    if (session.state === 'COMPLETED') {
      throw new InterviewError('InvalidState', `Session ${session.sessionId} is already completed`);
    }
    if (session.pointer >= session.questions.length) {
      throw new InterviewError(
        'InvalidState',
        `All ${session.questions.length} questions of session ${session.sessionId} have been answered`
      );
    }
  }

  private toCurrentQuestion(session: InterviewSession): CurrentQuestion {
    const draft = session.answers[session.pointer];
    return {
      sessionId: session.sessionId,
      state: session.state,
      question: session.questions[session.pointer],
      questionCount: session.questions.length,
      answeredCount: countAnswered(session),
      draftAnswer: draft?.status === 'draft' ? draft.answerText : null,
    };
  }
}
