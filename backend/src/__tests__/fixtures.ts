import { vi } from 'vitest';
import { createInterviewServices, type InterviewServices } from '../config/container';
import type {
  ActiveSessionIndex,
  GradingClient,
  InterviewSession,
  Question,
  QuestionRequest,
  QuestionSource,
  ReportRenderer,
} from '../models/types';
import { type ClaimCommands, InMemoryActiveSessionIndex } from '../repositories/activeSessionIndex';
import { InMemorySessionStore } from '../repositories/inMemorySessionStore';
import { MarkdownReportRenderer } from '../services/history/markdownReportRenderer';
import type { ScoringStrategy } from '../services/report/reportAggregator';

export const makeQuestions = (count: number): Question[] =>
  Array.from({ length: count }, (_, index) => ({
    index,
    prompt: `Question ${index + 1}`,
    topicHints: [`topic-${index + 1}`],
  }));

export class FixedQuestionSource implements QuestionSource {
  requests: QuestionRequest[] = [];

  async getQuestions(request: QuestionRequest): Promise<Question[]> {
    this.requests.push(request);
    return makeQuestions(request.questionCount);
  }
}

export const scoreReply = (score: number, feedback = 'ok') => JSON.stringify({ score, feedback });

export const createFakeGradingClient = () => {
  const grade = vi.fn<(prompt: string) => Promise<string>>();
  const repair = vi.fn<(prompt: string, brokenText: string) => Promise<string>>();
  const client: GradingClient = { grade, repair };
  return { client, grade, repair };
};

/** In-process stand-in for the redis commands behind the claim index. */
export class FakeClaimRedis implements ClaimCommands {
  readonly values = new Map<string, string>();
  readonly ttls = new Map<string, number>();

  async set(key: string, value: string, options: { NX: true; EX: number }): Promise<string | null> {
    if (options.NX && this.values.has(key)) return null;
    this.values.set(key, value);
    this.ttls.set(key, options.EX);
    return 'OK';
  }

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  /** Runs the compare-and-delete release. */
  async eval(_script: string, options: { keys: string[]; arguments: string[] }): Promise<number> {
    const [key] = options.keys;
    const [value] = options.arguments;
    if (this.values.get(key) !== value) return 0;
    this.expire(key);
    return 1;
  }

  /** Drops a key as if its TTL ran out. */
  expire(key: string): void {
    this.values.delete(key);
    this.ttls.delete(key);
  }
}

export interface TestContext {
  services: InterviewServices;
  store: InMemorySessionStore;
  activeIndex: ActiveSessionIndex;
  questionSource: FixedQuestionSource;
  grade: ReturnType<typeof createFakeGradingClient>['grade'];
  repair: ReturnType<typeof createFakeGradingClient>['repair'];
}

export const createTestContext = (
  options: { renderer?: ReportRenderer; scoring?: ScoringStrategy; activeIndex?: ActiveSessionIndex } = {}
): TestContext => {
  const store = new InMemorySessionStore();
  const activeIndex = options.activeIndex ?? new InMemoryActiveSessionIndex();
  const questionSource = new FixedQuestionSource();
  const { client, grade, repair } = createFakeGradingClient();

  const services = createInterviewServices({
    store,
    activeIndex,
    questionSource,
    gradingClient: client,
    renderer: options.renderer ?? new MarkdownReportRenderer(),
    scoring: options.scoring,
  });

  return { services, store, activeIndex, questionSource, grade, repair };
};

/** Submits each score in order, starting at question 0. */
export const answerWithScores = async (ctx: TestContext, sessionId: string, scores: number[]) => {
  for (const [index, score] of scores.entries()) {
    ctx.grade.mockResolvedValueOnce(scoreReply(score));
    await ctx.services.evaluator.submitAnswer(sessionId, index, `answer ${index}`);
  }
};

export const buildSession = (overrides: Partial<InterviewSession> = {}): InterviewSession => {
  const createdAt = new Date('2026-01-05T10:00:00.000Z');
  return {
    sessionId: 'session-1',
    resumeId: 1,
    questions: makeQuestions(3),
    pointer: 0,
    answers: {},
    state: 'IN_PROGRESS',
    createdAt,
    updatedAt: createdAt,
    ...overrides,
  };
};
