import Question from '../models/Question';
import type { Question as SessionQuestion, QuestionDifficulty, QuestionRequest, QuestionSource } from '../models/types';
import { InterviewError } from '../utils/errors';
import questionBank from '../data/questions.json';

export interface BankQuestion {
  questionId: string;
  prompt: string;
  difficulty: QuestionDifficulty;
  topicHints: string[];
  category: string;
}

const difficulties: ReadonlyArray<QuestionDifficulty> = ['Easy', 'Medium', 'Hard'];

const toDifficulty = (value: string): QuestionDifficulty =>
  difficulties.find((d) => d === value) ?? 'Medium';

export const bundledQuestions: BankQuestion[] = questionBank.map((q) => ({
  ...q,
  difficulty: toDifficulty(q.difficulty),
}));

const toSessionQuestions = (rows: BankQuestion[]): SessionQuestion[] =>
  rows.map((row, index) => ({
    index,
    prompt: row.prompt,
    topicHints: [...row.topicHints],
    category: row.category,
    difficulty: row.difficulty,
  }));

const assertEnough = (available: number, request: QuestionRequest) => {
  if (available < request.questionCount) {
    throw new InterviewError(
      'InsufficientData',
      `Only ${available} questions match the request, ${request.questionCount} requested`
    );
  }
};

/** Question bank stored in MongoDB; samples a random ordered set per session. */
export class QuestionRepository implements QuestionSource {
  async getQuestions(request: QuestionRequest): Promise<SessionQuestion[]> {
    const match: Record<string, unknown> = { isActive: true };
    if (request.difficulty) match.difficulty = request.difficulty;
    if (request.category) match.category = request.category;

    const rows = await Question.aggregate<BankQuestion>([
      { $match: match },
      { $sample: { size: request.questionCount } },
    ]);
    assertEnough(rows.length, request);

    return toSessionQuestions(rows.map((row) => ({ ...row, topicHints: row.topicHints ?? [] })));
  }

  async upsert(question: BankQuestion): Promise<void> {
    await Question.updateOne(
      { questionId: question.questionId },
      { $set: { ...question, isActive: true } },
      { upsert: true }
    );
  }
}

/**
 * Serves the bundled bank in file order, filtered like the MongoDB source.
 * Used with the in-memory storage driver.
 */
export class BundledQuestionSource implements QuestionSource {
  constructor(private readonly bank: BankQuestion[] = bundledQuestions) {}

  async getQuestions(request: QuestionRequest): Promise<SessionQuestion[]> {
    const rows = this.bank.filter(
      (q) =>
        (!request.difficulty || q.difficulty === request.difficulty) &&
        (!request.category || q.category === request.category)
    );
    assertEnough(rows.length, request);
    return toSessionQuestions(rows.slice(0, request.questionCount));
  }
}
