import { connectDatabase, disconnectDatabase } from '../config/database';
import { bundledQuestions, QuestionRepository } from '../repositories/questionRepository';

const seed = async () => {
  try {
    await connectDatabase();
    const repository = new QuestionRepository();

    for (const question of bundledQuestions) {
      await repository.upsert(question);
    }

    console.log(`✓ Seeded ${bundledQuestions.length} questions`);
  } catch (error) {
    console.error('❌ Failed to seed questions:', error);
    process.exitCode = 1;
  } finally {
    await disconnectDatabase();
  }
};

void seed();
