import dotenv from 'dotenv';
dotenv.config();

export type StorageDriver = 'mongo' | 'memory';
export type ScoringStrategyName = 'mean' | 'coverage';

const readInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const groqConfig = {
  apiKey: process.env.GROQ_API_KEY || '',
  model: process.env.GROQ_MODEL || 'llama-3.3-70b-versatile',
  temperature: 0.2,
  maxTokens: 800,
};

const storageDriver: StorageDriver = process.env.STORAGE_DRIVER === 'memory' ? 'memory' : 'mongo';
const scoringStrategy: ScoringStrategyName =
  process.env.REPORT_SCORING === 'coverage' ? 'coverage' : 'mean';

export const storageConfig = {
  driver: storageDriver,
  mongoUri: process.env.MONGODB_URI || 'mongodb://localhost:27017/mock-interview',
  // Seconds; defaults to one week.
  activeClaimTtlSeconds: readInt(process.env.ACTIVE_CLAIM_TTL_SECONDS, 7 * 24 * 3600),
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: readInt(process.env.REDIS_PORT, 6379),
    password: process.env.REDIS_PASSWORD || undefined,
  },
};

export const interviewConfig = {
  defaultQuestionCount: readInt(process.env.DEFAULT_QUESTION_COUNT, 5),
  maxQuestionCount: readInt(process.env.MAX_QUESTION_COUNT, 20),
  scoring: scoringStrategy,
};

export const serverConfig = {
  port: readInt(process.env.PORT, 5000),
  frontendUrl: process.env.FRONTEND_URL || 'http://localhost:3000',
  environment: process.env.NODE_ENV || 'development',
};

// Validate configuration
if (!groqConfig.apiKey) {
  console.warn('⚠️  Groq API key is missing. Answers will be recorded as degraded.');
}
