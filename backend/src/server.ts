import { createApp } from './app';
import { createInterviewServices, type InterviewInfrastructure } from './config/container';
import { connectDatabase, disconnectDatabase } from './config/database';
import { connectRedis, disconnectRedis } from './config/redis';
import { interviewConfig, serverConfig, storageConfig } from './config/services';
import {
  InMemoryActiveSessionIndex,
  RedisActiveSessionIndex,
  redisClaimCommands,
} from './repositories/activeSessionIndex';
import { InMemorySessionStore } from './repositories/inMemorySessionStore';
import { BundledQuestionSource, QuestionRepository } from './repositories/questionRepository';
import { MongoSessionStore } from './repositories/sessionRepository';
import { GroqGradingClient } from './services/grading/groqGradingClient';
import { MarkdownReportRenderer } from './services/history/markdownReportRenderer';
import { scoringStrategies } from './services/report/reportAggregator';

const buildInfrastructure = async (): Promise<InterviewInfrastructure> => {
  const common = {
    gradingClient: new GroqGradingClient(),
    renderer: new MarkdownReportRenderer(),
    scoring: scoringStrategies[interviewConfig.scoring],
  };

  if (storageConfig.driver === 'memory') {
    console.warn('⚠️  In-memory storage: sessions are lost on restart');
    return {
      ...common,
      store: new InMemorySessionStore(),
      activeIndex: new InMemoryActiveSessionIndex(),
      questionSource: new BundledQuestionSource(),
    };
  }

  await connectDatabase();
  console.log('✓ MongoDB connected');
  const redis = await connectRedis();

  return {
    ...common,
    store: new MongoSessionStore(),
    activeIndex: new RedisActiveSessionIndex(redisClaimCommands(redis), storageConfig.activeClaimTtlSeconds),
    questionSource: new QuestionRepository(),
  };
};

const startServer = async () => {
  try {
    const services = createInterviewServices(await buildInfrastructure());
    const server = createApp(services).listen(serverConfig.port, () => {
      console.log(`✓ Server running on port ${serverConfig.port}`);
      console.log(`✓ Environment: ${serverConfig.environment}`);
    });

    const shutdown = (signal: string) => {
      console.log(`${signal} signal received: closing server gracefully`);
      server.close(() => {
        Promise.all([
          storageConfig.driver === 'mongo' ? disconnectDatabase() : Promise.resolve(),
          storageConfig.driver === 'mongo' ? disconnectRedis() : Promise.resolve(),
        ])
          .then(() => process.exit(0))
          .catch((error) => {
            console.error('Error during shutdown:', error);
            process.exit(1);
          });
      });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};

void startServer();
