import type { ActiveSessionIndex, GradingClient, QuestionSource, ReportRenderer, SessionStore } from '../models/types';
import { AnswerEvaluator } from '../services/evaluation/answerEvaluator';
import { InterviewHistoryService } from '../services/history/interviewHistoryService';
import { SessionLifecycleManager } from '../services/interview-orchestrator/sessionLifecycleManager';
import { meanScoring, ReportAggregator, type ScoringStrategy, SessionReportBuilder } from '../services/report/reportAggregator';

export interface InterviewInfrastructure {
  store: SessionStore;
  activeIndex: ActiveSessionIndex;
  questionSource: QuestionSource;
  gradingClient: GradingClient;
  renderer: ReportRenderer;
  scoring?: ScoringStrategy;
  now?: () => Date;
}

export interface InterviewServices {
  lifecycle: SessionLifecycleManager;
  evaluator: AnswerEvaluator;
  reports: ReportAggregator;
  history: InterviewHistoryService;
}

export const createInterviewServices = (infra: InterviewInfrastructure): InterviewServices => {
  const reportBuilder = new SessionReportBuilder(infra.scoring ?? meanScoring, infra.now);
  const lifecycle = new SessionLifecycleManager({
    store: infra.store,
    activeIndex: infra.activeIndex,
    questionSource: infra.questionSource,
    reportBuilder,
    now: infra.now,
  });
  const reports = new ReportAggregator(lifecycle, reportBuilder);

  return {
    lifecycle,
    evaluator: new AnswerEvaluator(lifecycle, infra.gradingClient),
    reports,
    history: new InterviewHistoryService(lifecycle, reports, infra.renderer),
  };
};
