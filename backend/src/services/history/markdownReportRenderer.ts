import type { InterviewDetail, RenderedReport, ReportRenderer } from '../../models/types';

const formatScore = (score: number | null) => (score === null ? 'n/a' : String(score));

/**
 * Plain Markdown rendering of an interview detail. A PDF renderer plugs in
 * behind the same ReportRenderer interface.
 */
export class MarkdownReportRenderer implements ReportRenderer {
  async render(detail: InterviewDetail): Promise<RenderedReport> {
    const lines: string[] = [
      `# Mock Interview Report`,
      '',
      `- Session: ${detail.sessionId}`,
      `- Resume: ${detail.resumeId}`,
      `- State: ${detail.state}`,
      `- Started: ${detail.createdAt.toISOString()}`,
    ];
    if (detail.completedAt) lines.push(`- Completed: ${detail.completedAt.toISOString()}`);

    if (detail.report) {
      lines.push('', `## Overall score: ${detail.report.overallScore}`, '', detail.report.summary);
    }

    for (const question of detail.questions) {
      lines.push('', `## Q${question.index + 1}. ${question.prompt}`, '');
      if (!question.answer || question.answer.status === 'draft') {
        lines.push('_Not answered._');
        continue;
      }
      lines.push(
        `**Score:** ${formatScore(question.answer.score)}`,
        '',
        '**Answer:**',
        '',
        question.answer.answerText,
        '',
        `**Feedback:** ${question.answer.feedback || 'n/a'}`
      );
    }

    return {
      contentType: 'text/markdown; charset=utf-8',
      fileExtension: 'md',
      body: Buffer.from(lines.join('\n') + '\n', 'utf-8'),
    };
  }
}
