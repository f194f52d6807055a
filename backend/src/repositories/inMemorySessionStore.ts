import type { InterviewSession, SessionStore } from '../models/types';

/**
 * Process-local SessionStore. Every read and write goes through
 * `structuredClone`, so callers always work on snapshots.
 */
export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, InterviewSession>();

  async get(sessionId: string): Promise<InterviewSession | null> {
    const session = this.sessions.get(sessionId);
    return session ? structuredClone(session) : null;
  }

  async put(session: InterviewSession): Promise<void> {
    this.sessions.set(session.sessionId, structuredClone(session));
  }

  async listUnfinishedByResume(resumeId: number): Promise<InterviewSession[]> {
    return [...this.sessions.values()]
      .filter((s) => s.resumeId === resumeId && s.state !== 'COMPLETED')
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((s) => structuredClone(s));
  }
}
