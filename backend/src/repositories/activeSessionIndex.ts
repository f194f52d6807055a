import type { RedisClient } from '../config/redis';
import type { ActiveSessionIndex } from '../models/types';

/** The redis commands the claim index issues. */
export interface ClaimCommands {
  set(key: string, value: string, options: { NX: true; EX: number }): Promise<string | null>;
  get(key: string): Promise<string | null>;
  eval(script: string, options: { keys: string[]; arguments: string[] }): Promise<unknown>;
}

export const redisClaimCommands = (redis: RedisClient): ClaimCommands => ({
  set: (key, value, options) => redis.set(key, value, options),
  get: (key) => redis.get(key),
  eval: (script, options) => redis.eval(script, options),
});

// Deletes the claim only while it still names the releasing session.
const RELEASE_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

export const activeClaimKey = (resumeId: number) => `interview:active:${resumeId}`;

/**
 * Claims expire after `ttlSeconds` so a crashed process cannot hold a resume
 * for good; the lifecycle manager checks the session store before trusting a
 * fresh claim.
 */
export class RedisActiveSessionIndex implements ActiveSessionIndex {
  constructor(
    private readonly redis: ClaimCommands,
    private readonly ttlSeconds: number
  ) {}

  async claim(resumeId: number, sessionId: string): Promise<boolean> {
    const result = await this.redis.set(activeClaimKey(resumeId), sessionId, {
      NX: true,
      EX: this.ttlSeconds,
    });
    return result === 'OK';
  }

  async lookup(resumeId: number): Promise<string | null> {
    return this.redis.get(activeClaimKey(resumeId));
  }

  async release(resumeId: number, sessionId: string): Promise<void> {
    await this.redis.eval(RELEASE_SCRIPT, { keys: [activeClaimKey(resumeId)], arguments: [sessionId] });
  }
}

export class InMemoryActiveSessionIndex implements ActiveSessionIndex {
  private claims = new Map<number, string>();

  async claim(resumeId: number, sessionId: string): Promise<boolean> {
    if (this.claims.has(resumeId)) return false;
    this.claims.set(resumeId, sessionId);
    return true;
  }

  async lookup(resumeId: number): Promise<string | null> {
    return this.claims.get(resumeId) ?? null;
  }

  async release(resumeId: number, sessionId: string): Promise<void> {
    if (this.claims.get(resumeId) === sessionId) {
      this.claims.delete(resumeId);
    }
  }
}
