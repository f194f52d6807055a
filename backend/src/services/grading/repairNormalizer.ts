import type { GradingClient } from '../../models/types';
import { InterviewError } from '../../utils/errors';

export interface GradingResult {
  /** As reported by the grader; may sit up to SCORE_CLAMP_TOLERANCE outside [0, 100]. */
  score: number;
  feedback: string;
}

export type ParseOutcome =
  | { ok: true; result: GradingResult; text: string }
  | { ok: false; error: InterviewError; text: string };

/** How far outside [0, 100] a score may be and still count as a slip of the grader. */
export const SCORE_CLAMP_TOLERANCE = 5;

const malformed = (text: string, reason: string): ParseOutcome => ({
  ok: false,
  error: new InterviewError('MalformedGradingOutput', reason),
  text,
});

/** Decimal notation only; hex and exponent forms are not scores. */
const PLAIN_NUMBER = /^-?\d+(\.\d+)?$/;

const toScore = (value: unknown): number | null => {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && PLAIN_NUMBER.test(value.trim())) {
    return Number(value.trim());
  }
  return null;
};

const toFeedback = (value: unknown): string => {
  if (typeof value === 'string') return value.trim();
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string').join('\n');
  }
  return '';
};

export const clampScore = (score: number): number => Math.min(100, Math.max(0, score));

/** Stage 1: the text must be a JSON object with a usable score. */
export const parseStrict = (text: string): ParseOutcome => {
  let value: unknown;
  try {
    value = JSON.parse(text.trim());
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return malformed(text, `Grader output is not valid JSON: ${detail}`);
  }

  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return malformed(text, 'Grader output is not a JSON object');
  }

  const fields = new Map(Object.entries(value));
  const score = toScore(fields.get('score'));
  if (score === null) {
    return malformed(text, 'Grader output has no numeric score');
  }
  if (score < -SCORE_CLAMP_TOLERANCE || score > 100 + SCORE_CLAMP_TOLERANCE) {
    return malformed(text, `Grader score ${score} is out of range`);
  }

  return { ok: true, result: { score, feedback: toFeedback(fields.get('feedback')) }, text };
};

const TRAILING_COMMA = /,\s*$/;
/** A key string, with or without its colon, at the end of an object whose value never arrived. */
const DANGLING_KEY = /([{,])\s*"(?:[^"\\]|\\.)*"\s*:?\s*$/;

/**
 * Stage 2 transform: keeps the first JSON object and discards whatever prose
 * or code fence surrounds it. Outside strings it removes trailing commas and
 * replaces a mismatched closer with the one the structure expects. A truncated
 * reply gets its string, dangling key and open brackets closed off. Null when
 * there is no object to salvage.
 */
export const repairSyntax = (raw: string): string | null => {
  const start = raw.indexOf('{');
  if (start === -1) return null;
  const body = raw.slice(start).replace(/```\s*$/, '');

  const closers: string[] = [];
  let out = '';
  let inString = false;
  let escaped = false;

  for (const ch of body) {
    if (inString) {
      out += ch;
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '}' || ch === ']') {
      out = out.replace(TRAILING_COMMA, '') + (closers.pop() ?? ch);
      if (closers.length === 0) return out;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') closers.push('}');
    else if (ch === '[') closers.push(']');
    out += ch;
  }

  if (inString) {
    if (escaped) out = out.slice(0, -1);
    out += '"';
  }
  if (closers[closers.length - 1] === '}') {
    out = out.replace(DANGLING_KEY, (_match, lead: string) => (lead === '{' ? '{' : ''));
  }
  return out.trimEnd().replace(TRAILING_COMMA, '') + closers.reverse().join('');
};

/** Strict parse, falling back to a syntactic repair of the same text. */
export const parseLenient = (text: string): ParseOutcome => {
  const strict = parseStrict(text);
  if (strict.ok) return strict;

  const repaired = repairSyntax(text);
  if (repaired === null) return strict;
  const outcome = parseStrict(repaired);
  return outcome.ok ? outcome : { ...strict, error: outcome.error };
};

/** Stage 3: ask the grader to fix its own output, then parse once more. `text` is the reply as received. */
export const repairRemotely = async (
  client: GradingClient,
  prompt: string,
  brokenText: string
): Promise<ParseOutcome> => {
  const repairedText = await client.repair(prompt, brokenText);
  return { ...parseLenient(repairedText), text: repairedText };
};
