import { describe, it, expect } from 'vitest';
import {
  clampScore,
  parseLenient,
  parseStrict,
  repairRemotely,
  repairSyntax,
} from '../repairNormalizer';
import { createFakeGradingClient } from '../../../__tests__/fixtures';

const FENCED_WITH_PROSE = '```json\n{"score":80}\n```\nNote: nicely done';

describe('repairNormalizer', () => {
  describe('parseStrict()', () => {
    it('should parse a well-formed grading object', () => {
      const outcome = parseStrict('{"score":80,"feedback":"ok"}');

      expect(outcome.ok).toBe(true);
      if (outcome.ok) {
        expect(outcome.result).toEqual({ score: 80, feedback: 'ok' });
      }
    });

    it('should reject fenced output', () => {
      const outcome = parseStrict(FENCED_WITH_PROSE);

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error.kind).toBe('MalformedGradingOutput');
      }
    });

    it('should accept numeric strings as scores', () => {
      const outcome = parseStrict('{"score":"85","feedback":"solid"}');

      expect(outcome.ok && outcome.result.score).toBe(85);
    });

    it('should join feedback given as a list', () => {
      const outcome = parseStrict('{"score":60,"feedback":["clear","too short"]}');

      expect(outcome.ok && outcome.result.feedback).toBe('clear\ntoo short');
    });

    it('should default missing feedback to an empty string', () => {
      const outcome = parseStrict('{"score":60}');

      expect(outcome.ok && outcome.result.feedback).toBe('');
    });

    it('should only accept plain decimal strings as scores', () => {
      const outcome = parseStrict('{"score":" 72.5 "}');

      expect(outcome.ok && outcome.result.score).toBe(72.5);
      expect(parseStrict('{"score":"0x50"}').ok).toBe(false);
      expect(parseStrict('{"score":"1e2"}').ok).toBe(false);
      expect(parseStrict('{"score":"80%"}').ok).toBe(false);
    });

    it('should treat non-numeric scores as failures', () => {
      expect(parseStrict('{"score":"great"}').ok).toBe(false);
      expect(parseStrict('{"feedback":"no score"}').ok).toBe(false);
    });

    it('should treat scores far outside 0-100 as failures', () => {
      expect(parseStrict('{"score":150}').ok).toBe(false);
      expect(parseStrict('{"score":-20}').ok).toBe(false);
    });

    it('should let scores just outside the range through for clamping', () => {
      const outcome = parseStrict('{"score":103}');

      expect(outcome.ok && outcome.result.score).toBe(103);
    });

    it('should reject JSON that is not an object', () => {
      expect(parseStrict('[80]').ok).toBe(false);
      expect(parseStrict('80').ok).toBe(false);
      expect(parseStrict('null').ok).toBe(false);
    });
  });

  describe('repairSyntax()', () => {
    it('should strip code fences and trailing prose', () => {
      expect(repairSyntax(FENCED_WITH_PROSE)).toBe('{"score":80}');
    });

    it('should drop prose before the object', () => {
      expect(repairSyntax('Here is my grade: {"score": 70} Thanks!')).toBe('{"score": 70}');
    });

    it('should close an unterminated string and brace', () => {
      expect(repairSyntax('{"score": 75, "feedback": "good depth')).toBe(
        '{"score": 75, "feedback": "good depth"}'
      );
    });

    it('should remove trailing commas', () => {
      expect(repairSyntax('{"score": 60, "feedback": "fine",}')).toBe('{"score": 60, "feedback": "fine"}');
    });

    it('should ignore braces inside strings', () => {
      expect(repairSyntax('{"score": 90, "feedback": "uses {} well"} trailing')).toBe(
        '{"score": 90, "feedback": "uses {} well"}'
      );
    });

    it('should leave commas and brackets inside strings alone', () => {
      expect(repairSyntax('{"score": 80, "feedback": "Good, ]"')).toBe('{"score": 80, "feedback": "Good, ]"}');
      expect(repairSyntax('{"score": 70, "feedback": "a, b",}')).toBe('{"score": 70, "feedback": "a, b"}');
    });

    it('should close a list with the bracket it was opened with', () => {
      expect(repairSyntax('{"score": 80, "tags": ["a", "b"}')).toBe('{"score": 80, "tags": ["a", "b"]}');
      expect(repairSyntax('{"tags": ["a"}, "score": 65}')).toBe('{"tags": ["a"], "score": 65}');
    });

    it('should drop a key whose value was cut off', () => {
      expect(repairSyntax('{"score": 80, "feedback":')).toBe('{"score": 80}');
      expect(repairSyntax('{"score": 80, "feedb')).toBe('{"score": 80}');
      expect(repairSyntax('{"sco')).toBe('{}');
    });

    it('should close a list that was cut off inside an object', () => {
      expect(repairSyntax('{"score": 55, "feedback": ["clear", ')).toBe('{"score": 55, "feedback": ["clear"]}');
    });

    it('should drop a dangling escape before closing the string', () => {
      expect(repairSyntax('{"score": 90, "feedback": "uses \\')).toBe('{"score": 90, "feedback": "uses "}');
    });

    it('should drop a closing fence after a truncated object', () => {
      expect(repairSyntax('```json\n{"score": 61\n```')).toBe('{"score": 61}');
    });

    it('should return null when there is no object', () => {
      expect(repairSyntax('no json here')).toBeNull();
    });
  });

  describe('parseLenient()', () => {
    it('should parse fenced output through the syntactic repair', () => {
      const outcome = parseLenient(FENCED_WITH_PROSE);

      expect(outcome.ok).toBe(true);
      if (outcome.ok) {
        expect(outcome.result).toEqual({ score: 80, feedback: '' });
      }
    });

    it('should keep feedback text intact while repairing', () => {
      const outcome = parseLenient('{"score": 80, "feedback": "Good, ]"');

      expect(outcome.ok && outcome.result).toEqual({ score: 80, feedback: 'Good, ]' });
    });

    it('should keep the original text on failure', () => {
      const outcome = parseLenient('still garbage');

      expect(outcome.ok).toBe(false);
      expect(outcome.text).toBe('still garbage');
    });
  });

  describe('repairRemotely()', () => {
    it('should send the prompt and broken text to the grader and parse its reply', async () => {
      const { client, repair } = createFakeGradingClient();
      repair.mockResolvedValue('{"score": 55, "feedback": "fixed"}');

      const outcome = await repairRemotely(client, 'the prompt', 'broken');

      expect(repair).toHaveBeenCalledWith('the prompt', 'broken');
      expect(outcome.ok && outcome.result).toEqual({ score: 55, feedback: 'fixed' });
    });

    it('should return the corrected reply as received', async () => {
      const { client, repair } = createFakeGradingClient();
      repair.mockResolvedValue('```json\n{"score": 55}\n```');

      const outcome = await repairRemotely(client, 'p', 'b');

      expect(outcome.ok && outcome.result.score).toBe(55);
      expect(outcome.text).toBe('```json\n{"score": 55}\n```');
    });

    it('should propagate grader failures', async () => {
      const { client, repair } = createFakeGradingClient();
      repair.mockRejectedValue(new Error('socket hang up'));

      await expect(repairRemotely(client, 'p', 'b')).rejects.toThrow('socket hang up');
    });
  });

  describe('clampScore()', () => {
    it('should clamp to 0-100', () => {
      expect(clampScore(103)).toBe(100);
      expect(clampScore(-2)).toBe(0);
      expect(clampScore(64)).toBe(64);
    });
  });
});
