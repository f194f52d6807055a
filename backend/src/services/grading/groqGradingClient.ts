import Groq from 'groq-sdk';
import { groqConfig } from '../../config/services';
import type { GradingClient } from '../../models/types';
import { InterviewError } from '../../utils/errors';

const GRADER_SYSTEM_PROMPT =
  'You are an experienced technical interviewer grading one answer of a mock interview. ' +
  'Reply with a single JSON object and nothing else.';

const REPAIR_SYSTEM_PROMPT =
  'You fix malformed JSON. Reply with the corrected JSON object only, without code fences or commentary.';

export interface GroqGradingOptions {
  apiKey?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export class GroqGradingClient implements GradingClient {
  private groq: Groq;
  private model: string;
  private temperature: number;
  private maxTokens: number;

  constructor(options: GroqGradingOptions = {}) {
    this.groq = new Groq({ apiKey: options.apiKey ?? groqConfig.apiKey });
    this.model = options.model ?? groqConfig.model;
    this.temperature = options.temperature ?? groqConfig.temperature;
    this.maxTokens = options.maxTokens ?? groqConfig.maxTokens;
  }

  async grade(prompt: string): Promise<string> {
    return this.complete(GRADER_SYSTEM_PROMPT, prompt);
  }

  async repair(prompt: string, brokenText: string): Promise<string> {
    const request = `
The following grading reply was supposed to be JSON of the form {"score": <0-100>, "feedback": "<text>"} but could not be parsed.

**Original grading request:**
${prompt}

**Broken reply:**
${brokenText}

Return ONLY the corrected JSON object.
    `.trim();
    return this.complete(REPAIR_SYSTEM_PROMPT, request);
  }

  private async complete(system: string, user: string): Promise<string> {
    try {
      const completion = await this.groq.chat.completions.create({
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: user },
        ],
        model: this.model,
        temperature: this.temperature,
        max_tokens: this.maxTokens,
      });

      // An empty reply is malformed output, not a network failure.
      return completion.choices[0]?.message?.content ?? '';
    } catch (error) {
      console.error('Grading request failed:', error);
      throw new InterviewError('TransientGradingFailure', 'Grading service request failed', { cause: error });
    }
  }
}
