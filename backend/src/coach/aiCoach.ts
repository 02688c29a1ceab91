import OpenAI from 'openai';
import type { CoachingResult } from '@replay-coach/shared';
import type { CoachConfig } from '../config.js';
import { createLogger, errorMessage, Logger } from '../utils/logger.js';
import { buildCoachingPrompt, COACH_SYSTEM_PROMPT, CoachingInputs } from './coachingPrompt.js';

export const COACH_TEMPERATURE = 0.7;
export const COACH_MAX_TOKENS = 800;

export interface CoachMessage {
  role: 'system' | 'user';
  content: string;
}

export interface CoachCompletionRequest {
  model: string;
  messages: CoachMessage[];
  temperature: number;
  max_tokens: number;
}

export interface CoachCompletionResponse {
  choices: Array<{ message?: { content?: string | null } }>;
}

/**
 * The one chat call the coach makes. Tests substitute an in-process fake.
 */
export interface ChatCompleter {
  complete(request: CoachCompletionRequest): Promise<CoachCompletionResponse>;
}

export function createOpenAICompleter(config: CoachConfig): ChatCompleter {
  const openai = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
  return {
    complete: request =>
      openai.chat.completions.create({
        model: request.model,
        temperature: request.temperature,
        max_tokens: request.max_tokens,
        messages: request.messages.map(m =>
          m.role === 'system' ? { role: 'system' as const, content: m.content } : { role: 'user' as const, content: m.content }
        ),
      }),
  };
}

/**
 * LLM-backed coaching over an OpenAI-compatible chat endpoint (Groq by default).
 *
 * Never throws: a missing key is `unavailable`, any request failure is `failed`.
 */
export class AiCoach {
  private readonly completer: ChatCompleter | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly config: CoachConfig,
    opts?: { completer?: ChatCompleter; logger?: Logger }
  ) {
    this.logger = opts?.logger ?? createLogger('coach');
    if (opts?.completer) this.completer = opts.completer;
    else if (config.apiKey) this.completer = createOpenAICompleter(config);
  }

  get available(): boolean {
    return this.completer !== undefined;
  }

  async generateCoachingTips(inputs: CoachingInputs): Promise<CoachingResult> {
    if (!this.completer) {
      return { status: 'unavailable', reason: 'GROQ_API_KEY is not set' };
    }

    try {
      const response = await this.completer.complete({
        model: this.config.model,
        temperature: COACH_TEMPERATURE,
        max_tokens: COACH_MAX_TOKENS,
        messages: [
          { role: 'system', content: COACH_SYSTEM_PROMPT },
          { role: 'user', content: buildCoachingPrompt(inputs) },
        ],
      });

      const text = response.choices[0]?.message?.content?.trim();
      if (!text) {
        this.logger.warn('Coach returned an empty completion', { model: this.config.model });
        return { status: 'failed', error: 'Empty response from coaching model' };
      }
      return { status: 'ok', text, model: this.config.model };
    } catch (error) {
      this.logger.error('Coaching request failed', { model: this.config.model, error: errorMessage(error) });
      return { status: 'failed', error: errorMessage(error) };
    }
  }
}
