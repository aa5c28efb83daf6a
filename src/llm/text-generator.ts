/**
 * Text generation clients for free-text form answers
 *
 * Both providers speak the OpenAI chat-completions format. A rate-limited
 * request (HTTP 429) yields null so the caller can fall back to human review.
 */

import { getLogger } from '../log/logger';
import type { Credentials } from '../config';
import type { LLMSettings, TextGenerator } from '../types';

const logger = getLogger();

const OPENAI_URL = 'https://api.openai.com/v1/chat/completions';
const HUGGINGFACE_URL = 'https://router.huggingface.co/v1/chat/completions';

const SYSTEM_PROMPT =
  'You are helping a job applicant answer application form questions. ' +
  'Answer in the first person, concisely and truthfully, using only the facts provided. ' +
  'Return only the answer text.';

type FetchFn = typeof fetch;

/**
 * Pull `choices[0].message.content` out of a chat-completions response body
 */
export function extractCompletion(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('choices' in body)) return null;
  const choices = body.choices;
  if (!Array.isArray(choices) || choices.length === 0) return null;

  const first: unknown = choices[0];
  if (typeof first !== 'object' || first === null || !('message' in first)) return null;
  const message = first.message;
  if (typeof message !== 'object' || message === null || !('content' in message)) return null;

  return typeof message.content === 'string' ? message.content.trim() : null;
}

export class ChatCompletionGenerator implements TextGenerator {
  constructor(
    private readonly label: string,
    private readonly endpoint: string,
    private readonly apiKey: string,
    private readonly model: string,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  async generate(prompt: string, maxTokens: number, temperature: number): Promise<string | null> {
    const response = await this.fetchFn(this.endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        max_tokens: maxTokens,
        temperature,
        stream: false,
      }),
    });

    if (response.status === 429) {
      logger.warn(`[AI] ${this.label} rate limit reached, leaving answer for review`);
      return null;
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`${this.label} API error: ${response.status} - ${errorText}`);
    }

    const content = extractCompletion(await response.json());
    if (!content) {
      logger.debug(`[AI] ${this.label} returned an empty completion`);
      return null;
    }
    return content;
  }
}

/**
 * Build the configured generator, or null when the provider has no API key
 */
export function createTextGenerator(
  settings: LLMSettings,
  credentials: Credentials,
  fetchFn: FetchFn = fetch
): TextGenerator | null {
  if (settings.provider === 'huggingface') {
    if (!credentials.huggingfaceApiKey) {
      logger.warn('[AI] HUGGINGFACE API key not found. Set HUGGINGFACE_API_KEY environment variable.');
      return null;
    }
    return new ChatCompletionGenerator('Hugging Face', HUGGINGFACE_URL, credentials.huggingfaceApiKey, settings.model, fetchFn);
  }

  if (!credentials.openaiApiKey) {
    logger.warn('[AI] OPENAI API key not found. Set OPENAI_API_KEY environment variable.');
    return null;
  }
  return new ChatCompletionGenerator('OpenAI', OPENAI_URL, credentials.openaiApiKey, settings.model, fetchFn);
}

export default {
  createTextGenerator,
  extractCompletion,
};
