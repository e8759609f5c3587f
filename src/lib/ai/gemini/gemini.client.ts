/**
 * Gemini Client - wrapper for the Google Gemini API (JSON output only)
 *
 * Models are configured via env (.env.local for the scripts). No model names
 * are hardcoded in call sites.
 *
 * Environment variables (all optional except GEMINI_API_KEY):
 *   GEMINI_API_KEY             - Required when the client is used
 *   GEMINI_MODEL               - Default model (fallback when purpose-specific is unset)
 *   GEMINI_MODEL_PLAN          - Meal plan drafts (create)
 *   GEMINI_MODEL_HIGH_ACCURACY - Plan optimization
 *   GEMINI_MAX_OUTPUT_TOKENS   - Max tokens per response (default 8192)
 */

import { GoogleGenAI } from '@google/genai';

/**
 * Model selection policy (each maps to an env var)
 */
export type ModelPurpose = 'plan' | 'optimize';

export type GenerateJsonArgs = {
  prompt: string;
  jsonSchema: object;
  temperature?: number;
  purpose?: ModelPurpose;
  maxOutputTokens?: number;
  /** Aborts the request and any pending retry */
  abortSignal?: AbortSignal;
};

/** Anything that turns a prompt + schema into raw JSON text. */
export interface JsonGenerator {
  generateJson(args: GenerateJsonArgs): Promise<string>;
}

function isRateLimitMessage(message: string): boolean {
  return (
    message.includes('429') ||
    message.includes('RESOURCE_EXHAUSTED') ||
    message.includes('quota') ||
    message.includes('rate limit') ||
    message.includes('RPM')
  );
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Gemini request aborted'));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('Gemini request aborted'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class GeminiClient implements JsonGenerator {
  private ai: GoogleGenAI;
  private model: string;
  private maxOutputTokens: number;

  constructor() {
    const apiKey = process.env.GEMINI_API_KEY;
    if (!apiKey) {
      throw new Error(
        'GEMINI_API_KEY environment variable is required. ' +
          'Please set it in your .env.local file.',
      );
    }

    this.ai = new GoogleGenAI({ apiKey });
    this.model = process.env.GEMINI_MODEL ?? 'gemini-2.0-flash';
    const parsedMax = parseInt(process.env.GEMINI_MAX_OUTPUT_TOKENS ?? '', 10);
    this.maxOutputTokens = Number.isFinite(parsedMax) && parsedMax > 0 ? parsedMax : 8192;
  }

  /**
   * Get model name for a purpose. Uses env: GEMINI_MODEL_<PURPOSE> or GEMINI_MODEL.
   */
  getModelName(purpose: ModelPurpose = 'plan'): string {
    switch (purpose) {
      case 'plan':
        return process.env.GEMINI_MODEL_PLAN ?? this.model;
      case 'optimize':
        return process.env.GEMINI_MODEL_HIGH_ACCURACY ?? this.model;
      default:
        return this.model;
    }
  }

  /**
   * Generate JSON content from a prompt with schema enforcement.
   * Rate limits are retried with exponential backoff (max 3 retries).
   *
   * @returns Raw JSON string from the model
   */
  async generateJson(args: GenerateJsonArgs): Promise<string> {
    const {
      prompt,
      jsonSchema,
      temperature = 0.4,
      purpose = 'plan',
      maxOutputTokens: maxTokensOverride,
      abortSignal,
    } = args;

    const modelName = this.getModelName(purpose);
    const maxTokens = maxTokensOverride ?? this.maxOutputTokens;

    const maxRetries = 3;
    const baseDelayMs = 2000;
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        const response = await this.ai.models.generateContent({
          model: modelName,
          contents: prompt,
          config: {
            responseMimeType: 'application/json',
            responseJsonSchema: jsonSchema,
            temperature,
            maxOutputTokens: maxTokens,
            abortSignal,
          },
        });

        const text = response.text;
        if (!text) {
          throw new Error('Empty response from Gemini API');
        }

        return text;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        const errorMessage = lastError.message;

        if (abortSignal?.aborted) {
          throw new Error('Gemini request aborted', { cause: lastError });
        }

        const isRateLimit = isRateLimitMessage(errorMessage);

        if (isRateLimit && attempt < maxRetries) {
          const delayMs = baseDelayMs * Math.pow(2, attempt);
          console.warn(
            `[GeminiClient] generateJson rate limit (attempt ${attempt + 1}/${maxRetries + 1}), retrying in ${delayMs}ms...`,
          );
          await wait(delayMs, abortSignal);
          continue;
        }

        if (!isRateLimit) {
          console.error('[GeminiClient] generateJson error:', errorMessage);
          throw new Error(
            `Gemini API error: ${errorMessage}. ` +
              'Check your API key and model configuration.',
          );
        }

        const retryMatch =
          errorMessage.match(/retry.*?(\d+)\s*s/i) ||
          errorMessage.match(/(\d+)\s*second/i);
        const retrySeconds = retryMatch ? parseInt(retryMatch[1], 10) : null;
        const retryInfo = retrySeconds
          ? ` Please retry in ${retrySeconds} seconds.`
          : ' Please wait a moment and try again.';

        throw new Error(
          `Gemini API quota exceeded (rate limit).${retryInfo} ` +
            'For more info: https://ai.google.dev/gemini-api/docs/rate-limits',
        );
      }
    }

    throw lastError || new Error('Unknown error from Gemini API');
  }
}

let clientInstance: GeminiClient | null = null;

/**
 * Get or create the Gemini client instance
 */
export function getGeminiClient(): GeminiClient {
  if (!clientInstance) {
    clientInstance = new GeminiClient();
  }
  return clientInstance;
}

export function isGeminiConfigured(): boolean {
  return Boolean(process.env.GEMINI_API_KEY);
}
