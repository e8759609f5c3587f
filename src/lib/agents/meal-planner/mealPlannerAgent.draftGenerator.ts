/**
 * Draft generator: asks a JSON-capable model for a 3-day draft and parses it.
 *
 * Every failure surfaces as MealPlanDraftError so the orchestrator can fall
 * back without inspecting provider-specific errors.
 */

import {
  getGeminiClient,
  type JsonGenerator,
  type ModelPurpose,
} from '@/src/lib/ai/gemini/gemini.client';
import type { MealPlanDraft } from '@/src/lib/meal-plans/mealPlans.types';
import {
  MealPlanDraftError,
  parseMealPlanDraft,
} from './mealPlannerAgent.draft';
import { getMealPlanDraftJsonSchemaForGemini } from './mealPlannerAgent.gemini-schema';
import {
  buildMealPlanDraftPrompt,
  buildMealPlanOptimizePrompt,
  type DraftPromptPayload,
} from './mealPlannerAgent.prompts';

export type DraftRequestOptions = {
  signal?: AbortSignal;
};

export interface MealPlanDraftGenerator {
  generateDraft(
    payload: DraftPromptPayload,
    options?: DraftRequestOptions,
  ): Promise<MealPlanDraft>;
  /** payload.existingPlan carries the plan to improve */
  optimizeDraft(
    payload: DraftPromptPayload,
    options?: DraftRequestOptions,
  ): Promise<MealPlanDraft>;
}

export class GeminiMealPlanDraftGenerator implements MealPlanDraftGenerator {
  constructor(
    private readonly client: JsonGenerator = getGeminiClient(),
    private readonly temperature = 0.4,
  ) {}

  generateDraft(
    payload: DraftPromptPayload,
    options: DraftRequestOptions = {},
  ): Promise<MealPlanDraft> {
    return this.request(buildMealPlanDraftPrompt(payload), 'plan', options);
  }

  optimizeDraft(
    payload: DraftPromptPayload,
    options: DraftRequestOptions = {},
  ): Promise<MealPlanDraft> {
    return this.request(buildMealPlanOptimizePrompt(payload), 'optimize', options);
  }

  private async request(
    prompt: string,
    purpose: ModelPurpose,
    { signal }: DraftRequestOptions,
  ): Promise<MealPlanDraft> {
    let rawJson: string;
    try {
      rawJson = await this.client.generateJson({
        prompt,
        jsonSchema: getMealPlanDraftJsonSchemaForGemini(),
        temperature: this.temperature,
        purpose,
        abortSignal: signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new MealPlanDraftError('DRAFT_TIMEOUT', 'Draft request timed out', {
          cause: error,
        });
      }
      throw new MealPlanDraftError(
        'DRAFT_UNAVAILABLE',
        `Draft generator failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { cause: error },
      );
    }
    return parseMealPlanDraft(rawJson);
  }
}
