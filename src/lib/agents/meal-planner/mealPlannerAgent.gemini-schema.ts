/**
 * JSON schema for the draft response, safe for Gemini API.
 *
 * Gemini enforces a maximum nesting depth on response_json_schema. Inlining
 * days → meals → parts exceeds it, so Day, Meal and Part are emitted as
 * definitions referenced via $ref. The root is the schema object itself
 * (not a $ref) so Gemini does not report "reference to undefined schema at
 * top-level".
 */

import { zodToJsonSchema } from 'zod-to-json-schema';
import {
  draftDayResponseSchema,
  draftMealResponseSchema,
  draftPartResponseSchema,
  mealPlanDraftResponseSchema,
} from './mealPlannerAgent.draft';

export type GeminiMealPlanDraftJsonSchema = Record<string, unknown>;

const ROOT_NAME = 'MealPlanDraftResponse';

let cachedSchema: GeminiMealPlanDraftJsonSchema | null = null;

export function getMealPlanDraftJsonSchemaForGemini(): GeminiMealPlanDraftJsonSchema {
  if (cachedSchema) return cachedSchema;

  const { definitions = {} } = zodToJsonSchema(mealPlanDraftResponseSchema, {
    name: ROOT_NAME,
    target: 'openApi3',
    definitionPath: 'definitions',
    definitions: {
      Day: draftDayResponseSchema,
      Meal: draftMealResponseSchema,
      Part: draftPartResponseSchema,
    },
  });
  const { [ROOT_NAME]: root, ...nested } = definitions;

  cachedSchema = { ...root, definitions: nested };
  return cachedSchema;
}
