import { Schema, Type } from '@google/genai';
import { z } from 'zod';
import { DesignBlueprint, DesignCategory } from '../types';
import { AnalysisFailure } from './errors';

export const DESIGN_CATEGORIES = ['Art Piece', 'Small Furniture', 'Accessory', 'Tool'] as const satisfies readonly DesignCategory[];

export const MIN_UPCYCLE_SCORE = 1;
export const MAX_UPCYCLE_SCORE = 10;

const materialSchema: Schema = {
  type: Type.OBJECT,
  properties: {
    name: { type: Type.STRING, description: 'e.g., Plastic Bottle Caps, Copper Wire' },
    quantity: { type: Type.STRING, description: 'e.g., ~50 units, ~3 meters' }
  },
  required: ['name', 'quantity']
};

/**
 * Response schema handed to Gemini. `visualizationPrompt` is requested alongside the
 * blueprint but is split off before the blueprint is stored.
 */
export const blueprintResponseSchema: Schema = {
  type: Type.OBJECT,
  properties: {
    title: { type: Type.STRING, description: 'A creative name for the upcycled project.' },
    category: {
      type: Type.STRING,
      enum: [...DESIGN_CATEGORIES],
      description: 'The category of the final upcycled object.'
    },
    materials: {
      type: Type.ARRAY,
      items: materialSchema,
      description: 'The core materials visible in the image with estimated quantities.'
    },
    assemblySummary: {
      type: Type.STRING,
      description: 'A concise, step-by-step summary of how to build the design.'
    },
    upcycleScore: {
      type: Type.INTEGER,
      minimum: MIN_UPCYCLE_SCORE,
      maximum: MAX_UPCYCLE_SCORE,
      description: 'A feasibility score (1-10) based on material quality and complexity. Higher is better.'
    },
    visualizationPrompt: {
      type: Type.STRING,
      description: 'A detailed text-to-image prompt describing the finished object, its materials, colors and setting.'
    }
  },
  required: ['title', 'category', 'materials', 'assemblySummary', 'upcycleScore', 'visualizationPrompt']
};

const requiredText = z.string().trim().min(1);

const numberSteps = (steps: string[]): string =>
  steps
    .map((step) => step.trim())
    .filter((step) => step.length > 0)
    .map((step, i) => `${i + 1}. ${step}`)
    .join('\n');

export const designBlueprintSchema: z.ZodType<DesignBlueprint, z.ZodTypeDef, unknown> = z.object({
  title: requiredText,
  category: z.enum(DESIGN_CATEGORIES),
  materials: z
    .array(z.object({ name: requiredText, quantity: requiredText }))
    .min(1, 'at least one material is required'),
  // Some responses list the steps instead of summarizing them.
  assemblySummary: z
    .union([z.string(), z.array(z.string())])
    .transform((value) => (typeof value === 'string' ? value.trim() : numberSteps(value)))
    .pipe(requiredText),
  upcycleScore: z.number().int().min(MIN_UPCYCLE_SCORE).max(MAX_UPCYCLE_SCORE)
});

const visualizationPromptSchema = z
  .string()
  .nullish()
  .transform((value) => value?.trim() || null);

const promptEnvelopeSchema = z.object({ visualizationPrompt: visualizationPromptSchema });

const stripCodeFence = (text: string): string => {
  const fenced = text.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced ? fenced[1] : text.trim();
};

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

export interface ParsedBlueprintResponse {
  blueprint: DesignBlueprint;
  visualizationPrompt: string | null;
}

/**
 * Parses the model's JSON text into a validated blueprint and its visualization prompt.
 * Throws a MalformedOutput failure carrying the raw text when either step fails.
 */
export const parseBlueprintResponse = (text: string): ParsedBlueprintResponse => {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFence(text));
  } catch (e) {
    throw new AnalysisFailure('MalformedOutput', 'Response is not valid JSON', { rawText: text, cause: e });
  }

  const blueprint = designBlueprintSchema.safeParse(data);
  if (!blueprint.success) {
    throw new AnalysisFailure('MalformedOutput', `Blueprint does not match the schema: ${formatIssues(blueprint.error)}`, {
      rawText: text,
      cause: blueprint.error
    });
  }

  const prompt = promptEnvelopeSchema.safeParse(data);

  return {
    blueprint: blueprint.data,
    visualizationPrompt: prompt.success ? prompt.data.visualizationPrompt : null
  };
};
