import { FinishReason, GenerateContentParameters, GenerateContentResponse, GoogleGenAI } from "@google/genai";
import { AnalysisResult, UploadedItem } from "../types";
import { logger } from "../utils/logger";
import { AnalysisCache, AnalysisCacheKey } from "./analysisCache";
import { blueprintResponseSchema, parseBlueprintResponse } from "./blueprintSchema";
import { ANALYZER_CONFIG, AnalyzerConfig } from "./config";
import { AnalysisFailure } from "./errors";
import { decodeImage, sha256Hex } from "./imageUtils";
import { withTimeout } from "./timeout";

/**
 * The slice of `GoogleGenAI#models` the analyzer needs.
 */
export interface ContentGenerator {
  generateContent(params: GenerateContentParameters): Promise<GeminiResponse>;
}

export type GeminiResponse = Pick<GenerateContentResponse, 'text' | 'candidates' | 'promptFeedback'>;

export interface DesignAnalyzer {
  analyze(item: UploadedItem): Promise<AnalysisResult>;
  /** Drops cached analyses of one item. */
  forget(itemId: string): void;
  /** Drops cached analyses of every item except this one. */
  retainOnly(itemId: string): void;
}

export interface DesignAnalyzerOptions {
  models: ContentGenerator;
  config?: AnalyzerConfig;
  cache?: AnalysisCache;
}

export const DESIGN_INSTRUCTION = `
    You are an expert industrial designer specializing in sustainable upcycling. Your goal is to help upcycle waste.

    1. ANALYZE the image and strictly identify the specific waste materials present (e.g., plastic bottles, cardboard, wood scrap).
    2. DESIGN ONE creative upcycling project using ONLY the materials found in the image, plus basic tools and adhesives.
    3. Do NOT invent objects or materials that are not clearly visible in the input image.
    4. Write a 'visualizationPrompt' for an AI image generator that describes the finished object, its materials, colors and setting.
    5. Output a JSON blueprint strictly matching the provided schema, with no text outside the JSON object.
  `;

// Finish reasons that mean a content filter stopped the candidate.
const SAFETY_FINISH_REASONS: ReadonlySet<FinishReason> = new Set([
  FinishReason.SAFETY,
  FinishReason.IMAGE_SAFETY,
  FinishReason.PROHIBITED_CONTENT,
  FinishReason.BLOCKLIST,
  FinishReason.SPII
]);

const describeEmptyResponse = (response: GeminiResponse): AnalysisFailure => {
  const blockReason = response.promptFeedback?.blockReason;
  if (blockReason) {
    return new AnalysisFailure('EmptyResponse', `Prompt blocked by the safety filter (block reason: ${blockReason})`, {
      reason: 'Safety'
    });
  }

  const finishReason = response.candidates?.[0]?.finishReason;
  if (finishReason && SAFETY_FINISH_REASONS.has(finishReason)) {
    return new AnalysisFailure('EmptyResponse', `Request blocked by the safety filter (finish reason: ${finishReason})`, {
      reason: 'Safety'
    });
  }
  if (finishReason) {
    return new AnalysisFailure('EmptyResponse', `No text returned (finish reason: ${finishReason})`, { reason: finishReason });
  }
  return new AnalysisFailure('EmptyResponse', 'Empty response with no finish reason');
};

/**
 * Builds the analyzer that turns a photo of waste into a design blueprint with Gemini.
 * Successful results are memoized per (item, content, configuration).
 */
export const createDesignAnalyzer = ({
  models,
  config = ANALYZER_CONFIG,
  cache = new AnalysisCache()
}: DesignAnalyzerOptions): DesignAnalyzer => {
  let configHash: Promise<string> | undefined;
  const getConfigHash = (): Promise<string> =>
    (configHash ??= sha256Hex(JSON.stringify({ model: config.model, temperature: config.temperature, instruction: DESIGN_INSTRUCTION })));

  const analyze = async (item: UploadedItem): Promise<AnalysisResult> => {
    const image = decodeImage(item.bytes);
    const key: AnalysisCacheKey = {
      itemId: item.id,
      contentHash: await sha256Hex(item.bytes),
      configHash: await getConfigHash()
    };

    const cached = cache.get(key);
    if (cached) {
      logger.debug('Analysis served from cache', undefined, { component: 'DesignAnalyzer', itemId: item.id });
      return { ...cached, fromCache: true };
    }

    logger.info('Requesting design blueprint', { component: 'DesignAnalyzer', itemId: item.id, model: config.model });

    let response: GeminiResponse;
    try {
      response = await withTimeout(
        (abortSignal) => models.generateContent({
          model: config.model,
          contents: {
            parts: [
              { text: DESIGN_INSTRUCTION },
              {
                inlineData: {
                  mimeType: image.mimeType,
                  data: image.base64
                }
              }
            ]
          },
          config: {
            responseMimeType: "application/json",
            responseSchema: blueprintResponseSchema,
            temperature: config.temperature,
            abortSignal
          }
        }),
        config.timeoutMs,
        'Design analysis'
      );
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new AnalysisFailure('ServiceError', message, { cause: e });
    }

    const text = response.text;
    if (!text) {
      throw describeEmptyResponse(response);
    }

    const parsed = parseBlueprintResponse(text);
    cache.set(key, parsed);
    logger.info('Design blueprint ready', {
      component: 'DesignAnalyzer',
      itemId: item.id,
      title: parsed.blueprint.title,
      upcycleScore: parsed.blueprint.upcycleScore
    });

    return { ...parsed, fromCache: false };
  };

  return {
    analyze,
    forget: (itemId) => cache.forget(itemId),
    retainOnly: (itemId) => cache.retainOnly(itemId)
  };
};

/**
 * Analyzer backed by the real Gemini client.
 */
export const createGeminiAnalyzer = (apiKey: string, config: AnalyzerConfig = ANALYZER_CONFIG): DesignAnalyzer => {
  const ai = new GoogleGenAI({ apiKey });
  return createDesignAnalyzer({ models: ai.models, config });
};
