import { HfInference } from "@huggingface/inference";
import { ConceptImage } from "../types";
import { logger } from "../utils/logger";
import { RENDERER_CONFIG, RendererConfig } from "./config";
import { RenderFailure } from "./errors";
import { normalizeRenderOutput, RenderOutput } from "./imageUtils";
import { withTimeout } from "./timeout";

export interface TextToImageRequest {
  prompt: string;
  model: string;
  guidanceScale: number;
  numInferenceSteps: number;
  /** Aborted when the render deadline passes. */
  signal: AbortSignal;
}

export type TextToImage = (request: TextToImageRequest) => Promise<RenderOutput>;

export interface ConceptRenderer {
  render(promptText: string | null | undefined): Promise<ConceptImage>;
}

export interface ConceptRendererOptions {
  textToImage: TextToImage;
  config?: RendererConfig;
}

export const buildRenderPrompt = (promptText: string, stylePrefix: string = RENDERER_CONFIG.stylePrefix): string =>
  `${stylePrefix}: ${promptText.trim()}`;

/**
 * Renders a concept image for a visualization prompt. Every call is a fresh sample,
 * so nothing is cached.
 */
export const createConceptRenderer = ({ textToImage, config = RENDERER_CONFIG }: ConceptRendererOptions): ConceptRenderer => ({
  render: async (promptText) => {
    if (!promptText?.trim()) {
      throw new RenderFailure('NoPrompt', 'No visualization prompt available');
    }

    const prompt = buildRenderPrompt(promptText, config.stylePrefix);
    logger.info('Requesting concept image', { component: 'ConceptRenderer', model: config.model });

    try {
      const output = await withTimeout(
        (signal) =>
          textToImage({
            prompt,
            model: config.model,
            guidanceScale: config.guidanceScale,
            numInferenceSteps: config.numInferenceSteps,
            signal
          }),
        config.timeoutMs,
        'Concept render'
      );
      return await normalizeRenderOutput(output);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new RenderFailure('ServiceError', message, e);
    }
  }
});

/**
 * Text-to-image call against the Hugging Face Inference API.
 */
export const createHfTextToImage = (token: string): TextToImage => {
  const client = new HfInference(token);
  return async ({ prompt, model, guidanceScale, numInferenceSteps, signal }) =>
    client.textToImage(
      {
        model,
        inputs: prompt,
        parameters: {
          guidance_scale: guidanceScale,
          num_inference_steps: numInferenceSteps
        }
      },
      { signal }
    );
};

export const createHfRenderer = (token: string, config: RendererConfig = RENDERER_CONFIG): ConceptRenderer =>
  createConceptRenderer({ textToImage: createHfTextToImage(token), config });
