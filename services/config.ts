import { z } from 'zod';
import { Credentials } from '../types';

export interface AnalyzerConfig {
  model: string;
  temperature: number;
  timeoutMs: number;
}

export interface RendererConfig {
  model: string;
  stylePrefix: string;
  guidanceScale: number;
  numInferenceSteps: number;
  timeoutMs: number;
}

export const ANALYZER_CONFIG: AnalyzerConfig = {
  model: 'gemini-2.0-flash',
  temperature: 0.7,
  timeoutMs: 60_000
};

export const RENDERER_CONFIG: RendererConfig = {
  model: 'stabilityai/stable-diffusion-xl-base-1.0',
  stylePrefix: 'Product design render, 4k photorealistic, cinematic lighting',
  guidanceScale: 7.5,
  numInferenceSteps: 30,
  timeoutMs: 120_000
};

const credentialValue = z
  .string()
  .optional()
  .transform((value) => value?.trim() || null);

const envSchema = z.object({
  GEMINI_API_KEY: credentialValue,
  HF_TOKEN: credentialValue
});

export type CredentialEnv = z.input<typeof envSchema>;

/**
 * Reads the two service credentials. Vite replaces the `process.env.*` references
 * at build time; tests pass their own env.
 */
export const readCredentials = (
  env: CredentialEnv = { GEMINI_API_KEY: process.env.GEMINI_API_KEY, HF_TOKEN: process.env.HF_TOKEN }
): Credentials => {
  const parsed = envSchema.parse(env);
  return {
    geminiApiKey: parsed.GEMINI_API_KEY,
    hfToken: parsed.HF_TOKEN
  };
};

export const normalizeCredential = (value: string | null | undefined): string | null => value?.trim() || null;
