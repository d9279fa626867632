import { BlockedReason, FinishReason, GenerateContentParameters } from '@google/genai';
import { describe, expect, it, vi } from 'vitest';
import {
  BLUEPRINT_RESPONSE,
  EXPECTED_BLUEPRINT,
  FakeGeminiResponse,
  geminiText,
  JPEG_BYTES,
  NOT_AN_IMAGE,
  PNG_BASE64,
  PNG_BYTES,
  VISUALIZATION_PROMPT
} from '../test/fixtures';
import { UploadedItem } from '../types';
import { AnalysisCache } from './analysisCache';
import { blueprintResponseSchema } from './blueprintSchema';
import { ANALYZER_CONFIG } from './config';
import { AnalysisFailure } from './errors';
import { createDesignAnalyzer, DESIGN_INSTRUCTION } from './geminiService';

const makeItem = (id: string, bytes: Uint8Array = PNG_BYTES): UploadedItem => ({
  id,
  name: `${id}.png`,
  bytes,
  uploadedAt: 1_700_000_000_000
});

const setup = (response: FakeGeminiResponse = geminiText(BLUEPRINT_RESPONSE)) => {
  const generateContent = vi.fn<(params: GenerateContentParameters) => Promise<FakeGeminiResponse>>();
  generateContent.mockResolvedValue(response);
  const cache = new AnalysisCache();
  const analyzer = createDesignAnalyzer({ models: { generateContent }, cache });
  return { analyzer, generateContent, cache };
};

describe('createDesignAnalyzer', () => {
  it('returns the validated blueprint and the extracted visualization prompt', async () => {
    const { analyzer } = setup();

    const result = await analyzer.analyze(makeItem('item-a'));

    expect(result).toEqual({
      blueprint: EXPECTED_BLUEPRINT,
      visualizationPrompt: VISUALIZATION_PROMPT,
      fromCache: false
    });
  });

  it('sends the instruction, the image and the schema-constrained config', async () => {
    const { analyzer, generateContent } = setup();

    await analyzer.analyze(makeItem('item-a'));

    expect(generateContent).toHaveBeenCalledTimes(1);
    const params = generateContent.mock.calls[0][0];
    expect(params.model).toBe(ANALYZER_CONFIG.model);
    expect(params.contents).toEqual({
      parts: [{ text: DESIGN_INSTRUCTION }, { inlineData: { mimeType: 'image/png', data: PNG_BASE64 } }]
    });
    expect(params.config).toEqual({
      responseMimeType: 'application/json',
      responseSchema: blueprintResponseSchema,
      temperature: 0.7,
      abortSignal: expect.any(AbortSignal)
    });
  });

  it('memoizes repeated analyses of the same item', async () => {
    const { analyzer, generateContent } = setup();
    const item = makeItem('item-a');

    await analyzer.analyze(item);
    const second = await analyzer.analyze(item);

    expect(generateContent).toHaveBeenCalledTimes(1);
    expect(second.fromCache).toBe(true);
    expect(second.blueprint).toEqual(EXPECTED_BLUEPRINT);
  });

  it('queries again when the identity or the content changes', async () => {
    const { analyzer, generateContent } = setup();

    await analyzer.analyze(makeItem('item-a'));
    await analyzer.analyze(makeItem('item-b'));
    await analyzer.analyze(makeItem('item-b', JPEG_BYTES));

    expect(generateContent).toHaveBeenCalledTimes(3);
  });

  it('forgets cached analyses on request', async () => {
    const { analyzer, generateContent, cache } = setup();

    await analyzer.analyze(makeItem('item-a'));
    await analyzer.analyze(makeItem('item-b'));
    analyzer.retainOnly('item-b');
    expect(cache.has('item-a')).toBe(false);
    expect(cache.has('item-b')).toBe(true);

    analyzer.forget('item-b');
    expect(cache.size).toBe(0);

    await analyzer.analyze(makeItem('item-b'));
    expect(generateContent).toHaveBeenCalledTimes(3);
  });

  it('reports a safety block as an empty response with a safety reason', async () => {
    const { analyzer } = setup({ text: undefined, candidates: [{ finishReason: FinishReason.SAFETY }] });

    const failure = analyzer.analyze(makeItem('item-a'));

    await expect(failure).rejects.toBeInstanceOf(AnalysisFailure);
    await expect(failure).rejects.toMatchObject({ kind: 'EmptyResponse', reason: 'Safety', isSafetyBlock: true });
  });

  it.each([[BlockedReason.SAFETY], [BlockedReason.PROHIBITED_CONTENT], [BlockedReason.OTHER]])(
    'reports a prompt blocked with %s as a safety block',
    async (blockReason) => {
      const { analyzer } = setup({ text: undefined, candidates: undefined, promptFeedback: { blockReason } });

      await expect(analyzer.analyze(makeItem('item-a'))).rejects.toMatchObject({
        kind: 'EmptyResponse',
        reason: 'Safety',
        isSafetyBlock: true,
        message: `Prompt blocked by the safety filter (block reason: ${blockReason})`
      });
    }
  );

  it.each([[FinishReason.IMAGE_SAFETY], [FinishReason.PROHIBITED_CONTENT], [FinishReason.BLOCKLIST], [FinishReason.SPII]])(
    'reports a candidate stopped with %s as a safety block',
    async (finishReason) => {
      const { analyzer } = setup({ text: undefined, candidates: [{ finishReason }] });

      await expect(analyzer.analyze(makeItem('item-a'))).rejects.toMatchObject({
        kind: 'EmptyResponse',
        reason: 'Safety',
        isSafetyBlock: true,
        message: `Request blocked by the safety filter (finish reason: ${finishReason})`
      });
    }
  );

  it('keeps other finish reasons for diagnostics', async () => {
    const { analyzer } = setup({ text: '', candidates: [{ finishReason: FinishReason.MAX_TOKENS }] });

    await expect(analyzer.analyze(makeItem('item-a'))).rejects.toMatchObject({
      kind: 'EmptyResponse',
      reason: 'MAX_TOKENS',
      message: 'No text returned (finish reason: MAX_TOKENS)'
    });
  });

  it('reports an empty response without a finish reason', async () => {
    const { analyzer } = setup({ text: undefined, candidates: undefined });

    await expect(analyzer.analyze(makeItem('item-a'))).rejects.toMatchObject({
      kind: 'EmptyResponse',
      reason: undefined
    });
  });

  it('preserves the raw text of malformed output', async () => {
    const { analyzer } = setup({ text: 'Sorry, I cannot help with that.', candidates: [] });

    await expect(analyzer.analyze(makeItem('item-a'))).rejects.toMatchObject({
      kind: 'MalformedOutput',
      rawText: 'Sorry, I cannot help with that.'
    });
  });

  it('wraps remote failures as service errors and does not cache them', async () => {
    const { analyzer, generateContent } = setup();
    generateContent.mockRejectedValueOnce(new Error('quota exceeded'));
    const item = makeItem('item-a');

    await expect(analyzer.analyze(item)).rejects.toMatchObject({ kind: 'ServiceError', message: 'quota exceeded' });
    expect(generateContent).toHaveBeenCalledTimes(1);

    const retried = await analyzer.analyze(item);
    expect(retried.fromCache).toBe(false);
    expect(generateContent).toHaveBeenCalledTimes(2);
  });

  it('times out a hanging request', async () => {
    const generateContent = vi.fn<(params: GenerateContentParameters) => Promise<FakeGeminiResponse>>();
    generateContent.mockReturnValue(new Promise<FakeGeminiResponse>(() => {}));
    const analyzer = createDesignAnalyzer({
      models: { generateContent },
      config: { ...ANALYZER_CONFIG, timeoutMs: 10 }
    });

    await expect(analyzer.analyze(makeItem('item-a'))).rejects.toMatchObject({
      kind: 'ServiceError',
      message: 'Design analysis timed out after 10ms'
    });
    expect(generateContent.mock.calls[0][0].config?.abortSignal?.aborted).toBe(true);
  });

  it('rejects undecodable uploads without contacting the service', async () => {
    const { analyzer, generateContent } = setup();

    await expect(analyzer.analyze(makeItem('item-a', NOT_AN_IMAGE))).rejects.toMatchObject({ kind: 'DecodeError' });
    expect(generateContent).not.toHaveBeenCalled();
  });
});
