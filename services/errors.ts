export type AnalysisFailureKind = 'DecodeError' | 'ServiceError' | 'EmptyResponse' | 'MalformedOutput';
export type RenderFailureKind = 'NoPrompt' | 'ServiceError';
export type SessionFailureKind = AnalysisFailureKind | RenderFailureKind | 'NoUpload' | 'MissingCredential';

interface AnalysisFailureDetails {
  /** `Safety` when the model refused the request, otherwise the raw finish reason. */
  reason?: string;
  /** Model output that could not be turned into a blueprint. */
  rawText?: string;
  cause?: unknown;
}

export class AnalysisFailure extends Error {
  readonly kind: AnalysisFailureKind;
  readonly reason?: string;
  readonly rawText?: string;

  constructor(kind: AnalysisFailureKind, message: string, details: AnalysisFailureDetails = {}) {
    super(message, { cause: details.cause });
    this.name = 'AnalysisFailure';
    this.kind = kind;
    this.reason = details.reason;
    this.rawText = details.rawText;
  }

  get isSafetyBlock(): boolean {
    return this.kind === 'EmptyResponse' && this.reason === 'Safety';
  }
}

export class RenderFailure extends Error {
  readonly kind: RenderFailureKind;

  constructor(kind: RenderFailureKind, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'RenderFailure';
    this.kind = kind;
  }
}

export class TimeoutError extends Error {
  constructor(label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export interface SessionError {
  kind: SessionFailureKind;
  message: string;
}

/**
 * Turns any failure raised by the pipeline into the sentence shown to the user.
 */
export const describeFailure = (error: unknown): SessionError => {
  if (error instanceof AnalysisFailure) {
    switch (error.kind) {
      case 'DecodeError':
        return { kind: error.kind, message: 'The uploaded file could not be read as a JPEG or PNG image.' };
      case 'ServiceError':
        return { kind: error.kind, message: `Gemini API error: ${error.message}` };
      case 'EmptyResponse':
        if (error.isSafetyBlock) {
          return {
            kind: error.kind,
            message: 'The request was blocked by the safety filter. Try a different, less ambiguous image.'
          };
        }
        return {
          kind: error.kind,
          message: error.reason
            ? `Gemini returned no design (finish reason: ${error.reason}). Try a simpler image.`
            : 'Gemini returned an empty response. Please try again.'
        };
      case 'MalformedOutput':
        return { kind: error.kind, message: 'Gemini returned a design we could not read. Please try again.' };
    }
  }

  if (error instanceof RenderFailure) {
    if (error.kind === 'NoPrompt') {
      return { kind: error.kind, message: 'Analyze the image first to get a visualization prompt.' };
    }
    return { kind: error.kind, message: 'Generation failed. Check your Hugging Face token or internet connection.' };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { kind: 'ServiceError', message };
};
