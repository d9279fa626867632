/**
 * Session orchestrator: owns the single uploaded item and everything derived from it,
 * and sequences analysis and rendering.
 */

import { createStore, StoreApi } from 'zustand/vanilla';
import { DesignAnalyzer } from '../services/geminiService';
import { ConceptRenderer } from '../services/huggingFaceService';
import { describeFailure, RenderFailure, SessionError } from '../services/errors';
import { normalizeCredential } from '../services/config';
import {
  ConceptImage,
  CredentialName,
  Credentials,
  DesignBlueprint,
  GenerationStatus,
  SessionPhase,
  UploadedItem
} from '../types';
import { logger } from '../utils/logger';

export interface SessionData {
  item: UploadedItem | null;
  blueprint: DesignBlueprint | null;
  visualizationPrompt: string | null;
  conceptImage: ConceptImage | null;
  lastGenerationStatus: GenerationStatus;
  phase: SessionPhase;
  error: SessionError | null;
}

export interface UploadInput {
  name: string;
  bytes: Uint8Array;
}

export interface SessionState extends SessionData {
  credentials: Credentials;

  // Actions
  upload: (file: UploadInput) => void;
  analyze: () => Promise<void>;
  render: () => Promise<void>;
  reset: () => void;
  setCredential: (name: CredentialName, value: string) => void;
  dismissError: () => void;

  // Getters
  isBusy: () => boolean;
  canAnalyze: () => boolean;
  canRender: () => boolean;
}

export interface SessionDependencies {
  createAnalyzer: (apiKey: string) => DesignAnalyzer;
  createRenderer: (token: string) => ConceptRenderer;
  credentials?: Credentials;
  now?: () => number;
}

export type SessionStore = StoreApi<SessionState>;

const EMPTY_SESSION: SessionData = {
  item: null,
  blueprint: null,
  visualizationPrompt: null,
  conceptImage: null,
  lastGenerationStatus: 'none',
  phase: SessionPhase.EMPTY,
  error: null
};

const BUSY_PHASES: ReadonlySet<SessionPhase> = new Set([SessionPhase.ANALYZING, SessionPhase.RENDERING]);

/**
 * Builds one session. Services are created lazily from the current credentials and
 * rebuilt when a credential changes.
 */
export const createSessionStore = ({
  createAnalyzer,
  createRenderer,
  credentials = { geminiApiKey: null, hfToken: null },
  now = Date.now
}: SessionDependencies): SessionStore => {
  let sequence = 0;
  let analyzer: { apiKey: string; instance: DesignAnalyzer } | null = null;
  let renderer: { token: string; instance: ConceptRenderer } | null = null;

  return createStore<SessionState>((set, get) => {
    const getAnalyzer = (): DesignAnalyzer | null => {
      const apiKey = get().credentials.geminiApiKey;
      if (!apiKey) return null;
      if (analyzer?.apiKey === apiKey) return analyzer.instance;

      const instance = createAnalyzer(apiKey);
      analyzer = { apiKey, instance };
      return instance;
    };

    const getRenderer = (): ConceptRenderer | null => {
      const token = get().credentials.hfToken;
      if (!token) return null;
      if (renderer?.token === token) return renderer.instance;

      const instance = createRenderer(token);
      renderer = { token, instance };
      return instance;
    };

    const refuseWhileBusy = (action: string): boolean => {
      const { phase, item } = get();
      if (!BUSY_PHASES.has(phase)) return false;
      logger.warn(`Ignoring ${action} while a request is in flight`, { component: 'SessionStore', action, phase, itemId: item?.id });
      return true;
    };

    return {
      ...EMPTY_SESSION,
      credentials: {
        geminiApiKey: normalizeCredential(credentials.geminiApiKey),
        hfToken: normalizeCredential(credentials.hfToken)
      },

      upload: ({ name, bytes }) => {
        if (refuseWhileBusy('upload')) return;

        const uploadedAt = now();
        sequence += 1;
        const item: UploadedItem = {
          id: `item-${uploadedAt.toString(36)}-${sequence}`,
          name,
          bytes,
          uploadedAt
        };

        analyzer?.instance.retainOnly(item.id);
        set({ ...EMPTY_SESSION, item, phase: SessionPhase.UPLOADED });
        logger.info('Item uploaded', { component: 'SessionStore', itemId: item.id, name, size: bytes.length });
      },

      analyze: async () => {
        if (refuseWhileBusy('analyze')) return;

        const { item, phase } = get();
        if (!item) {
          set({ error: { kind: 'NoUpload', message: 'Upload an image first!' } });
          return;
        }

        const designAnalyzer = getAnalyzer();
        if (!designAnalyzer) {
          set({ error: { kind: 'MissingCredential', message: 'Please provide a Gemini API key in the sidebar.' } });
          return;
        }

        set({ phase: SessionPhase.ANALYZING, error: null });
        try {
          const result = await designAnalyzer.analyze(item);
          set({
            phase: SessionPhase.ANALYZED,
            blueprint: result.blueprint,
            visualizationPrompt: result.visualizationPrompt,
            conceptImage: null,
            lastGenerationStatus: 'none'
          });
        } catch (e) {
          logger.error('Design analysis failed', e, { component: 'SessionStore', itemId: item.id });
          set({ phase, error: describeFailure(e) });
        }
      },

      render: async () => {
        if (refuseWhileBusy('render')) return;

        const { visualizationPrompt, phase, item } = get();
        if (!visualizationPrompt) {
          set({
            lastGenerationStatus: 'noPrompt',
            error: describeFailure(new RenderFailure('NoPrompt', 'No visualization prompt available'))
          });
          return;
        }

        const conceptRenderer = getRenderer();
        if (!conceptRenderer) {
          set({ error: { kind: 'MissingCredential', message: 'Enter a Hugging Face token in the sidebar to generate images.' } });
          return;
        }

        set({ phase: SessionPhase.RENDERING, error: null });
        try {
          const conceptImage = await conceptRenderer.render(visualizationPrompt);
          set({ phase: SessionPhase.VISUALIZED, conceptImage, lastGenerationStatus: 'success' });
        } catch (e) {
          logger.error('Concept render failed', e, { component: 'SessionStore', itemId: item?.id });
          set({ phase, lastGenerationStatus: 'failed', error: describeFailure(e) });
        }
      },

      reset: () => {
        if (refuseWhileBusy('reset')) return;

        const { item } = get();
        if (item) {
          analyzer?.instance.forget(item.id);
        }
        set({ ...EMPTY_SESSION });
        logger.info('Session reset', { component: 'SessionStore', itemId: item?.id });
      },

      setCredential: (name, value) => {
        set((state) => ({ credentials: { ...state.credentials, [name]: normalizeCredential(value) } }));
      },

      dismissError: () => set({ error: null }),

      isBusy: () => BUSY_PHASES.has(get().phase),
      canAnalyze: () => Boolean(get().credentials.geminiApiKey && get().item) && !get().isBusy(),
      canRender: () => Boolean(get().credentials.hfToken && get().blueprint) && !get().isBusy()
    };
  });
};
