import { useStore } from 'zustand';
import { readCredentials } from '../services/config';
import { createGeminiAnalyzer } from '../services/geminiService';
import { createHfRenderer } from '../services/huggingFaceService';
import { createSessionStore, SessionState } from './sessionStore';

export const sessionStore = createSessionStore({
  createAnalyzer: (apiKey) => createGeminiAnalyzer(apiKey),
  createRenderer: (token) => createHfRenderer(token),
  credentials: readCredentials()
});

export const useSession = <T>(selector: (state: SessionState) => T): T => useStore(sessionStore, selector);
