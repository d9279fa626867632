export type DesignCategory = 'Art Piece' | 'Small Furniture' | 'Accessory' | 'Tool';

export interface Material {
  name: string;
  quantity: string; // free text, e.g. "~50 units"
}

export interface DesignBlueprint {
  title: string;
  category: DesignCategory;
  materials: Material[];
  assemblySummary: string;
  upcycleScore: number; // integer, 1-10
}

export interface AnalysisResult {
  blueprint: DesignBlueprint;
  visualizationPrompt: string | null;
  fromCache: boolean;
}

export interface UploadedItem {
  id: string;
  name: string;
  bytes: Uint8Array;
  uploadedAt: number;
}

export type ImageMimeType = 'image/jpeg' | 'image/png' | 'image/webp' | 'image/gif';

export interface DecodedImage {
  mimeType: ImageMimeType;
  base64: string;
}

export interface ConceptImage extends DecodedImage {
  dataUrl: string;
}

export type GenerationStatus = 'none' | 'success' | 'failed' | 'noPrompt';

export enum SessionPhase {
  EMPTY = 'EMPTY',
  UPLOADED = 'UPLOADED',
  ANALYZING = 'ANALYZING',
  ANALYZED = 'ANALYZED',
  RENDERING = 'RENDERING',
  VISUALIZED = 'VISUALIZED'
}

export interface Credentials {
  geminiApiKey: string | null;
  hfToken: string | null;
}

export type CredentialName = keyof Credentials;
