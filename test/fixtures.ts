import { GeminiResponse } from '../services/geminiService';

export type FakeGeminiResponse = GeminiResponse;

// Smallest byte runs that carry a real PNG / JPEG signature.
export const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d]);
export const PNG_BASE64 = 'iVBORw0KGgoAAAAN';

export const JPEG_BYTES = new Uint8Array([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]);
export const JPEG_BASE64 = '/9j/4AAQ';

export const NOT_AN_IMAGE = new Uint8Array([0x01, 0x02, 0x03, 0x04]);

export const VISUALIZATION_PROMPT = 'A glowing table lamp covered in colorful bottle caps on a wooden desk';

export const BLUEPRINT_RESPONSE = {
  title: 'Bottle Cap Mosaic Lamp',
  category: 'Art Piece',
  materials: [
    { name: 'Plastic bottle caps', quantity: '~40 units' },
    { name: 'Glass jar', quantity: '1' }
  ],
  assemblySummary: 'Drill each cap, thread the caps onto wire and wrap them around the jar.',
  upcycleScore: 8,
  visualizationPrompt: VISUALIZATION_PROMPT
};

export const EXPECTED_BLUEPRINT = {
  title: 'Bottle Cap Mosaic Lamp',
  category: 'Art Piece',
  materials: [
    { name: 'Plastic bottle caps', quantity: '~40 units' },
    { name: 'Glass jar', quantity: '1' }
  ],
  assemblySummary: 'Drill each cap, thread the caps onto wire and wrap them around the jar.',
  upcycleScore: 8
};

export const geminiText = (body: unknown): FakeGeminiResponse => ({
  text: JSON.stringify(body),
  candidates: []
});
