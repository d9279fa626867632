import { ConceptImage, DecodedImage, ImageMimeType } from '../types';
import { AnalysisFailure } from './errors';

const UPLOAD_MIME_TYPES: readonly ImageMimeType[] = ['image/jpeg', 'image/png'];

const startsWith = (bytes: Uint8Array, signature: number[], offset = 0): boolean =>
  bytes.length >= offset + signature.length && signature.every((byte, i) => bytes[offset + i] === byte);

/**
 * Identifies a raster image by its leading signature bytes.
 */
export const detectImageMimeType = (bytes: Uint8Array): ImageMimeType | null => {
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return 'image/jpeg';
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return 'image/png';
  // RIFF....WEBP
  if (startsWith(bytes, [0x52, 0x49, 0x46, 0x46]) && startsWith(bytes, [0x57, 0x45, 0x42, 0x50], 8)) return 'image/webp';
  if (startsWith(bytes, [0x47, 0x49, 0x46, 0x38])) return 'image/gif';
  return null;
};

export const bytesToBase64 = (bytes: Uint8Array): string => {
  let binary = '';
  const chunkSize = 0x8000;
  for (let i = 0; i < bytes.length; i += chunkSize) {
    binary += String.fromCharCode(...bytes.subarray(i, i + chunkSize));
  }
  return btoa(binary);
};

export const base64ToBytes = (base64: string): Uint8Array => {
  const binaryString = atob(base64);
  const bytes = new Uint8Array(binaryString.length);
  for (let i = 0; i < binaryString.length; i++) {
    bytes[i] = binaryString.charCodeAt(i);
  }
  return bytes;
};

export const toDataUrl = (image: DecodedImage): string => `data:${image.mimeType};base64,${image.base64}`;

/**
 * Splits a data URL into its MIME type and base64 payload.
 */
export const parseDataUrl = (dataUrl: string): { mimeType: string; base64: string } | null => {
  const match = dataUrl.match(/^data:([\w.+-]+\/[\w.+-]+);base64,(.*)$/s);
  if (!match) return null;
  return { mimeType: match[1], base64: match[2] };
};

/**
 * Reads an uploaded file into memory.
 */
export const readImageFile = async (file: Blob): Promise<Uint8Array> => new Uint8Array(await file.arrayBuffer());

/**
 * Checks that uploaded bytes are a JPEG or PNG and prepares them as inline data.
 */
export const decodeImage = (bytes: Uint8Array): DecodedImage => {
  const mimeType = detectImageMimeType(bytes);
  if (!mimeType || !UPLOAD_MIME_TYPES.includes(mimeType)) {
    throw new AnalysisFailure('DecodeError', 'Upload is not a readable JPEG or PNG image');
  }
  return { mimeType, base64: bytesToBase64(bytes) };
};

export const sha256Hex = async (data: Uint8Array | string): Promise<string> => {
  const input = typeof data === 'string' ? new TextEncoder().encode(data) : data;
  const digest = await crypto.subtle.digest('SHA-256', new Uint8Array(input));
  return Array.from(new Uint8Array(digest), (byte) => byte.toString(16).padStart(2, '0')).join('');
};

export type RenderOutput = Blob | ArrayBuffer | Uint8Array | string;

const isBlob = (value: RenderOutput): value is Blob =>
  typeof value === 'object' && 'arrayBuffer' in value && typeof value.arrayBuffer === 'function';

const outputToBytes = async (output: RenderOutput): Promise<Uint8Array> => {
  if (typeof output === 'string') {
    const parsed = parseDataUrl(output);
    if (!parsed) {
      throw new Error('Image service returned a string that is not a data URL');
    }
    return base64ToBytes(parsed.base64);
  }
  if (output instanceof Uint8Array) return output;
  if (isBlob(output)) return new Uint8Array(await output.arrayBuffer());
  return new Uint8Array(output);
};

/**
 * Normalizes whatever the image service hands back into one displayable image.
 */
export const normalizeRenderOutput = async (output: RenderOutput): Promise<ConceptImage> => {
  const bytes = await outputToBytes(output);
  const mimeType = detectImageMimeType(bytes);
  if (!mimeType) {
    throw new Error(`Image service returned ${bytes.length} bytes that are not a known image format`);
  }
  const image: DecodedImage = { mimeType, base64: bytesToBase64(bytes) };
  return { ...image, dataUrl: toDataUrl(image) };
};
