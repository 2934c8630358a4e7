/**
 * Image Normalizer
 * Turns an image into a text unit through the captioning capability.
 */

import { errorMessage } from '../errors.js';
import type {
  CaptionProvider,
  ChunkMetadata,
  ChunkModality,
  ImageInput,
  NormalizedUnit,
} from '../types.js';
import { normalizeWhitespace } from './text.js';

/**
 * Placeholder text for an image whose caption could not be produced.
 */
export function captionPlaceholder(filename: string, reason: string): string {
  return `[Image: ${filename}] Caption unavailable (${reason})`;
}

export class ImageNormalizer {
  private captioner: CaptionProvider | null;

  constructor(captioner: CaptionProvider | null) {
    this.captioner = captioner;
  }

  /**
   * Caption one image. A failed caption degrades to a placeholder so the
   * surrounding document still ingests.
   */
  async normalize(
    image: ImageInput,
    modality: ChunkModality = 'image',
    metadata: ChunkMetadata = {}
  ): Promise<NormalizedUnit> {
    if (!this.captioner) {
      return this.placeholder(image, 'no captioning provider configured', modality, metadata);
    }

    try {
      const caption = normalizeWhitespace(await this.captioner.caption(image));
      if (!caption) {
        return this.placeholder(image, 'empty caption', modality, metadata);
      }
      return {
        text: caption,
        modality,
        metadata: { ...metadata, captionError: false },
      };
    } catch (error) {
      console.warn(`[ImageNormalizer] Captioning failed for ${image.filename}:`, errorMessage(error));
      return this.placeholder(image, errorMessage(error), modality, metadata);
    }
  }

  private placeholder(
    image: ImageInput,
    reason: string,
    modality: ChunkModality,
    metadata: ChunkMetadata
  ): NormalizedUnit {
    return {
      text: captionPlaceholder(image.filename, reason),
      modality,
      metadata: { ...metadata, captionError: true },
    };
  }
}
