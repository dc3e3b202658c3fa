/**
 * Vision Analyzer
 *
 * Sends a downscaled copy of an image with the mode's prompt to an OpenAI
 * vision model and returns the labeled description it writes back.
 */

import { basename } from 'node:path';

import OpenAI from 'openai';
import sharp from 'sharp';

import { env } from '../config/index.js';
import { VISION_MAX_TOKENS, VISION_PROMPTS } from '../description/prompts.js';
import { describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { DescriptionMode, ImageAnalyzer } from '../types/index.js';

import { isSupportedImage } from './image-scan.js';

export interface VisionAnalyzerConfig {
  apiKey?: string;
  baseURL?: string;
  model: string;
  /** Longest edge sent to the model, in pixels */
  maxImageEdge: number;
  maxRetries: number;
}

const JPEG_QUALITY = 85;

export function defaultVisionConfig(): VisionAnalyzerConfig {
  return {
    apiKey: env.OPENAI_API_KEY,
    baseURL: env.OPENAI_BASE_URL,
    model: env.OPENAI_MODEL,
    maxImageEdge: env.VISION_MAX_IMAGE_EDGE,
    maxRetries: 3
  };
}

/**
 * Downscale (never enlarge) and encode as a data URL: PNG when the image has
 * an alpha channel, JPEG otherwise.
 */
export async function encodeImageDataUrl(imagePath: string, maxEdge: number): Promise<string> {
  const image = sharp(imagePath).rotate();
  const { hasAlpha } = await image.metadata();

  const resized = image.resize({
    width: maxEdge,
    height: maxEdge,
    fit: 'inside',
    withoutEnlargement: true
  });

  const buffer = hasAlpha
    ? await resized.png().toBuffer()
    : await resized.jpeg({ quality: JPEG_QUALITY }).toBuffer();

  return `data:image/${hasAlpha ? 'png' : 'jpeg'};base64,${buffer.toString('base64')}`;
}

export class VisionAnalyzer implements ImageAnalyzer {
  private readonly client: OpenAI;
  private readonly config: VisionAnalyzerConfig;

  constructor(config: VisionAnalyzerConfig = defaultVisionConfig()) {
    if (!config.apiKey) {
      throw new Error('OPENAI_API_KEY is not set; add it to .env before analyzing images');
    }

    this.config = config;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: config.maxRetries
    });

    logger.debug({ model: config.model, maxImageEdge: config.maxImageEdge }, 'Vision analyzer initialized');
  }

  /**
   * Labeled description of the image, or null when it cannot be analyzed.
   */
  async analyze(imagePath: string, mode: DescriptionMode): Promise<string | null> {
    const file = basename(imagePath);

    if (!isSupportedImage(imagePath)) {
      logger.warn({ file }, 'Unsupported image format, skipping');
      return null;
    }

    try {
      const imageUrl = await encodeImageDataUrl(imagePath, this.config.maxImageEdge);

      const response = await this.client.chat.completions.create({
        model: this.config.model,
        max_tokens: VISION_MAX_TOKENS[mode],
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: VISION_PROMPTS[mode] },
              { type: 'image_url', image_url: { url: imageUrl } }
            ]
          }
        ]
      });

      const description = response.choices[0]?.message?.content?.trim();
      if (!description) {
        logger.warn({ file, mode }, 'Vision model returned an empty description');
        return null;
      }

      logger.info({ file, mode }, 'Image analyzed');
      return description;
    } catch (error) {
      logger.error({ file, mode, error: describeError(error) }, 'Image analysis failed');
      return null;
    }
  }
}
