import { Injectable } from '@angular/core';
import { createHash } from 'node:crypto';
import sharp from 'sharp';
import type { Board, CellState } from '../model/board.model';
import { ImageProcessingError, InvalidInputError } from '../model/errors';

export type DitheringAlgorithm = 'none' | 'floyd_steinberg';
export type FilterStep = 'resize' | 'grayscale' | 'level correction' | 'banding' | 'floyd_steinberg';
export type ImageInput = string | Buffer;

export interface FilterOptions {
  maxArea: number;
  lightCorrectionRange: [number, number];
  ditheringAlgorithm: DitheringAlgorithm;
}

export interface ImageSize {
  width: number;
  height: number;
}

/** Single-channel 8-bit image, row-major. */
export interface GrayImage extends ImageSize {
  data: Uint8Array;
}

export interface RasterImage extends ImageSize {
  channels: number;
  data: Uint8Array;
}

export interface DitheringMetadata {
  originalSize: ImageSize;
  resizedSize: ImageSize;
  originalPixelCount: number;
  resizedPixelCount: number;
  filterSteps: FilterStep[];
  ditheringAlgorithm: DitheringAlgorithm;
  hash: string;
}

export interface ImageToBoardOptions {
  aliveWhen: 'dark' | 'light';
}

export const DEFAULT_FILTER_OPTIONS: FilterOptions = {
  maxArea: 256 * 256,
  lightCorrectionRange: [20, 235],
  ditheringAlgorithm: 'none'
};

const MAX_AREA_LIMIT = 4096 * 4096;
const BAND_SIZE = 32;
const DITHER_THRESHOLD = 127;

export class DitheringResult {
  constructor(
    readonly original: RasterImage,
    readonly processed: GrayImage,
    readonly metadata: DitheringMetadata
  ) {}

  /** Writes the processed image; the format follows the file extension. */
  async save(outputPath: string) {
    try {
      await sharp(Buffer.from(this.processed.data), {
        raw: { width: this.processed.width, height: this.processed.height, channels: 1 }
      }).toFile(outputPath);
    } catch (error) {
      throw new ImageProcessingError(`Could not save the processed image to ${outputPath}.`, error);
    }
  }
}

@Injectable({ providedIn: 'root' })
export class DitheringService {
  /**
   * Resize, grayscale, level correction, then banding or Floyd–Steinberg.
   * Rejects with ImageProcessingError on any failure.
   */
  async applyFilter(input: ImageInput, options?: Partial<FilterOptions>): Promise<DitheringResult> {
    const normalized = normalizeFilterOptions(options);
    try {
      const decoded = await sharp(input).raw().toBuffer({ resolveWithObject: true });
      const original: RasterImage = {
        width: decoded.info.width,
        height: decoded.info.height,
        channels: decoded.info.channels,
        data: new Uint8Array(decoded.data)
      };

      const resizedSize = calculateNewDimensions(original.width, original.height, normalized.maxArea);
      const gray = await sharp(input)
        .resize(resizedSize.width, resizedSize.height, { kernel: sharp.kernel.lanczos3, fit: 'fill' })
        .removeAlpha()
        .grayscale()
        .raw()
        .toBuffer({ resolveWithObject: true });
      const grayPixels = firstChannel(gray.data, gray.info.channels);

      const corrected = rescaleIntensity(grayPixels, normalized.lightCorrectionRange);
      const filterSteps: FilterStep[] = ['resize', 'grayscale', 'level correction'];
      let pixels: Uint8Array;
      if (normalized.ditheringAlgorithm === 'floyd_steinberg') {
        pixels = applyFloydSteinbergDithering(corrected, resizedSize.width, resizedSize.height);
        filterSteps.push('floyd_steinberg');
      } else {
        pixels = applyBanding(corrected);
        filterSteps.push('banding');
      }

      const processed: GrayImage = { ...resizedSize, data: pixels };
      return new DitheringResult(original, processed, {
        originalSize: { width: original.width, height: original.height },
        resizedSize,
        originalPixelCount: original.width * original.height,
        resizedPixelCount: resizedSize.width * resizedSize.height,
        filterSteps,
        ditheringAlgorithm: normalized.ditheringAlgorithm,
        hash: generateHash(processed, normalized)
      });
    } catch (error) {
      console.error('[Dithering] Failed to process image.', {
        input: typeof input === 'string' ? input : `<buffer ${input.length} bytes>`,
        error
      });
      const reason = error instanceof Error ? error.message : String(error);
      throw new ImageProcessingError(`Could not process the image: ${reason}`, error);
    }
  }
}

export function normalizeFilterOptions(options?: Partial<FilterOptions>): FilterOptions {
  const input = options || {};
  const range = Array.isArray(input.lightCorrectionRange)
    ? input.lightCorrectionRange
    : DEFAULT_FILTER_OPTIONS.lightCorrectionRange;
  const low = clampInt(range[0], 0, 255, DEFAULT_FILTER_OPTIONS.lightCorrectionRange[0]);
  const high = clampInt(range[1], 0, 255, DEFAULT_FILTER_OPTIONS.lightCorrectionRange[1]);
  return {
    maxArea: clampInt(input.maxArea, 1, MAX_AREA_LIMIT, DEFAULT_FILTER_OPTIONS.maxArea),
    lightCorrectionRange: [low, high],
    ditheringAlgorithm: input.ditheringAlgorithm === 'floyd_steinberg' ? 'floyd_steinberg' : 'none'
  };
}

/** Target size with area close to `maxArea` and the source aspect ratio. */
export function calculateNewDimensions(originalWidth: number, originalHeight: number, maxArea: number): ImageSize {
  const aspectRatio = originalWidth / originalHeight;
  const height = Math.max(1, Math.floor(Math.sqrt(maxArea / aspectRatio)));
  const width = Math.max(1, Math.floor(maxArea / height));
  return { width, height };
}

// Linear stretch from the observed min/max onto `range`; a reversed range
// inverts the image, and a flat image maps to range[0].
export function rescaleIntensity(pixels: ArrayLike<number>, range: readonly [number, number]): Float32Array {
  const [low, high] = range;
  const out = new Float32Array(pixels.length);
  if (!pixels.length) return out;

  let min = Infinity;
  let max = -Infinity;
  for (let i = 0; i < pixels.length; i++) {
    min = Math.min(min, pixels[i]);
    max = Math.max(max, pixels[i]);
  }
  if (max === min) {
    return out.fill(low);
  }
  for (let i = 0; i < pixels.length; i++) {
    out[i] = ((pixels[i] - min) / (max - min)) * (high - low) + low;
  }
  return out;
}

export function applyBanding(pixels: ArrayLike<number>, bandSize: number = BAND_SIZE): Uint8Array {
  const out = new Uint8Array(pixels.length);
  for (let i = 0; i < pixels.length; i++) {
    out[i] = Math.floor(pixels[i] / bandSize) * bandSize;
  }
  return out;
}

/**
 * Error diffusion in row-major order. Pixels above the threshold become 255,
 * the rest 0; the error goes 7/16 right, 3/16 below-left, 5/16 below and
 * 1/16 below-right, skipping neighbours outside the image.
 */
export function applyFloydSteinbergDithering(pixels: ArrayLike<number>, width: number, height: number): Uint8Array {
  const work = Float32Array.from(pixels);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x;
      const oldPixel = work[i];
      const newPixel = oldPixel > DITHER_THRESHOLD ? 255 : 0;
      work[i] = newPixel;
      const error = oldPixel - newPixel;

      if (x + 1 < width) {
        work[i + 1] += (error * 7) / 16;
      }
      if (y + 1 < height) {
        if (x > 0) {
          work[i + width - 1] += (error * 3) / 16;
        }
        work[i + width] += (error * 5) / 16;
        if (x + 1 < width) {
          work[i + width + 1] += (error * 1) / 16;
        }
      }
    }
  }

  const out = new Uint8Array(work.length);
  for (let i = 0; i < work.length; i++) {
    out[i] = Math.max(0, Math.min(255, Math.trunc(work[i])));
  }
  return out;
}

/** SHA-256 over the pixel bytes, then `key:value` for each parameter in key order. */
export function generateHash(image: GrayImage, params: FilterOptions): string {
  const hash = createHash('sha256');
  hash.update(image.data);
  const entries = Object.entries(params).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [key, value] of entries) {
    const serialized = Array.isArray(value) ? value.join(',') : String(value);
    hash.update(`${key}:${serialized}`, 'utf8');
  }
  return hash.digest('hex');
}

/** Turns a binarized image (only 0 and 255) into a board of the same size. */
export function imageToBoard(image: GrayImage, options?: Partial<ImageToBoardOptions>): Board {
  const aliveValue = options?.aliveWhen === 'light' ? 255 : 0;
  const board: Board = [];
  for (let y = 0; y < image.height; y++) {
    const row: CellState[] = [];
    for (let x = 0; x < image.width; x++) {
      const value = image.data[y * image.width + x];
      if (value !== 0 && value !== 255) {
        throw new InvalidInputError('Image must be binarized before it can seed a board.', { x, y, value });
      }
      row.push(value === aliveValue ? 1 : 0);
    }
    board.push(row);
  }
  return board;
}

function firstChannel(data: Uint8Array, channels: number): Uint8Array {
  if (channels <= 1) return new Uint8Array(data);
  const out = new Uint8Array(Math.floor(data.length / channels));
  for (let i = 0; i < out.length; i++) {
    out[i] = data[i * channels];
  }
  return out;
}

function clampInt(value: unknown, min: number, max: number, fallback: number) {
  const num = Math.floor(Number(value));
  if (!Number.isFinite(num)) return fallback;
  return Math.max(min, Math.min(max, num));
}
