import sharp from 'sharp';

import { QUALITY_LEVELS, type QualityLevelName, type Resolution } from '../quality/qualityLevels.js';

export interface DownsampledFrame {
  data: Buffer;
  width: number;
  height: number;
}

/**
 * Largest size with the source aspect ratio that fits inside `target`.
 * Sources already inside the target are returned unchanged.
 */
export function fitWithin(source: Resolution, target: Resolution): Resolution {
  if (source.width <= target.width && source.height <= target.height) {
    return { width: source.width, height: source.height };
  }

  const scale = Math.min(target.width / source.width, target.height / source.height);

  return {
    width: Math.max(1, Math.round(source.width * scale)),
    height: Math.max(1, Math.round(source.height * scale)),
  };
}

export async function downsampleForAnalysis(
  imageBytes: Buffer,
  level: QualityLevelName,
  jpegQuality = 80,
): Promise<DownsampledFrame> {
  if (imageBytes.byteLength === 0) {
    throw new Error('downsampleForAnalysis input imageBytes must be non-empty.');
  }

  const image = sharp(imageBytes);
  const { width, height } = await image.metadata();
  if (width === undefined || height === undefined) {
    throw new Error('downsampleForAnalysis could not read the source frame size.');
  }

  const size = fitWithin({ width, height }, QUALITY_LEVELS[level].targetResolution);
  const { data, info } = await image
    .resize(size.width, size.height, {
      fit: 'fill',
      fastShrinkOnLoad: true,
    })
    .jpeg({ quality: jpegQuality })
    .toBuffer({ resolveWithObject: true });

  return {
    data,
    width: info.width,
    height: info.height,
  };
}
