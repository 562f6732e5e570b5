import sharp from 'sharp';

/**
 * Decoded image as interleaved 8-bit channel values without alpha
 */
export interface RawPixels {
  data: Uint8Array;
  width: number;
  height: number;
  channels: number;
}

export interface LuminanceCutoffs {
  /** Luminance below which a pixel counts as near-black */
  black: number;
  /** Luminance above which a pixel counts as near-white */
  white: number;
}

export interface PixelStatistics {
  /** Population variance over every channel value */
  variance: number;
  /** Fraction of pixels below the black cutoff */
  darkFraction: number;
  /** Fraction of pixels above the white cutoff */
  lightFraction: number;
}

/**
 * Decode an image into raw channel values with sharp.
 */
export async function decodePixels(image: Buffer): Promise<RawPixels> {
  const { data, info } = await sharp(image)
    .removeAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  return {
    data,
    width: info.width,
    height: info.height,
    channels: info.channels,
  };
}

/**
 * Variance and near-black/near-white fractions of an image.
 *
 * A pixel's luminance is the mean of its channels. An image without pixels
 * has zero variance and zero fractions.
 */
export function computePixelStatistics(
  pixels: RawPixels,
  cutoffs: LuminanceCutoffs,
): PixelStatistics {
  const { data, channels } = pixels;
  const pixelCount = channels > 0 ? Math.floor(data.length / channels) : 0;
  if (pixelCount === 0) {
    return { variance: 0, darkFraction: 0, lightFraction: 0 };
  }

  const valueCount = pixelCount * channels;
  let sum = 0;
  let sumOfSquares = 0;
  let dark = 0;
  let light = 0;

  for (let p = 0; p < pixelCount; p++) {
    let pixelSum = 0;
    for (let c = 0; c < channels; c++) {
      const value = data[p * channels + c];
      pixelSum += value;
      sum += value;
      sumOfSquares += value * value;
    }

    const luminance = pixelSum / channels;
    if (luminance < cutoffs.black) dark++;
    else if (luminance > cutoffs.white) light++;
  }

  const mean = sum / valueCount;
  return {
    variance: Math.max(0, sumOfSquares / valueCount - mean * mean),
    darkFraction: dark / pixelCount,
    lightFraction: light / pixelCount,
  };
}
