import { UnsupportedFormatError } from '../common/errors';

export const SCREEN_WIDTH = 320;
export const SCREEN_HEIGHT = 240;
/** 320 x 240 pixels at 12 bits each. */
export const FRAMEBUFFER_BYTES = (SCREEN_WIDTH * SCREEN_HEIGHT * 12) / 8;

export interface RgbRaster {
  width: number;
  height: number;
  /** Row-major RGB triplets. */
  data: Uint8Array;
}

/**
 * Expands the device's 12-bit framebuffer to 24-bit RGB.
 *
 * Every byte triplet W0 W1 W2 packs two pixels as nibbles:
 * `[G|R] [R'|B] [B'|G']`. Each nibble becomes the high nibble of its channel,
 * so the low nibble of every output byte is zero.
 */
export function decodeFramebuffer(raw: Uint8Array): RgbRaster | undefined {
  if (raw.length !== FRAMEBUFFER_BYTES) {
    return undefined;
  }

  const data = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT * 3);
  for (let src = 0, dst = 0; src < raw.length; src += 3, dst += 6) {
    const w0 = raw[src];
    const w1 = raw[src + 1];
    const w2 = raw[src + 2];

    data[dst] = (w0 & 0x0f) << 4;
    data[dst + 1] = w0 & 0xf0;
    data[dst + 2] = (w1 & 0x0f) << 4;

    data[dst + 3] = w1 & 0xf0;
    data[dst + 4] = (w2 & 0x0f) << 4;
    data[dst + 5] = w2 & 0xf0;
  }

  return { width: SCREEN_WIDTH, height: SCREEN_HEIGHT, data };
}

export function readFramebuffer(raw: Uint8Array): RgbRaster {
  const raster = decodeFramebuffer(raw);
  if (!raster) {
    throw new UnsupportedFormatError(raw.length, FRAMEBUFFER_BYTES);
  }
  return raster;
}

export function pixelAt(raster: RgbRaster, x: number, y: number): [number, number, number] {
  const offset = (y * raster.width + x) * 3;
  return [raster.data[offset], raster.data[offset + 1], raster.data[offset + 2]];
}
