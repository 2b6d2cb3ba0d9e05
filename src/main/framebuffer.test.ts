import { describe, expect, it } from 'vitest';
import { UnsupportedFormatError } from '../common/errors';
import { FRAMEBUFFER_BYTES, decodeFramebuffer, pixelAt, readFramebuffer } from './framebuffer';

describe('decodeFramebuffer', () => {
  it('decodes an all-zero framebuffer to a black raster', () => {
    const raster = decodeFramebuffer(new Uint8Array(FRAMEBUFFER_BYTES));

    expect(raster?.width).toBe(320);
    expect(raster?.height).toBe(240);
    expect(raster?.data).toHaveLength(320 * 240 * 3);
    expect(raster?.data.every((value) => value === 0)).toBe(true);
  });

  it('unpacks two pixels from every byte triplet', () => {
    const raw = new Uint8Array(FRAMEBUFFER_BYTES);
    raw.set([0x12, 0x34, 0x56], 0);
    raw.set([0xff, 0x0f, 0xf0], 480);

    const raster = readFramebuffer(raw);

    expect(pixelAt(raster, 0, 0)).toEqual([0x20, 0x10, 0x40]);
    expect(pixelAt(raster, 1, 0)).toEqual([0x30, 0x60, 0x50]);
    expect(pixelAt(raster, 2, 0)).toEqual([0, 0, 0]);
    expect(pixelAt(raster, 0, 1)).toEqual([0xf0, 0xf0, 0xf0]);
    expect(pixelAt(raster, 1, 1)).toEqual([0, 0, 0xf0]);
  });

  it('refuses buffers of another size', () => {
    expect(decodeFramebuffer(new Uint8Array(100))).toBeUndefined();
    expect(() => readFramebuffer(new Uint8Array(FRAMEBUFFER_BYTES + 1))).toThrow(UnsupportedFormatError);
  });
});
