import { describe, expect, it } from 'vitest';
import sharp from 'sharp';
import { normalizeMaskToPng, normalizePhotoToJpeg, parseDataUrl, toDataUrl } from './normalizeImage.js';
import { ClientInputError } from './errors.js';

const opts = { maxDim: 1536, quality: 92 };

function solidImage(width: number, height: number) {
  return sharp({ create: { width, height, channels: 3, background: { r: 180, g: 90, b: 60 } } });
}

describe('normalizePhotoToJpeg', () => {
  it('resizes to the bound and drops embedded metadata', async () => {
    const input = await solidImage(3000, 2000)
      .withMetadata({ exif: { IFD0: { Copyright: 'test-owner', Artist: 'test-artist' } } })
      .jpeg()
      .toBuffer();
    expect((await sharp(input).metadata()).exif).toBeDefined();

    const output = await normalizePhotoToJpeg(input, 'image/jpeg', opts);
    const meta = await sharp(output).metadata();

    expect(meta.format).toBe('jpeg');
    expect(meta.width).toBe(1536);
    expect(meta.height).toBe(1024);
    expect(meta.exif).toBeUndefined();
    expect(meta.icc).toBeUndefined();
    expect(meta.xmp).toBeUndefined();
  });

  it('applies the EXIF orientation before stripping it', async () => {
    const input = await solidImage(200, 100).withMetadata({ orientation: 6 }).jpeg().toBuffer();

    const meta = await sharp(await normalizePhotoToJpeg(input, 'image/jpeg', opts)).metadata();

    expect(meta.width).toBe(100);
    expect(meta.height).toBe(200);
    expect(meta.orientation).toBeUndefined();
  });

  it('never enlarges small photos', async () => {
    const input = await solidImage(640, 480).png().toBuffer();

    const meta = await sharp(await normalizePhotoToJpeg(input, 'image/png', opts)).metadata();

    expect(meta.format).toBe('jpeg');
    expect(meta.width).toBe(640);
    expect(meta.height).toBe(480);
  });

  it('converts webp to jpeg', async () => {
    const input = await solidImage(300, 300).webp().toBuffer();

    const meta = await sharp(await normalizePhotoToJpeg(input, 'image/webp', opts)).metadata();

    expect(meta.format).toBe('jpeg');
  });

  it('rejects bytes that are not an image', async () => {
    const promise = normalizePhotoToJpeg(Buffer.from('definitely not a jpeg'), 'image/jpeg', opts);

    await expect(promise).rejects.toBeInstanceOf(ClientInputError);
    await expect(promise).rejects.toMatchObject({ status: 400, message: 'Unsupported image type' });
  });
});

describe('normalizeMaskToPng', () => {
  it('keeps the alpha channel and bounds the size', async () => {
    const input = await sharp({
      create: { width: 2000, height: 1000, channels: 4, background: { r: 255, g: 0, b: 0, alpha: 0.5 } },
    }).png().toBuffer();

    const meta = await sharp(await normalizeMaskToPng(input, 1000)).metadata();

    expect(meta.format).toBe('png');
    expect(meta.width).toBe(1000);
    expect(meta.height).toBe(500);
    expect(meta.hasAlpha).toBe(true);
  });
});

describe('data URLs', () => {
  it('round-trips a buffer', () => {
    const buffer = Buffer.from([1, 2, 3, 250]);
    const url = toDataUrl('image/png', buffer);

    expect(url).toBe('data:image/png;base64,AQID+g==');
    expect(parseDataUrl(url)).toEqual({ mime: 'image/png', buffer });
  });

  it('rejects malformed input', () => {
    expect(() => parseDataUrl('https://example.test/a.png')).toThrow('Invalid data URL format');
  });
});
