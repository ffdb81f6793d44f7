/**
 * 图片格式标准化工具
 * 上传的人像照片在发往生成服务之前统一经过这里：
 * 解码（HEIC/HEIF 走 heic-convert）→ 按 EXIF 方向旋转 → 去掉所有元数据 → 限制最长边 → 重新编码
 */

import sharp from 'sharp';
import heicConvert from 'heic-convert';
import { ClientInputError, errorMessage } from './errors.js';

export interface NormalizeOptions {
  maxDim: number;
  quality: number;
}

const HEIF_MIMES = ['image/heic', 'image/heif'];

/**
 * 解析 data URL，提取 mime type 和 buffer
 */
export function parseDataUrl(dataUrl: string): { mime: string; buffer: Buffer } {
  const match = dataUrl.match(/^data:([^;,]+)(;base64)?,(.*)$/s);
  if (!match) {
    throw new Error('Invalid data URL format');
  }

  const mime = match[1].toLowerCase();
  const payload = match[3];
  const buffer = match[2] ? Buffer.from(payload, 'base64') : Buffer.from(decodeURIComponent(payload), 'utf8');

  return { mime, buffer };
}

/**
 * 将 buffer 转换为 data URL
 */
export function toDataUrl(mime: string, buffer: Buffer): string {
  return `data:${mime};base64,${buffer.toString('base64')}`;
}

export function isHeifMime(mime: string): boolean {
  return HEIF_MIMES.includes(mime.toLowerCase());
}

/**
 * 使用 heic-convert 把 HEIF/HEIC 转成 JPEG（sharp 预编译版本不带 HEVC 解码）
 */
async function convertHeif(buffer: Buffer): Promise<Buffer> {
  try {
    const output = await heicConvert({ buffer, format: 'JPEG', quality: 1 });
    return Buffer.from(output);
  } catch (error) {
    console.error('[NormalizeImage] HEIC conversion failed:', errorMessage(error));
    throw new ClientInputError('Unsupported image type');
  }
}

async function decodeInput(buffer: Buffer, mime: string): Promise<Buffer> {
  if (isHeifMime(mime)) {
    console.log(`[NormalizeImage] Converting ${mime} to JPEG...`);
    return convertHeif(buffer);
  }
  return buffer;
}

/**
 * 人像照片标准化：输出不含任何 EXIF/ICC/XMP 的 JPEG
 * sharp 默认不保留元数据，只要不调用 withMetadata/keepMetadata 即可
 *
 * @throws ClientInputError 图片无法解码
 */
export async function normalizePhotoToJpeg(
  buffer: Buffer,
  mime: string,
  opts: NormalizeOptions
): Promise<Buffer> {
  const decoded = await decodeInput(buffer, mime);

  try {
    return await sharp(decoded, { failOn: 'error' })
      .rotate()
      .resize(opts.maxDim, opts.maxDim, {
        fit: 'inside',
        withoutEnlargement: true,
      })
      .jpeg({ quality: opts.quality, mozjpeg: true })
      .toBuffer();
  } catch (error) {
    console.warn(`[NormalizeImage] Failed to decode ${mime}:`, errorMessage(error));
    throw new ClientInputError('Unsupported image type');
  }
}

/**
 * 遮罩标准化：保留透明通道，输出 PNG，尺寸同样限制在 maxDim 以内
 */
export async function normalizeMaskToPng(buffer: Buffer, maxDim: number): Promise<Buffer> {
  try {
    return await sharp(buffer, { failOn: 'error' })
      .resize(maxDim, maxDim, {
        fit: 'inside',
        withoutEnlargement: true,
      })
      .png()
      .toBuffer();
  } catch (error) {
    console.warn('[NormalizeImage] Failed to decode mask:', errorMessage(error));
    throw new ClientInputError('Unsupported mask image');
  }
}
