import express from 'express';
import multer from 'multer';
import rateLimit from 'express-rate-limit';
import sharp from 'sharp';
import type { ServerConfig } from '../config.js';
import type { ArtifactStore } from '../services/artifactStore.js';
import type { TryOnProvider } from '../services/falProvider.js';
import { ClientInputError, ProviderError, errorMessage } from '../utils/errors.js';
import { normalizeMaskToPng, normalizePhotoToJpeg, toDataUrl } from '../utils/normalizeImage.js';
import { buildTryOnPrompt } from '../utils/promptBuilder.js';
import { DEFAULT_CATEGORY, inferCategoryFromUrl, isCategory, type Category } from '../../../shared/category.js';

export const MAX_PROMPT_EXTRA_LENGTH = 400;

export interface TryOnResponse {
  imageUrl: string;
  createdAt: string;
  expiresAt: string;
  ttlMinutes: number;
  description: string;
  requestId: string;
}

export interface TryOnRouteDeps {
  config: ServerConfig;
  provider: TryOnProvider;
  store: ArtifactStore;
}

type UploadedFiles = Express.Request['files'];

function pickFile(files: UploadedFiles, field: string): Express.Multer.File | undefined {
  if (!files) return undefined;
  if (Array.isArray(files)) return files.find(f => f.fieldname === field);
  return files[field]?.[0];
}

function readField(body: unknown, key: string): string | undefined {
  if (typeof body !== 'object' || body === null || !(key in body)) return undefined;
  const value: unknown = Reflect.get(body, key);
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * 简单的内容策略：文件名命中关键词直接拒绝
 */
function guardFilename(filename: string): void {
  const name = filename.toLowerCase();
  if (name.includes('nude') || name.includes('nsfw')) {
    throw new ClientInputError('Content rejected by policy', 422);
  }
}

function assertAllowedType(file: Express.Multer.File, allowed: string[]): void {
  if (!allowed.includes(file.mimetype.toLowerCase())) {
    throw new ClientInputError('Unsupported image type', 415);
  }
}

function parseGarmentUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ClientInputError("Invalid 'garmentUrl'");
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ClientInputError("'garmentUrl' must be an http(s) URL");
  }
  return url.toString();
}

function resolveCategory(raw: string | undefined, garmentUrl: string | undefined): Category {
  if (raw !== undefined) {
    const normalized = raw.toLowerCase();
    if (!isCategory(normalized)) {
      throw new ClientInputError(`Invalid 'category': ${raw}`);
    }
    return normalized;
  }
  return garmentUrl ? inferCategoryFromUrl(garmentUrl) : DEFAULT_CATEGORY;
}

/**
 * 生成结果同样重新编码一次，保证落盘的文件是干净的 JPEG
 */
async function reencodeResult(buffer: Buffer, quality: number): Promise<Buffer> {
  try {
    return await sharp(buffer).rotate().jpeg({ quality, mozjpeg: true }).toBuffer();
  } catch (error) {
    throw new ProviderError(`Provider returned an unreadable image: ${errorMessage(error)}`);
  }
}

/**
 * POST /api/tryon
 * multipart: person（必填）、garmentUrl 或 garment、category、promptExtra、mask
 */
export function createTryOnRouter({ config, provider, store }: TryOnRouteDeps): express.Router {
  const router = express.Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxUploadBytes, files: 3, fields: 10 },
  });

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    limit: config.rateLimitPerMinute,
    message: { error: 'Too many requests, please try again later.', status: 429 },
    standardHeaders: true,
    legacyHeaders: false,
  });

  const fields = upload.fields([
    { name: 'person', maxCount: 1 },
    { name: 'garment', maxCount: 1 },
    { name: 'mask', maxCount: 1 },
  ]);

  router.post('/', limiter, fields, async (req, res, next) => {
    const startedAt = Date.now();
    try {
      const person = pickFile(req.files, 'person');
      if (!person) {
        throw new ClientInputError("Missing 'person' file");
      }
      guardFilename(person.originalname);
      assertAllowedType(person, config.allowedImageTypes);

      const garmentFile = pickFile(req.files, 'garment');
      const rawGarmentUrl = readField(req.body, 'garmentUrl');
      if (!rawGarmentUrl && !garmentFile) {
        throw new ClientInputError("Missing 'garmentUrl' or 'garment' file");
      }
      const garmentUrl = rawGarmentUrl ? parseGarmentUrl(rawGarmentUrl) : undefined;
      if (garmentFile && !garmentUrl) {
        assertAllowedType(garmentFile, config.allowedImageTypes);
      }

      const category = resolveCategory(readField(req.body, 'category'), garmentUrl);

      const promptExtra = readField(req.body, 'promptExtra');
      if (promptExtra && promptExtra.length > MAX_PROMPT_EXTRA_LENGTH) {
        throw new ClientInputError(`'promptExtra' must be at most ${MAX_PROMPT_EXTRA_LENGTH} characters`);
      }

      const maskFile = pickFile(req.files, 'mask');
      if (maskFile) {
        assertAllowedType(maskFile, config.allowedImageTypes);
      }

      // 步骤1：去元数据 + 缩放，之后的处理只接触标准化后的图片
      const normalizeOpts = { maxDim: config.maxImageDim, quality: config.jpegQuality };
      const personJpeg = await normalizePhotoToJpeg(person.buffer, person.mimetype, normalizeOpts);
      let garmentImage: string;
      if (garmentUrl) {
        garmentImage = garmentUrl;
      } else if (garmentFile) {
        garmentImage = toDataUrl('image/jpeg', await normalizePhotoToJpeg(garmentFile.buffer, garmentFile.mimetype, normalizeOpts));
      } else {
        throw new ClientInputError("Missing 'garmentUrl' or 'garment' file");
      }
      const maskImage = maskFile
        ? toDataUrl('image/png', await normalizeMaskToPng(maskFile.buffer, config.maxImageDim))
        : undefined;

      console.log(
        `[TryOn Route] Prepared inputs in ${Date.now() - startedAt}ms ` +
        `(category=${category}, person=${personJpeg.length}B, mask=${maskImage ? 'yes' : 'no'})`
      );

      // 步骤2：调用生成服务（只调用一次，失败直接返回错误，此前不落盘任何文件）
      // 生成和下载结果共用一个超时预算
      const deadline = Date.now() + config.providerTimeoutMs;
      const generated = await provider.generate({
        prompt: buildTryOnPrompt({ category, promptExtra, hasMask: Boolean(maskImage) }),
        personImage: toDataUrl('image/jpeg', personJpeg),
        garmentImage,
        maskImage,
        onProgress: message => console.log(`[TryOn Route] Provider: ${message}`),
      });

      // 步骤3：取回结果并保存为临时文件
      const resultBytes = await provider.fetchImage(generated.imageUrl, { deadline });
      const resultJpeg = await reencodeResult(resultBytes, config.jpegQuality);
      const artifact = await store.save(resultJpeg);

      console.log(`[TryOn Route] Request ${generated.requestId} done in ${Date.now() - startedAt}ms -> ${artifact.name}`);

      const body: TryOnResponse = {
        imageUrl: `${config.publicBaseUrl}/tmp/${artifact.name}`,
        createdAt: new Date(artifact.createdAt).toISOString(),
        expiresAt: new Date(store.expiresAt(artifact)).toISOString(),
        ttlMinutes: Math.round(store.ttlMs / 60000),
        description: generated.description || 'Generated try-on preview',
        requestId: generated.requestId,
      };
      res.json(body);
    } catch (error) {
      if (error instanceof ProviderError) {
        next(new ProviderError(`Upstream failure: ${error.message}`, { timedOut: error.timedOut, cause: error }));
        return;
      }
      next(error);
    }
  });

  return router;
}
