/**
 * FAL nano-banana/edit 适配层
 * 一次请求对应一次生成调用，不做重试；失败统一抛出 ProviderError
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { cleanApiKey, getAuthHeader, type AuthType } from '../utils/auth.js';
import { ProviderError, errorMessage } from '../utils/errors.js';
import { parseDataUrl } from '../utils/normalizeImage.js';

export interface TryOnGenerationInput {
  prompt: string;
  /** 人像照片，JPEG data URL */
  personImage: string;
  /** 商品图：公网 URL 或 data URL */
  garmentImage: string;
  /** 可选遮罩，PNG data URL */
  maskImage?: string;
  onProgress?: (message: string) => void;
}

export interface TryOnGenerationResult {
  imageUrl: string;
  description: string;
  requestId: string;
}

export interface FetchImageOptions {
  /** 整个请求的截止时间（epoch ms），生成和下载共用同一个时间预算 */
  deadline?: number;
}

export interface TryOnProvider {
  generate(input: TryOnGenerationInput): Promise<TryOnGenerationResult>;
  /** 取回生成结果的原始字节（http(s) 或 data URL） */
  fetchImage(url: string, options?: FetchImageOptions): Promise<Buffer>;
}

export const DEFAULT_MAX_DOWNLOAD_BYTES = 25 * 1024 * 1024;

export interface FalProviderOptions {
  apiKey: string;
  runUrl: string;
  authType?: AuthType;
  timeoutMs?: number;
  pollIntervalMs?: number;
  maxDownloadBytes?: number;
  fetchImpl?: typeof fetch;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(obj: JsonObject | undefined, key: string): string | undefined {
  const value = obj?.[key];
  return typeof value === 'string' && value ? value : undefined;
}

function nested(obj: JsonObject, key: string): JsonObject | undefined {
  const value = obj[key];
  return isObject(value) ? value : undefined;
}

/**
 * FAL 的同步接口直接返回 images；队列接口把结果放在 data 下，两种都兼容
 */
function readFirstImage(body: JsonObject): { found: boolean; url?: string } {
  const candidates = [body.images, nested(body, 'data')?.images];
  for (const images of candidates) {
    if (Array.isArray(images) && images.length > 0) {
      const first: unknown = images[0];
      return { found: true, url: isObject(first) ? readString(first, 'url') : undefined };
    }
  }
  return { found: false };
}

function readDescription(body: JsonObject): string | undefined {
  return readString(body, 'description') ?? readString(nested(body, 'data'), 'description');
}

function readRequestId(body: JsonObject): string {
  return (
    readString(body, 'request_id') ??
    readString(body, 'requestId') ??
    readString(nested(body, 'request'), 'id') ??
    'unknown'
  );
}

function readStatusUrl(body: JsonObject): string | undefined {
  return readString(body, 'status_url') ?? readString(nested(body, 'request'), 'status_url');
}

function isTimeoutError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) return false;
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

export class FalProvider implements TryOnProvider {
  private readonly apiKey: string;
  private readonly runUrl: string;
  private readonly authType: AuthType;
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly maxDownloadBytes: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FalProviderOptions) {
    this.apiKey = options.apiKey;
    this.runUrl = options.runUrl;
    this.authType = options.authType ?? 'key';
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.maxDownloadBytes = options.maxDownloadBytes ?? DEFAULT_MAX_DOWNLOAD_BYTES;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async generate(input: TryOnGenerationInput): Promise<TryOnGenerationResult> {
    // 只有空白字符的 key 等同于未配置
    if (!cleanApiKey(this.apiKey)) {
      throw new ProviderError('FAL_KEY not configured');
    }

    const deadline = Date.now() + this.timeoutMs;
    let authHeader: Record<string, string>;
    try {
      authHeader = getAuthHeader(this.apiKey, this.authType);
    } catch (error) {
      throw new ProviderError(`FAL auth failed: ${errorMessage(error)}`, { cause: error });
    }
    const headers = {
      'Content-Type': 'application/json',
      ...authHeader,
    };

    const imageUrls = [input.personImage, input.garmentImage];
    if (input.maskImage) {
      imageUrls.push(input.maskImage);
    }

    const payload = {
      prompt: input.prompt,
      image_urls: imageUrls,
      output_format: 'jpeg',
      num_images: 1,
    };

    console.log(`[FalProvider] Calling ${this.runUrl} with ${imageUrls.length} images`);
    const data = await this.requestJson(this.runUrl, { method: 'POST', headers, body: JSON.stringify(payload) }, deadline, 'FAL run');
    const requestId = readRequestId(data);
    let description = readDescription(data) ?? '';

    const image = readFirstImage(data);
    if (image.found) {
      if (!image.url) {
        throw new ProviderError('FAL response had no image url');
      }
      return { imageUrl: image.url, description, requestId };
    }

    const statusUrl = readStatusUrl(data);
    if (!statusUrl) {
      throw new ProviderError('FAL did not return images or a status_url');
    }

    console.log(`[FalProvider] Request ${requestId} queued, polling status`);
    while (Date.now() < deadline) {
      const status = await this.requestJson(statusUrl, { method: 'GET', headers }, deadline, 'FAL status');

      const logs = status.logs;
      if (input.onProgress && Array.isArray(logs)) {
        for (const log of logs) {
          const message = isObject(log) ? readString(log, 'message') : undefined;
          if (message) input.onProgress(message);
        }
      }

      description = readDescription(status) ?? description;
      const polled = readFirstImage(status);
      if (polled.found) {
        if (!polled.url) {
          throw new ProviderError('FAL status response had no image url');
        }
        return { imageUrl: polled.url, description, requestId };
      }

      await sleep(Math.min(this.pollIntervalMs, Math.max(0, deadline - Date.now())));
    }

    throw new ProviderError('FAL polling timed out', { timedOut: true });
  }

  async fetchImage(url: string, { deadline }: FetchImageOptions = {}): Promise<Buffer> {
    if (url.startsWith('data:')) {
      try {
        return parseDataUrl(url).buffer;
      } catch (error) {
        throw new ProviderError(`Invalid result image: ${errorMessage(error)}`);
      }
    }

    const remaining = (deadline ?? Date.now() + this.timeoutMs) - Date.now();
    if (remaining <= 0) {
      throw new ProviderError('Result download timed out', { timedOut: true });
    }

    let bytes: Buffer;
    try {
      const response = await this.fetchImpl(url, { signal: AbortSignal.timeout(remaining) });
      if (!response.ok) {
        throw new ProviderError(`Result download failed: ${response.status} ${response.statusText}`);
      }
      const declared = Number(response.headers.get('content-length'));
      if (declared > this.maxDownloadBytes) {
        throw new ProviderError(`Result image too large: ${declared} bytes`);
      }
      bytes = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      if (isTimeoutError(error)) {
        throw new ProviderError('Result download timed out', { timedOut: true, cause: error });
      }
      throw new ProviderError(`Result download failed: ${errorMessage(error)}`, { cause: error });
    }

    if (bytes.length > this.maxDownloadBytes) {
      throw new ProviderError(`Result image too large: ${bytes.length} bytes`);
    }
    return bytes;
  }

  private async requestJson(url: string, init: RequestInit, deadline: number, label: string): Promise<JsonObject> {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new ProviderError(`${label} timed out`, { timedOut: true });
    }

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(remaining) });
      text = await response.text();
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new ProviderError(`${label} timed out`, { timedOut: true, cause: error });
      }
      throw new ProviderError(`${label} failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      console.error(`[FalProvider] ${label} error: ${response.status}`, text.substring(0, 500));
      throw new ProviderError(`${label} failed: ${response.status} ${text.substring(0, 200)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      console.error(`[FalProvider] Failed to parse ${label} response as JSON:`, text.substring(0, 500));
      throw new ProviderError(`Invalid JSON response from ${label}`);
    }
    if (!isObject(parsed)) {
      throw new ProviderError(`Unexpected ${label} response`);
    }
    return parsed;
  }
}
