import type { Category, TryOnResult } from '../types';

export interface TryOnPayload {
  person: Blob;
  garmentUrl: string;
  category: Category;
  mask?: Blob | null;
  promptExtra?: string;
}

export interface SubmitOptions {
  signal?: AbortSignal;
  fetchImpl?: typeof fetch;
  /** 请求已发出、等待响应时回调 */
  onSent?: () => void;
}

/**
 * 后端返回非 2xx 时抛出，message 为 "<status> <statusText>"，后端的 error 字段放在 serverMessage
 */
export class TryOnRequestError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly serverMessage?: string;

  constructor(status: number, statusText: string, serverMessage?: string) {
    super(`${status} ${statusText}`.trim());
    this.name = 'TryOnRequestError';
    this.status = status;
    this.statusText = statusText;
    this.serverMessage = serverMessage;
  }
}

/**
 * 本地校验不通过时抛出，不会发出请求
 */
export class PhotoInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PhotoInputError';
  }
}

export function validatePhotoFile(file: Blob, maxBytes: number): void {
  if (!file.type.startsWith('image/')) {
    throw new PhotoInputError('Please choose an image file');
  }
  if (file.size > maxBytes) {
    const mb = Math.round((maxBytes / 1024 / 1024) * 10) / 10;
    throw new PhotoInputError(`Image is too large (max ${mb}MB)`);
  }
}

/**
 * 相对地址按页面地址补全，后端只接受绝对 http(s) URL
 */
export function resolveGarmentUrl(url: string, base: string): string {
  try {
    return new URL(url, base).href;
  } catch {
    return url;
  }
}

export function buildTryOnForm(payload: TryOnPayload): FormData {
  const form = new FormData();
  form.append('person', payload.person, 'person.jpg');
  form.append('garmentUrl', payload.garmentUrl);
  form.append('category', payload.category);
  if (payload.mask) {
    form.append('mask', payload.mask, 'mask.png');
  }
  const extra = payload.promptExtra?.trim();
  if (extra) {
    form.append('promptExtra', extra);
  }
  return form;
}

function readString(data: object, key: string): string | undefined {
  const value: unknown = Reflect.get(data, key);
  return typeof value === 'string' ? value : undefined;
}

async function readServerError(response: Response): Promise<string | undefined> {
  try {
    const data: unknown = await response.json();
    if (typeof data === 'object' && data !== null) {
      return readString(data, 'error');
    }
  } catch {
    // 非 JSON 错误体，只保留状态行
  }
  return undefined;
}

/**
 * 调用后端 POST /api/tryon，返回生成图地址
 */
export async function submitTryOn(
  endpoint: string,
  payload: TryOnPayload,
  { signal, fetchImpl = fetch, onSent }: SubmitOptions = {}
): Promise<TryOnResult> {
  const pending = fetchImpl(endpoint, {
    method: 'POST',
    body: buildTryOnForm(payload),
    signal,
  });
  onSent?.();
  const response = await pending;

  if (!response.ok) {
    const serverMessage = await readServerError(response);
    console.error('[TryOn API Error]', response.status, serverMessage ?? response.statusText);
    throw new TryOnRequestError(response.status, response.statusText, serverMessage);
  }

  const data: unknown = await response.json();
  if (typeof data !== 'object' || data === null) {
    throw new Error('Invalid response from try-on service');
  }
  const imageUrl = readString(data, 'imageUrl');
  if (!imageUrl) {
    throw new Error('Try-on service returned no image');
  }

  const ttl: unknown = Reflect.get(data, 'ttlMinutes');
  return {
    imageUrl,
    createdAt: readString(data, 'createdAt'),
    expiresAt: readString(data, 'expiresAt'),
    ttlMinutes: typeof ttl === 'number' ? ttl : undefined,
    description: readString(data, 'description'),
    requestId: readString(data, 'requestId'),
  };
}
