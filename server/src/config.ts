/**
 * 服务端配置
 * 所有值来自环境变量（index.ts 先执行 dotenv.config()），这里只做解析和校验
 */

import type { AuthType } from './utils/auth.js';

export interface ServerConfig {
  port: number;
  host: string;
  publicBaseUrl: string;
  allowedOrigins: string[];
  trustProxy: boolean;
  falKey: string;
  falRunUrl: string;
  falAuthType: AuthType;
  providerTimeoutMs: number;
  maxUploadBytes: number;
  allowedImageTypes: string[];
  maxImageDim: number;
  jpegQuality: number;
  ttlMs: number;
  sweepIntervalMs: number;
  tmpDir: string;
  rateLimitPerMinute: number;
}

export const DEFAULT_IMAGE_TYPES = [
  'image/jpeg',
  'image/jpg',
  'image/png',
  'image/webp',
  'image/heic',
  'image/heif',
];

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number, opts?: { min?: number; max?: number }): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid ${key}: ${raw}`);
  }
  if (opts?.min !== undefined && value < opts.min) {
    throw new Error(`Invalid ${key}: ${raw} (must be >= ${opts.min})`);
  }
  if (opts?.max !== undefined && value > opts.max) {
    throw new Error(`Invalid ${key}: ${raw} (must be <= ${opts.max})`);
  }
  return value;
}

function readList(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

function readAuthType(raw: string | undefined): AuthType {
  const value = (raw ?? 'key').trim().toLowerCase();
  if (value === 'key' || value === 'bearer') return value;
  throw new Error(`Invalid FAL_AUTH_TYPE: ${raw} (expected "key" or "bearer")`);
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const port = readNumber(env, 'PORT', 8787, { min: 1, max: 65535 });
  const allowedImageTypes = readList(env.ALLOWED_IMAGE_TYPES).map(t => t.toLowerCase());

  return {
    port,
    host: env.HOST?.trim() || '0.0.0.0',
    publicBaseUrl: (env.PUBLIC_BASE_URL?.trim() || `http://localhost:${port}`).replace(/\/+$/, ''),
    allowedOrigins: readList(env.ALLOWED_ORIGINS),
    trustProxy: env.TRUST_PROXY === 'true' || env.TRUST_PROXY === '1',
    falKey: env.FAL_KEY?.trim() ?? '',
    falRunUrl: env.FAL_RUN_URL?.trim() || 'https://fal.run/fal-ai/nano-banana/edit',
    falAuthType: readAuthType(env.FAL_AUTH_TYPE),
    providerTimeoutMs: readNumber(env, 'PROVIDER_TIMEOUT_SECONDS', 120, { min: 1 }) * 1000,
    maxUploadBytes: readNumber(env, 'MAX_UPLOAD_MB', 10, { min: 1 }) * 1024 * 1024,
    allowedImageTypes: allowedImageTypes.length > 0 ? allowedImageTypes : DEFAULT_IMAGE_TYPES,
    maxImageDim: readNumber(env, 'MAX_IMAGE_DIM', 1536, { min: 64 }),
    jpegQuality: readNumber(env, 'JPEG_QUALITY', 92, { min: 1, max: 100 }),
    ttlMs: readNumber(env, 'DELETE_AFTER_MINUTES', 60, { min: 1 }) * 60 * 1000,
    sweepIntervalMs: readNumber(env, 'SWEEP_INTERVAL_SECONDS', 60, { min: 1 }) * 1000,
    tmpDir: env.TMP_DIR?.trim() || '.tmp',
    rateLimitPerMinute: readNumber(env, 'RATE_LIMIT_PER_MINUTE', 20, { min: 1 }),
  };
}
