/**
 * 错误类型
 * 每个错误都带 HTTP status，由 app.ts 末尾的错误中间件统一转成 { error, status }
 */

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

/**
 * 上传内容不合法：缺文件、超大、类型不支持、被内容策略拒绝
 */
export class ClientInputError extends HttpError {
  constructor(message: string, status: 400 | 413 | 415 | 422 = 400) {
    super(status, message);
    this.name = 'ClientInputError';
  }
}

/**
 * 外部生成服务调用失败或超时
 */
export class ProviderError extends HttpError {
  readonly timedOut: boolean;

  constructor(message: string, opts?: { timedOut?: boolean; cause?: unknown }) {
    super(opts?.timedOut ? 504 : 502, message);
    this.name = 'ProviderError';
    this.timedOut = opts?.timedOut ?? false;
    if (opts?.cause !== undefined) {
      this.cause = opts.cause;
    }
  }
}

/**
 * 临时文件写入失败（删除失败只记日志，不会抛出）
 */
export class StorageError extends HttpError {
  constructor(message: string, cause?: unknown) {
    super(500, message);
    this.name = 'StorageError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
