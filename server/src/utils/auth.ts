/**
 * 认证工具函数
 * 处理 FAL API 的认证格式
 */

export type AuthType = 'key' | 'bearer';

/**
 * 清理 API Key：去除首尾空格、换行符等
 */
export function cleanApiKey(apiKey: string): string {
  return apiKey.trim().replace(/\n/g, '').replace(/\r/g, '').replace(/\s+/g, '');
}

/**
 * 获取认证 Header
 * FAL 默认使用 `Authorization: Key <key>`，部分网关要求 Bearer 格式，可通过 FAL_AUTH_TYPE 切换
 */
export function getAuthHeader(apiKey: string, authType: AuthType = 'key'): Record<string, string> {
  if (!apiKey) {
    throw new Error('API Key is required but was not provided');
  }

  const cleanedKey = cleanApiKey(apiKey);

  if (!cleanedKey) {
    throw new Error('API Key is empty after cleaning');
  }

  switch (authType) {
    case 'bearer':
      return { 'Authorization': `Bearer ${cleanedKey}` };
    case 'key':
    default:
      return { 'Authorization': `Key ${cleanedKey}` };
  }
}
