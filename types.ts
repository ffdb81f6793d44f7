import type { Category } from './shared/category';

export type { Category };

/**
 * 购物篮条目，只存在于页面内存里，刷新即清空
 */
export interface BasketItem {
  url: string;
  name: string;
  price: string;
}

/**
 * POST /api/tryon 的成功响应
 */
export interface TryOnResult {
  imageUrl: string;
  createdAt?: string;
  expiresAt?: string;
  ttlMinutes?: number;
  description?: string;
  requestId?: string;
}

export interface TryOnOutcome {
  imageUrl: string;
  item: BasketItem;
}

/**
 * <tryon-button> 的属性解析结果
 */
export interface WidgetConfig {
  garmentUrl: string;
  apiEndpoint: string;
  text: string;
  garmentName: string;
  garmentPrice: string;
  category?: Category;
  promptExtra?: string;
  brushSize: number;
  maxUploadBytes: number;
}
