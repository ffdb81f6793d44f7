/**
 * 衣物类别定义，以及按 URL 关键词推断类别的规则
 * 组件和代理服务共用，请求里没有 category 时使用
 */

export const CATEGORIES = ['top', 'bottom', 'dress', 'outerwear'] as const;

export type Category = (typeof CATEGORIES)[number];

export const DEFAULT_CATEGORY: Category = 'top';

// 按顺序匹配："trench-dress" 归为 outerwear，"denim-skirt-dress" 归为 dress
const CATEGORY_PATTERNS: Array<[Category, RegExp]> = [
  ['outerwear', /(coat|jacket|parka|blazer|trench)/],
  ['dress', /(dress|gown|maxi|midi)/],
  ['bottom', /(jeans|trousers|pants|skirt|shorts)/],
];

export function isCategory(value: unknown): value is Category {
  return typeof value === 'string' && CATEGORIES.some(category => category === value);
}

/**
 * 根据商品图片 URL 中的关键词推断衣物类别，未命中时返回 top
 */
export function inferCategoryFromUrl(url: string): Category {
  const s = url.toLowerCase();
  for (const [category, pattern] of CATEGORY_PATTERNS) {
    if (pattern.test(s)) return category;
  }
  return DEFAULT_CATEGORY;
}
