import type { NewsItem } from './types.js';

export const DEFAULT_MAX_ITEMS = 5;

/** 按 score 降序取前 maxItems 条；同分保持输入顺序（Array#sort 稳定），不修改入参 */
export function rankItems(items: NewsItem[], maxItems = DEFAULT_MAX_ITEMS): NewsItem[] {
    return [...items].sort((a, b) => b.score - a.score).slice(0, Math.max(0, maxItems));
}
