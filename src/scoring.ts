import type { NewsItem } from './types.js';

const HOUR_MS = 60 * 60 * 1000;

/**
 * 评分器
 * 原因：简单可解释，只用于本次排序，不持久化
 * 实现：新鲜度分档（按整小时截断）+ 正文关键词命中 + 标题关键词加权
 * keywords 需为小写
 */
export function scoreItem(item: Pick<NewsItem, 'title' | 'description' | 'publishDate'>, keywords: string[], now: Date): number {
    const content = `${item.title} ${item.description}`.toLowerCase();
    const titleLower = item.title.toLowerCase();
    let score = recencyBonus(Math.trunc((now.getTime() - item.publishDate.getTime()) / HOUR_MS));
    for (const k of keywords) {
        if (content.includes(k)) score += 10;
    }
    for (const k of keywords) {
        if (titleLower.includes(k)) score += 20;
    }
    return score;
}

export function recencyBonus(ageHours: number): number {
    if (ageHours < 1) return 100;
    if (ageHours < 6) return 50;
    if (ageHours < 12) return 25;
    return 0;
}
