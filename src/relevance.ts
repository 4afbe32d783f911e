import { scoreItem } from './scoring.js';
import type { NewsItem } from './types.js';

// 子串包含而非分词匹配，"pedro sánchez" 这类词组同样适用
export function matchesKeywords(item: Pick<NewsItem, 'title' | 'description'>, keywords: string[]): boolean {
    const content = `${item.title} ${item.description}`.toLowerCase();
    return keywords.some((k) => content.includes(k));
}

/** 保留命中任一关键词的条目，并在过滤时写入 score */
export function filterRelevant(items: NewsItem[], keywords: string[], now: Date): NewsItem[] {
    const lower = keywords.map((k) => k.toLowerCase());
    return items
        .filter((it) => matchesKeywords(it, lower))
        .map((it) => ({ ...it, score: scoreItem(it, lower, now) }));
}
