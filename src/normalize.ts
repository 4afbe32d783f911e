import type { NewsItem, RawItem } from './types.js';

/**
 * 标准化为 NewsItem
 * 去除首尾空白；无标题或无链接的记录丢弃；缺失发布时间补为 now；score 待评分
 */
export function normalizeItems(raw: RawItem[], source: string, now: Date): NewsItem[] {
    const out: NewsItem[] = [];
    for (const it of raw) {
        const title = it.title.trim();
        const link = it.link.trim();
        if (!title || !link) continue;
        out.push({
            title,
            description: (it.description || '').trim(),
            link,
            source,
            publishDate: it.publishedAt ?? now,
            score: 0
        });
    }
    return out;
}
