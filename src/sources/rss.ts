import type { AxiosInstance } from 'axios';
import Parser from 'rss-parser';
import { getText } from '../http.js';
import { createLogger } from '../logger.js';
import type { FeedSource, RawItem } from '../types.js';

const parser = new Parser();
const logger = createLogger('src:rss');

const HOUR_MS = 60 * 60 * 1000;

function parseDate(value?: string): Date | undefined {
    if (!value) return undefined;
    const ms = Date.parse(value);
    return Number.isNaN(ms) ? undefined : new Date(ms);
}

/**
 * 抓取 RSS 源
 * 经共享客户端下载（超时与 UA 一致），再交给 rss-parser 解析
 * 超出新鲜度窗口的条目丢弃；无发布时间的视为新鲜，由归一化补为当前时间
 * 失败向上抛出，由回退链决定是否尝试下一策略
 */
export async function fetchFeed(http: AxiosInstance, source: FeedSource, now: Date, freshnessHours = 24): Promise<RawItem[]> {
    const start = Date.now();
    const xml = await getText(http, source.url);
    const feed = await parser.parseString(xml);
    const cutoff = now.getTime() - freshnessHours * HOUR_MS;
    const items: RawItem[] = [];
    for (const it of feed.items || []) {
        const publishedAt = parseDate(it.isoDate || it.pubDate);
        if (publishedAt && publishedAt.getTime() < cutoff) continue;
        items.push({
            title: (it.title || '').trim(),
            link: (it.link || '').trim(),
            description: it.contentSnippet || it.content || it.summary || '',
            publishedAt
        });
    }
    logger.info('rss.ok', { source: source.label, total: feed.items.length, fresh: items.length, ms: Date.now() - start });
    return items;
}
