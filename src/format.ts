import type { DigestLayout } from './config.js';
import type { AggregationResult, NewsItem } from './types.js';

const RULE = '━━━━━━━━━━━━━━━━━━━━━━━━━━━━';
const ELLIPSIS = '...';

/** 截断到 maxLen；优先在 maxLen 之内最后一个空格处断开，否则硬截断，均追加省略号 */
export function truncateText(s: string, maxLen: number): string {
    if (s.length <= maxLen) return s;
    let head = s.slice(0, maxLen);
    // 不拆开代理对（emoji 等）
    if (/[\uD800-\uDBFF]$/.test(head)) head = head.slice(0, -1);
    const lastSpace = head.lastIndexOf(' ');
    return (lastSpace > 0 ? head.slice(0, lastSpace) : head) + ELLIPSIS;
}

/** 形如 "October 19, 2026 - 14:05 UTC" */
export function formatTimestamp(date: Date, timeZone: string): string {
    const parts = new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: 'long',
        day: 'numeric',
        hour: '2-digit',
        minute: '2-digit',
        hourCycle: 'h23',
        timeZoneName: 'short'
    }).formatToParts(date);
    const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '';
    return `${get('month')} ${get('day')}, ${get('year')} - ${get('hour')}:${get('minute')} ${get('timeZoneName')}`;
}

function displayTitle(item: NewsItem): string {
    return item.translatedTitle || item.title;
}

function displayDescription(item: NewsItem): string {
    return item.translatedDescription || item.description;
}

/**
 * 渲染文本摘要
 * 依次为：标题与生成时间、排名条目、热点（最多 trendDisplayLimit 条）、来源署名
 */
export function formatDigest(result: AggregationResult, layout: DigestLayout): string {
    const lines: string[] = [];
    lines.push(layout.title);
    lines.push(`📅 ${formatTimestamp(result.generatedAt, layout.timeZone)}`);
    lines.push(RULE, '');

    result.topItems.forEach((item, i) => {
        lines.push(`📰 **${i + 1}. ${displayTitle(item)}**`);
        lines.push(`📍 Source: ${item.source}`);
        const description = displayDescription(item);
        if (description) lines.push(`📝 ${truncateText(description, layout.descriptionLength)}`);
        lines.push(`🔗 ${item.link}`, '');
    });

    lines.push(RULE);
    lines.push(layout.trendsTitle, '');
    if (result.trends.length === 0) {
        lines.push('No trending topics available at this time.');
    } else {
        for (const trend of result.trends.slice(0, layout.trendDisplayLimit)) lines.push(`• ${trend}`);
    }

    lines.push('', RULE);
    lines.push(`📊 Sources: ${result.newsSources.join(', ') || 'none'}`);
    lines.push(`🔍 Trends: ${result.trendSources.join(', ') || 'none'}`);
    return lines.join('\n');
}

function plural(n: number, one: string, many: string): string {
    return `${n} ${n === 1 ? one : many}`;
}

export function buildSummary(result: AggregationResult): string {
    const lead = result.topItems[0];
    const stories = `${plural(result.topItems.length, 'top story', 'top stories')} from ${plural(result.newsSources.length, 'source', 'sources')}`;
    const headline = lead ? `, led by "${displayTitle(lead)}"` : '';
    return `${stories}${headline}; ${plural(result.trends.length, 'trending topic', 'trending topics')}`;
}

export type JsonNewsEntry = {
    title: string;
    description: string;
    link: string;
    source: string;
    publishDate: string;
    score: number;
    translatedTitle?: string;
    translatedDescription?: string;
};

export type JsonPayload = { timestamp: string; news: JsonNewsEntry[]; trends: string[]; summary: string };

export function buildJsonPayload(result: AggregationResult): JsonPayload {
    return {
        timestamp: result.generatedAt.toISOString(),
        news: result.topItems.map((it) => ({
            title: it.title,
            description: it.description,
            link: it.link,
            source: it.source,
            publishDate: it.publishDate.toISOString(),
            score: it.score,
            ...(it.translatedTitle !== undefined ? { translatedTitle: it.translatedTitle } : {}),
            ...(it.translatedDescription !== undefined ? { translatedDescription: it.translatedDescription } : {})
        })),
        trends: [...result.trends],
        summary: buildSummary(result)
    };
}
