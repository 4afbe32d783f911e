import type { AxiosInstance } from 'axios';
import { load, type CheerioAPI } from 'cheerio';
import { errorMessage } from '../errors.js';
import { getText } from '../http.js';
import { createLogger } from '../logger.js';
import type { TrendSource, TrendStrategy, TrendTopic } from '../types.js';

const logger = createLogger('src:trends');

function applyStrategy($: CheerioAPI, strategy: TrendStrategy, limit: number): TrendTopic[] {
    const out: TrendTopic[] = [];
    $(strategy.selector).each((_i, el) => {
        if (out.length >= limit) return false;
        const text = $(el).text().trim();
        if (!text || text.length < strategy.minLength) return;
        if (strategy.exclude.some((x) => text.includes(x))) return;
        out.push(text);
    });
    return out;
}

/**
 * 抓取热点榜
 * 只请求一次页面；主选择器无结果时依次尝试备用选择器，每种都受 limit 约束
 */
export async function fetchTrends(http: AxiosInstance, source: TrendSource): Promise<TrendTopic[]> {
    const start = Date.now();
    const $ = load(await getText(http, source.url));
    for (const strategy of source.strategies) {
        const trends = applyStrategy($, strategy, source.limit);
        if (trends.length > 0) {
            logger.info('trends.ok', { source: source.label, selector: strategy.selector, count: trends.length, ms: Date.now() - start });
            return trends;
        }
    }
    logger.info('trends.empty', { source: source.label, ms: Date.now() - start });
    return [];
}

/** 按源声明顺序拼接后按字符串全等去重，保留首次出现 */
export function mergeTrends(lists: TrendTopic[][]): TrendTopic[] {
    const seen = new Set<TrendTopic>();
    const out: TrendTopic[] = [];
    for (const list of lists) {
        for (const t of list) {
            if (seen.has(t)) continue;
            seen.add(t);
            out.push(t);
        }
    }
    return out;
}

export type TrendSourceResult = { label: string; trends: TrendTopic[]; error?: string };
export type TrendCollection = { trends: TrendTopic[]; results: TrendSourceResult[] };

/** 各源并行抓取，单源失败只贡献 0 条；合并顺序以声明顺序为准，与完成先后无关 */
export async function collectTrends(http: AxiosInstance, sources: TrendSource[]): Promise<TrendCollection> {
    const results = await Promise.all(sources.map(async (s): Promise<TrendSourceResult> => {
        try {
            return { label: s.label, trends: await fetchTrends(http, s) };
        } catch (e) {
            logger.warn('trends.fail', { source: s.label, url: s.url, err: errorMessage(e) });
            return { label: s.label, trends: [], error: errorMessage(e) };
        }
    }));
    return { trends: mergeTrends(results.map((r) => r.trends)), results };
}
