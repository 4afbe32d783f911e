import type { AxiosInstance } from 'axios';
import { SourceFetchError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { normalizeItems } from '../normalize.js';
import type { NewsItem, RawItem, SourceDescriptor } from '../types.js';
import { cheerioExtractor, fetchPage, type PageExtractor } from './html.js';
import { fetchFeed } from './rss.js';

const logger = createLogger('src:fetch');

export type FetchContext = {
    http: AxiosInstance;
    now: Date;
    freshnessHours: number;
    extract?: PageExtractor;
};

export type Strategy = { kind: SourceDescriptor['kind']; url: string; run: (ctx: FetchContext) => Promise<RawItem[]> };

export type SourceOutcome = {
    label: string;
    items: NewsItem[];
    /** 命中的策略 URL；全部失败或为空时缺省 */
    via?: string;
    errors: SourceFetchError[];
};

/**
 * 将描述符及其回退链展开为有序策略列表
 * 例：RSS → 页面抓取；选择器 A 页 → 选择器 B 页
 */
export function buildStrategies(descriptor: SourceDescriptor): Strategy[] {
    const out: Strategy[] = [];
    let cur: SourceDescriptor | undefined = descriptor;
    while (cur) {
        const d: SourceDescriptor = cur;
        if (d.kind === 'feed') {
            out.push({ kind: 'feed', url: d.url, run: (ctx) => fetchFeed(ctx.http, d, ctx.now, ctx.freshnessHours) });
        } else {
            out.push({ kind: 'page', url: d.url, run: (ctx) => fetchPage(ctx.http, d, ctx.extract ?? cheerioExtractor) });
        }
        cur = d.fallback;
    }
    return out;
}

/**
 * 按策略顺序抓取单个源
 * 第一个无错误且非空的结果胜出；失败只记录不抛出，整条链耗尽时该源贡献 0 条
 */
export async function fetchSource(descriptor: SourceDescriptor, ctx: FetchContext): Promise<SourceOutcome> {
    const errors: SourceFetchError[] = [];
    for (const strategy of buildStrategies(descriptor)) {
        try {
            const items = normalizeItems(await strategy.run(ctx), descriptor.label, ctx.now);
            if (items.length > 0) return { label: descriptor.label, items, via: strategy.url, errors };
            logger.info('source.empty', { source: descriptor.label, url: strategy.url, kind: strategy.kind });
        } catch (e) {
            const err = new SourceFetchError(descriptor.label, strategy.url, e);
            errors.push(err);
            logger.warn(`${strategy.kind === 'feed' ? 'rss' : 'html'}.fail`, { source: descriptor.label, url: strategy.url, err: errorMessage(e) });
        }
    }
    return { label: descriptor.label, items: [], errors };
}
