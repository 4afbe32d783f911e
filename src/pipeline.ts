import type { AxiosInstance } from 'axios';
import type { AppConfig } from './config.js';
import { NoItemsError } from './errors.js';
import { buildJsonPayload, formatDigest } from './format.js';
import { createLogger, type Logger } from './logger.js';
import type { Publisher, WebhookPayload } from './publish.js';
import { rankItems } from './ranking.js';
import { filterRelevant } from './relevance.js';
import { fetchSource } from './sources/index.js';
import type { PageExtractor } from './sources/html.js';
import { collectTrends } from './sources/trends.js';
import { contributors, createRunState, setSourceStatus, type RunState } from './state.js';
import { translateItems, type Translator } from './translate.js';
import type { AggregationResult, NewsItem } from './types.js';

const defaultLogger = createLogger('pipeline');

export type PipelineDeps = {
    config: AppConfig;
    http: AxiosInstance;
    publisher: Publisher;
    /** 仅在 config.translation.enabled 时使用 */
    translator?: Translator;
    extract?: PageExtractor;
    now?: () => Date;
    logger?: Logger;
};

/**
 * 抓取 → 过滤评分 → 排序 → [翻译]
 * 新闻源与热点源并行抓取；结果按声明顺序顺序合并，保证去重与署名顺序稳定
 * 所有源过滤后合计为 0 条时抛出 NoItemsError，不进入格式化
 */
export async function aggregate(deps: PipelineDeps): Promise<{ result: AggregationResult; state: RunState }> {
    const { config, http } = deps;
    const logger = deps.logger ?? defaultLogger;
    const now = deps.now?.() ?? new Date();
    const state = createRunState();
    const ctx = { http, now, freshnessHours: config.freshnessHours, extract: deps.extract };

    const [outcomes, trendCollection] = await Promise.all([
        Promise.all(config.sources.map((s) => fetchSource(s, ctx))),
        collectTrends(http, config.trendSources)
    ]);

    const all: NewsItem[] = [];
    for (const outcome of outcomes) {
        const relevant = filterRelevant(outcome.items, config.keywords, now);
        setSourceStatus(state, {
            label: outcome.label,
            kind: 'news',
            count: relevant.length,
            via: outcome.via,
            lastError: outcome.errors.at(-1)?.message
        });
        all.push(...relevant);
    }
    for (const r of trendCollection.results) {
        setSourceStatus(state, { label: r.label, kind: 'trends', count: r.trends.length, lastError: r.error });
    }
    logger.info('aggregate.fetched', { sources: outcomes.length, relevant: all.length, trends: trendCollection.trends.length });

    if (all.length === 0) throw new NoItemsError();

    let topItems = rankItems(all, config.maxItems);
    if (config.translation.enabled && deps.translator) {
        topItems = await translateItems(topItems, deps.translator, config.translation);
    }

    return {
        result: {
            topItems,
            trends: trendCollection.trends,
            generatedAt: now,
            newsSources: contributors(state, 'news'),
            trendSources: contributors(state, 'trends')
        },
        state
    };
}

/** 完整的一次运行：聚合、渲染、记录消息、推送；推送失败向上抛出 */
export async function runDigest(deps: PipelineDeps): Promise<{ result: AggregationResult; message: string; state: RunState }> {
    const logger = deps.logger ?? defaultLogger;
    const { result, state } = await aggregate(deps);
    const message = formatDigest(result, deps.config.digest);
    logger.info('digest.formatted', { items: result.topItems.length, trends: result.trends.length, message });

    const payload: WebhookPayload = deps.config.payloadMode === 'json'
        ? { mode: 'json', body: buildJsonPayload(result) }
        : { mode: 'text', text: message };
    await deps.publisher.publish(payload);
    return { result, message, state };
}
