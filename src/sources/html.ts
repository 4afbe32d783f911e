import type { AxiosInstance } from 'axios';
import { load, type Cheerio } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import { getText } from '../http.js';
import { createLogger } from '../logger.js';
import type { ExtractionRule, PageSource, RawItem } from '../types.js';

const logger = createLogger('src:html');

export type ExtractedRecord = { title: string; href: string; description: string };

/** 从页面内容与抽取规则得到重复的“文章”记录；具体选择器引擎由实现决定 */
export type PageExtractor = (html: string, rule: ExtractionRule) => ExtractedRecord[];

function firstText<T extends AnyNode>(scope: Cheerio<T>, selectors: string[]): { text: string; el?: Cheerio<Element> } {
    for (const sel of selectors) {
        const el = scope.find(sel).first();
        const text = el.text().trim();
        if (text) return { text, el };
    }
    return { text: '' };
}

function firstHref<T extends AnyNode>(scope: Cheerio<T>, selectors: string[]): string {
    for (const sel of selectors) {
        const href = (scope.find(sel).first().attr('href') || '').trim();
        if (href) return href;
    }
    return '';
}

/**
 * 基于 cheerio 的默认抽取器
 * 标题候选按顺序取首个非空；标题元素自身是链接时直接取其 href，否则按 link 候选查找
 * 达到 rule.limit 条后停止遍历
 */
export const cheerioExtractor: PageExtractor = (html, rule) => {
    const $ = load(html);
    const out: ExtractedRecord[] = [];
    $(rule.item).each((_i, node) => {
        if (out.length >= rule.limit) return false;
        const scope = $(node);
        const title = firstText(scope, rule.title);
        if (!title.text) return;
        const ownHref = (title.el?.attr('href') || '').trim();
        const href = ownHref || firstHref(scope, rule.link);
        if (!href) return;
        const description = firstText(scope, rule.description).text;
        out.push({ title: title.text, href, description });
    });
    return out;
};

export function resolveLink(href: string, origin: string): string {
    if (/^https?:\/\//i.test(href)) return href;
    return new URL(href, origin).toString();
}

/**
 * 抓取新闻列表页
 * 相对链接以站点 origin 补全；记录数受 rule.limit 约束
 * 页面无发布时间，publishedAt 留空由归一化补为当前时间
 */
export async function fetchPage(http: AxiosInstance, source: PageSource, extract: PageExtractor = cheerioExtractor): Promise<RawItem[]> {
    const start = Date.now();
    const html = await getText(http, source.url);
    const origin = source.origin || new URL(source.url).origin;
    const items: RawItem[] = [];
    for (const rec of extract(html, source.rule)) {
        if (items.length >= source.rule.limit) break;
        let link: string;
        try {
            link = resolveLink(rec.href, origin);
        } catch (e) {
            logger.debug('html.bad_link', { source: source.label, href: rec.href, err: e instanceof Error ? e.message : String(e) });
            continue;
        }
        items.push({ title: rec.title, link, description: rec.description });
    }
    logger.info('html.ok', { source: source.label, count: items.length, ms: Date.now() - start });
    return items;
}
