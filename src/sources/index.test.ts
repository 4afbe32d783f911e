import { describe, it, expect } from 'vitest';
import { SourceFetchError } from '../errors.js';
import { createFakeHttp, rssXml } from '../test-utils/fake-http.js';
import type { SourceDescriptor } from '../types.js';
import { buildStrategies, fetchSource } from './index.js';

const NOW = new Date('2026-10-19T12:00:00Z');
const FEED_URL = 'https://feeds.example.com/mx.xml';
const PAGE_URL = 'https://www.example.com/mexico/';

const rule = { item: 'article', title: ['h2 a'], link: ['h2 a'], description: ['p'], limit: 10 };
const descriptor: SourceDescriptor = {
    kind: 'feed',
    label: 'El Universal',
    url: FEED_URL,
    fallback: { kind: 'page', label: 'El Universal', url: PAGE_URL, rule }
};
const page = '<html><body><article><h2><a href="/nota/1">Madrid y México</a></h2><p>Acuerdo</p></article></body></html>';

describe('buildStrategies', () => {
    it('flattens the fallback chain in order', () => {
        expect(buildStrategies(descriptor).map((s) => [s.kind, s.url])).toEqual([['feed', FEED_URL], ['page', PAGE_URL]]);
    });
});

describe('fetchSource', () => {
    it('uses the primary strategy when it yields items', async () => {
        const { http, calls } = createFakeHttp({
            [FEED_URL]: { body: rssXml([{ title: 'Feed item', link: 'https://news.example.com/f', pubDate: 'Mon, 19 Oct 2026 11:00:00 GMT' }]) },
            [PAGE_URL]: { body: page }
        });
        const out = await fetchSource(descriptor, { http, now: NOW, freshnessHours: 24 });
        expect(out.via).toBe(FEED_URL);
        expect(out.items.map((i) => [i.title, i.source])).toEqual([['Feed item', 'El Universal']]);
        expect(calls.map((c) => c.url)).toEqual([FEED_URL]);
    });

    it('falls back when the primary strategy fails', async () => {
        const { http } = createFakeHttp({ [PAGE_URL]: { body: page } });
        const out = await fetchSource(descriptor, { http, now: NOW, freshnessHours: 24 });
        expect(out.via).toBe(PAGE_URL);
        expect(out.items).toEqual([{
            title: 'Madrid y México',
            description: 'Acuerdo',
            link: 'https://www.example.com/nota/1',
            source: 'El Universal',
            publishDate: NOW,
            score: 0
        }]);
        expect(out.errors).toHaveLength(1);
        expect(out.errors[0]).toBeInstanceOf(SourceFetchError);
        expect(out.errors[0].url).toBe(FEED_URL);
    });

    it('falls back when the primary strategy is empty', async () => {
        const { http } = createFakeHttp({
            [FEED_URL]: { body: rssXml([{ title: 'Vieja', link: 'https://news.example.com/v', pubDate: 'Thu, 01 Oct 2026 11:00:00 GMT' }]) },
            [PAGE_URL]: { body: page }
        });
        const out = await fetchSource(descriptor, { http, now: NOW, freshnessHours: 24 });
        expect(out.via).toBe(PAGE_URL);
        expect(out.errors).toEqual([]);
    });

    it('contributes zero items when every strategy fails', async () => {
        const { http } = createFakeHttp({ [PAGE_URL]: { status: 404, body: 'missing' } });
        const out = await fetchSource(descriptor, { http, now: NOW, freshnessHours: 24 });
        expect(out.items).toEqual([]);
        expect(out.via).toBeUndefined();
        expect(out.errors.map((e) => e.message)).toEqual([
            `El Universal: connect ECONNREFUSED ${FEED_URL}`,
            'El Universal: Request failed with status code 404'
        ]);
    });
});
