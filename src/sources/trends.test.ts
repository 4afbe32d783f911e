import { describe, it, expect } from 'vitest';
import { createFakeHttp } from '../test-utils/fake-http.js';
import type { TrendSource } from '../types.js';
import { collectTrends, fetchTrends, mergeTrends } from './trends.js';

const ES_URL = 'https://trends.example.com/spain/';
const MX_URL = 'https://trends.example.com/mexico/';

const primaryPage = `<html><body>
  <div class="trend-name">Real Madrid</div>
  <div class="trend-name">Elecciones...</div>
  <div class="trend-name">  </div>
  <div class="trend-name">Liga</div>
  <div class="trend-name">Otoño</div>
</body></html>`;

const secondaryPage = `<html><body>
  <ol class="trend-card__list">
    <li><a href="/t/1">#Hashtag</a></li>
    <li><a href="/t/2">Liga</a></li>
    <li><a href="/t/3">CDMX</a></li>
  </ol>
</body></html>`;

const esSource: TrendSource = {
    label: 'Trends ES',
    url: ES_URL,
    limit: 2,
    strategies: [{ selector: '.trend-name', exclude: ['...'], minLength: 1 }]
};
const mxSource: TrendSource = {
    label: 'Trends MX',
    url: MX_URL,
    limit: 10,
    strategies: [
        { selector: '.trend-card__title', exclude: [], minLength: 1 },
        { selector: 'ol.trend-card__list li a', exclude: ['#'], minLength: 1 }
    ]
};

describe('mergeTrends', () => {
    it('concatenates in source order and keeps first occurrences', () => {
        expect(mergeTrends([['a', 'b'], ['b', 'c']])).toEqual(['a', 'b', 'c']);
    });

    it('collapses duplicates inside a single list', () => {
        expect(mergeTrends([['b', 'a', 'b'], ['a']])).toEqual(['b', 'a']);
    });

    it('compares by exact string equality', () => {
        expect(mergeTrends([['Liga'], ['liga', 'Liga ']])).toEqual(['Liga', 'liga', 'Liga ']);
    });
});

describe('fetchTrends', () => {
    it('applies exclusions and the per-source cap', async () => {
        const { http } = createFakeHttp({ [ES_URL]: { body: primaryPage } });
        expect(await fetchTrends(http, esSource)).toEqual(['Real Madrid', 'Liga']);
    });

    it('falls back to the secondary selector on the same page', async () => {
        const { http, calls } = createFakeHttp({ [MX_URL]: { body: secondaryPage } });
        expect(await fetchTrends(http, mxSource)).toEqual(['Liga', 'CDMX']);
        expect(calls).toHaveLength(1);
    });

    it('enforces a minimum label length', async () => {
        const { http } = createFakeHttp({ [MX_URL]: { body: secondaryPage } });
        const source = { ...mxSource, strategies: [{ selector: 'ol.trend-card__list li a', exclude: ['#'], minLength: 5 }] };
        expect(await fetchTrends(http, source)).toEqual([]);
    });
});

describe('collectTrends', () => {
    it('merges in declaration order and isolates failing sources', async () => {
        const failing: TrendSource = { ...esSource, label: 'Broken', url: 'https://trends.example.com/down/' };
        const { http } = createFakeHttp({ [ES_URL]: { body: primaryPage }, [MX_URL]: { body: secondaryPage } });
        const out = await collectTrends(http, [esSource, failing, mxSource]);
        expect(out.trends).toEqual(['Real Madrid', 'Liga', 'CDMX']);
        expect(out.results.map((r) => [r.label, r.trends.length, r.error])).toEqual([
            ['Trends ES', 2, undefined],
            ['Broken', 0, 'connect ECONNREFUSED https://trends.example.com/down/'],
            ['Trends MX', 2, undefined]
        ]);
    });

    it('keeps declaration order when an earlier source responds later', async () => {
        const { http } = createFakeHttp({ [ES_URL]: { body: primaryPage, delayMs: 40 }, [MX_URL]: { body: secondaryPage } });
        const out = await collectTrends(http, [esSource, mxSource]);
        expect(out.trends).toEqual(['Real Madrid', 'Liga', 'CDMX']);
        expect(out.results.map((r) => r.label)).toEqual(['Trends ES', 'Trends MX']);
    });
});
