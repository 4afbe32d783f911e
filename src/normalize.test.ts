import { describe, it, expect } from 'vitest';
import { normalizeItems } from './normalize.js';

const NOW = new Date('2026-10-19T12:00:00Z');

describe('normalizeItems', () => {
    it('fills defaults and labels the source', () => {
        const published = new Date('2026-10-19T10:00:00Z');
        const out = normalizeItems([
            { title: '  Madrid  ', link: ' https://news.example.com/a ', description: ' texto ', publishedAt: published },
            { title: 'Sin fecha', link: 'https://news.example.com/b' }
        ], 'El País', NOW);
        expect(out).toEqual([
            { title: 'Madrid', description: 'texto', link: 'https://news.example.com/a', source: 'El País', publishDate: published, score: 0 },
            { title: 'Sin fecha', description: '', link: 'https://news.example.com/b', source: 'El País', publishDate: NOW, score: 0 }
        ]);
    });

    it('drops records without a title or a link', () => {
        const out = normalizeItems([
            { title: '   ', link: 'https://news.example.com/a' },
            { title: 'Titular', link: '' }
        ], 'X', NOW);
        expect(out).toEqual([]);
    });
});
