import type { AxiosInstance } from 'axios';
import { TranslationError, errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import type { NewsItem } from './types.js';

const logger = createLogger('translate');

// 空摘要以占位文本参与批量翻译，保证批次内无空串且下标与条目对齐；译文不回填
const NO_DESCRIPTION = 'No description available';

export interface Translator {
    translate(texts: string[], sourceLang: string, targetLang: string): Promise<string[]>;
}

type DeepLResponse = { translations?: Array<{ detected_source_language?: string; text?: string }> };

/**
 * DeepL 批量翻译
 * 一次请求携带全部文本；非 200 视为失败并带回状态码与响应体
 */
export class DeepLTranslator implements Translator {
    constructor(private readonly http: AxiosInstance, private readonly apiKey: string, private readonly apiUrl: string) {}

    async translate(texts: string[], sourceLang: string, targetLang: string): Promise<string[]> {
        if (texts.length === 0) return [];
        const resp = await this.http.post<DeepLResponse>(this.apiUrl, {
            text: texts,
            source_lang: sourceLang,
            target_lang: targetLang
        }, {
            headers: { Authorization: 'DeepL-Auth-Key ' + this.apiKey, 'Content-Type': 'application/json' },
            validateStatus: () => true
        });
        if (resp.status !== 200) {
            const body = typeof resp.data === 'string' ? resp.data : JSON.stringify(resp.data);
            throw new TranslationError(`DeepL API error: ${resp.status} - ${body}`, resp.status, body);
        }
        return (resp.data?.translations || []).map((t) => t.text ?? '');
    }
}

async function translateBatch(translator: Translator, texts: string[], langs: { sourceLang: string; targetLang: string }, what: string): Promise<string[] | undefined> {
    try {
        return await translator.translate(texts, langs.sourceLang, langs.targetLang);
    } catch (e) {
        logger.warn('translate.fail', { what, count: texts.length, err: errorMessage(e) });
        return undefined;
    }
}

/**
 * 翻译排名后的条目
 * 标题、摘要各一次批量调用；整批失败或返回条数不足时，对应条目回退为原文
 */
export async function translateItems(items: NewsItem[], translator: Translator, langs: { sourceLang: string; targetLang: string }): Promise<NewsItem[]> {
    if (items.length === 0) return [];
    const titles = await translateBatch(translator, items.map((it) => it.title), langs, 'titles');
    const descriptions = await translateBatch(translator, items.map((it) => it.description || NO_DESCRIPTION), langs, 'descriptions');
    logger.info('translate.done', { count: items.length, titles: titles?.length ?? 0, descriptions: descriptions?.length ?? 0 });
    return items.map((it, i) => ({
        ...it,
        translatedTitle: titles && i < titles.length ? titles[i] : it.title,
        translatedDescription: it.description && descriptions && i < descriptions.length ? descriptions[i] : it.description
    }));
}
