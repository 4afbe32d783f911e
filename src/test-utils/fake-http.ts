import { setTimeout as sleep } from 'node:timers/promises';
import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { createHttpClient } from '../http.js';

// delayMs 让该 URL 晚于其他请求完成，用于验证按声明顺序合并
export type FakeReply = { status?: number; body: unknown; delayMs?: number } | Error;
export type FakeRoute = FakeReply | ((config: InternalAxiosRequestConfig) => FakeReply);

/**
 * 进程内 axios adapter：按 URL 返回预置响应，未登记的 URL 视为连接被拒
 * 与内置 adapter 一样按 validateStatus 决定是否 reject
 */
export function createFakeHttp(routes: Record<string, FakeRoute>) {
    const calls: InternalAxiosRequestConfig[] = [];
    const adapter: AxiosAdapter = async (config) => {
        calls.push(config);
        const url = config.url ?? '';
        const route = routes[url];
        if (!route) throw new AxiosError(`connect ECONNREFUSED ${url}`, 'ECONNREFUSED', config);
        const reply = typeof route === 'function' ? route(config) : route;
        if (reply instanceof Error) throw reply;
        if (reply.delayMs) await sleep(reply.delayMs);
        const status = reply.status ?? 200;
        const response: AxiosResponse = { data: reply.body, status, statusText: String(status), headers: {}, config };
        if (config.validateStatus && !config.validateStatus(status)) {
            throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, undefined, response);
        }
        return response;
    };
    const http = createHttpClient({ requestTimeoutMs: 1000, userAgent: 'news-digest-test/1.0' }, adapter);
    return { http, calls };
}

export function rssXml(items: Array<{ title: string; link: string; description?: string; pubDate?: string }>): string {
    const body = items.map((it) => [
        '    <item>',
        `      <title>${it.title}</title>`,
        `      <link>${it.link}</link>`,
        it.description !== undefined ? `      <description>${it.description}</description>` : '',
        it.pubDate ? `      <pubDate>${it.pubDate}</pubDate>` : '',
        '    </item>'
    ].filter(Boolean).join('\n')).join('\n');
    return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Test Feed</title>
    <link>https://news.example.com</link>
    <description>Test</description>
${body}
  </channel>
</rss>`;
}
