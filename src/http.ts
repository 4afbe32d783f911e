import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { AppConfig } from './config.js';

/**
 * 单次运行共用的 HTTP 客户端
 * 统一超时与 User-Agent，抓取、翻译、推送都走这一个实例；测试可注入 adapter
 */
export function createHttpClient(config: Pick<AppConfig, 'requestTimeoutMs' | 'userAgent'>, adapter?: AxiosAdapter): AxiosInstance {
    return axios.create({
        timeout: config.requestTimeoutMs,
        headers: { 'User-Agent': config.userAgent },
        ...(adapter ? { adapter } : {})
    });
}

export async function getText(http: AxiosInstance, url: string): Promise<string> {
    const res = await http.get<string>(url, { responseType: 'text' });
    return typeof res.data === 'string' ? res.data : String(res.data);
}
