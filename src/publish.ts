import type { AxiosInstance } from 'axios';
import { PublishError, errorMessage } from './errors.js';
import type { JsonPayload } from './format.js';
import { createLogger } from './logger.js';

const logger = createLogger('publish');

export type WebhookPayload = { mode: 'text'; text: string } | { mode: 'json'; body: JsonPayload };

export interface Publisher {
    publish(payload: WebhookPayload): Promise<void>;
}

/**
 * Webhook 推送
 * 文本模式 text/plain，结构化模式 application/json；2xx 之外一律视为失败
 */
export class WebhookPublisher implements Publisher {
    constructor(private readonly http: AxiosInstance, private readonly webhookUrl: string) {}

    async publish(payload: WebhookPayload): Promise<void> {
        const [data, contentType] = payload.mode === 'text'
            ? [payload.text, 'text/plain; charset=utf-8']
            : [JSON.stringify(payload.body), 'application/json'];
        let status: number;
        let body: string;
        try {
            const resp = await this.http.post<unknown>(this.webhookUrl, data, {
                headers: { 'Content-Type': contentType },
                responseType: 'text',
                validateStatus: () => true
            });
            status = resp.status;
            body = typeof resp.data === 'string' ? resp.data : JSON.stringify(resp.data ?? '');
        } catch (e) {
            throw new PublishError(`error sending webhook: ${errorMessage(e)}`, undefined, undefined, { cause: e });
        }
        if (status < 200 || status >= 300) {
            throw new PublishError(`webhook returned status ${status}: ${body}`, status, body);
        }
        logger.info('publish.ok', { mode: payload.mode, status });
    }
}
