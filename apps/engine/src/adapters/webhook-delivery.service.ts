import fetch, { RequestInit } from 'node-fetch';
import { v7 as uuid } from 'uuid';
import { ActivityError, DeliveryService, OpportunityBrief } from '@briefline/sdk';
import { formatBriefMessage } from './brief-message';

const TAG = '[webhook]';

export interface HttpResponse {
    ok: boolean;
    status: number;
    text(): Promise<string>;
}

export type HttpPost = (url: string, init: RequestInit) => Promise<HttpResponse>;

export interface WebhookDeliveryOptions {
    url: string;
    post?: HttpPost;
}

function isRetryableStatus(status: number): boolean {
    return status === 429 || status >= 500;
}

/**
 * Posts briefs to an incoming-webhook URL. Network errors, 429 and 5xx
 * are transient; any other non-2xx is permanent.
 */
export class WebhookDeliveryService implements DeliveryService {
    private readonly url: string;
    private readonly post: HttpPost;

    constructor(options: WebhookDeliveryOptions) {
        this.url = options.url;
        this.post = options.post ?? fetch;
    }

    async deliver(brief: OpportunityBrief, destination: string, idempotencyKey: string, signal?: AbortSignal): Promise<string> {
        const message = formatBriefMessage(brief, destination);

        let res: HttpResponse;
        try {
            // an aborted request rejects here and is reported as transient
            res = await this.post(this.url, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json', 'Idempotency-Key': idempotencyKey },
                body: JSON.stringify(message),
                signal,
            });
        } catch (err) {
            throw ActivityError.transient(`webhook unreachable: ${err instanceof Error ? err.message : String(err)}`, err);
        }

        if (!res.ok) {
            const detail = `webhook POST → ${res.status}: ${await res.text()}`;
            if (isRetryableStatus(res.status)) throw ActivityError.transient(detail);
            throw ActivityError.permanent(detail);
        }

        const deliveryId = `webhook-${uuid()}`;
        console.log(`${TAG} brief for ${brief.companyName} posted to ${destination} (${deliveryId})`);
        return deliveryId;
    }
}
