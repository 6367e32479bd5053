import { DeliveryService, OpportunityBrief } from '@briefline/sdk';
import { formatBriefMessage } from './brief-message';

const TAG = '[delivery:console]';

// Used when no webhook is configured: prints the message instead of posting it.
export class ConsoleDeliveryService implements DeliveryService {
    async deliver(brief: OpportunityBrief, destination: string, idempotencyKey: string): Promise<string> {
        const message = formatBriefMessage(brief, destination);
        console.log(`${TAG} channel: ${message.channel}`);
        console.log(`${TAG} ${message.text}`);
        console.log(brief.summary);
        return `console-${idempotencyKey}`;
    }
}
