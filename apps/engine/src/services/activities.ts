import {
    AnalysisService,
    DeliveryReceipt,
    DeliveryService,
    parseAccountContext,
    parseDeliveryRequest,
    parseOpportunityBrief,
} from '@briefline/sdk';
import { ActivityHandlers } from './activity-executor';

export interface ActivityDependencies {
    analysis: AnalysisService;
    delivery: DeliveryService;
}

// Inputs are validated before the collaborator sees them; a ZodError
// classifies as malformed_input and is not retried.
export function createActivityHandlers(deps: ActivityDependencies): ActivityHandlers {
    return {
        analyze: async (input) => {
            const brief = await deps.analysis.analyze(parseAccountContext(input));
            return parseOpportunityBrief(brief);
        },
        deliver: async (input, signal) => {
            const request = parseDeliveryRequest(input);
            const deliveryId = await deps.delivery.deliver(request.brief, request.destination, request.idempotencyKey, signal);
            const receipt: DeliveryReceipt = { deliveryId, destination: request.destination };
            return receipt;
        },
    };
}
